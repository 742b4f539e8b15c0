import {
  commissionListQuerySchema,
  createSubscriptionPlanSchema,
  parseQuery,
  resetAdminPasswordSchema,
} from '../../../src/middleware/validate';

describe('createSubscriptionPlanSchema', () => {
  const plan = { title: 'Gold', price: 300, duration: 6, type: 'company' };

  it('defaults plans to active', () => {
    expect(createSubscriptionPlanSchema.parse(plan)).toEqual({ ...plan, isActive: true });
  });

  it('only accepts 1, 6 or 12 month durations', () => {
    const result = createSubscriptionPlanSchema.safeParse({ ...plan, duration: 3 });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Duration must be one of 1, 6, 12 months');
  });

  it('rejects a free plan', () => {
    const result = createSubscriptionPlanSchema.safeParse({ ...plan, price: 0 });

    expect(result.error?.issues[0].message).toBe('Price must be greater than 0');
  });
});

describe('resetAdminPasswordSchema', () => {
  it('requires mixed case and a digit', () => {
    const result = resetAdminPasswordSchema.safeParse({ otp: '1234', newPassword: 'lowercase1' });

    expect(result.error?.issues[0].message).toBe('Password must include upper and lower case letters and a number.');
  });
});

describe('parseQuery', () => {
  it('turns the paid flag into a boolean', () => {
    expect(parseQuery(commissionListQuerySchema, { paid: 'false' })).toEqual({ page: 1, limit: 20, paid: false });
  });

  it('throws a 400 for a bad page', () => {
    expect(() => parseQuery(commissionListQuerySchema, { page: '0' })).toThrow('Page must be greater than 0');
  });
});
