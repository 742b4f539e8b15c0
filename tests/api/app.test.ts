import request from 'supertest';
import { Types } from 'mongoose';
import app from '../../src/app';
import { generateTokens, TokenClaims } from '../../src/utils/token';
import { mockQuery } from '../__helpers__/mockQuery';
import { ModelModule } from '../__helpers__/modelMock';

jest.mock('../../src/models/manager.model', () => require('../__helpers__/modelMock').modelModule());
jest.mock('../../src/services/subscriptionApproval.service');
jest.mock('../../src/services/wallet.service');

const Manager = jest.requireMock<ModelModule>('../../src/models/manager.model').default;
const approval = jest.requireMock<{ processSubscriptionRequest: jest.Mock }>(
  '../../src/services/subscriptionApproval.service',
);
const wallet = jest.requireMock<{ getWalletSummary: jest.Mock; listWalletTransactions: jest.Mock }>(
  '../../src/services/wallet.service',
);

const bearer = (claims: TokenClaims) => `Bearer ${generateTokens(claims).accessToken}`;

const adminAuth = bearer({ userId: '000000000000000000000000', email: 'admin@example.com', userType: 'admin' });
const salespersonAuth = bearer({
  userId: new Types.ObjectId().toHexString(),
  email: 'sam@example.com',
  userType: 'salesperson',
});

describe('public routes', () => {
  it('GET /health reports ok', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe(200);
    expect(res.body.message).toBe('ok');
    expect(typeof res.body.data.uptime).toBe('number');
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 404, message: 'Route GET /nowhere not found' });
  });
});

describe('POST /auth/login', () => {
  it('issues tokens for the configured admin', async () => {
    const res = await request(app)
      .post('/auth/login')
      .send({ email: 'Admin@Example.com', password: 'admin-password' });

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Login successful');
    expect(res.body.data.userType).toBe('admin');
    expect(typeof res.body.data.accessToken).toBe('string');
  });

  it('rejects a malformed email before any lookup', async () => {
    const res = await request(app).post('/auth/login').send({ email: 'admin', password: 'admin-password' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 400, message: 'A valid email is required' });
  });

  it('rejects a wrong admin password', async () => {
    const res = await request(app).post('/auth/login').send({ email: 'admin@example.com', password: 'wrong' });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ status: 401, message: 'Invalid email or password' });
  });
});

describe('POST /auth/admin/reset-password', () => {
  it('validates the OTP format', async () => {
    const res = await request(app)
      .post('/auth/admin/reset-password')
      .send({ otp: '12', newPassword: 'NewPassw0rd' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('OTP must be 4 digits');
  });

  it('reports a missing OTP request', async () => {
    const res = await request(app)
      .post('/auth/admin/reset-password')
      .send({ otp: '1234', newPassword: 'NewPassw0rd' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('No OTP request found');
  });
});

describe('GET /wallet', () => {
  it('requires a token', async () => {
    const res = await request(app).get('/wallet');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ status: 401, message: 'Unauthorized' });
  });

  it('rejects a garbage token', async () => {
    const res = await request(app).get('/wallet').set('Authorization', 'Bearer not-a-token');

    expect(res.status).toBe(401);
  });

  it('forbids salespersons', async () => {
    const res = await request(app).get('/wallet').set('Authorization', salespersonAuth);

    expect(res.status).toBe(403);
    expect(res.body.message).toBe('Access denied: insufficient permissions');
    expect(wallet.getWalletSummary).not.toHaveBeenCalled();
  });

  it('lets a manager with the revenue role in', async () => {
    const managerId = new Types.ObjectId().toHexString();
    Manager.findById.mockReturnValue(mockQuery({ _id: managerId, rolesAccess: ['financial_dashboard_revenue'] }));
    wallet.getWalletSummary.mockResolvedValue({ totalIncome: 600, netProfit: 570 });

    const res = await request(app)
      .get('/wallet')
      .set('Authorization', bearer({ userId: managerId, email: 'mona@example.com', userType: 'manager' }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 200,
      message: 'Admin wallet summary',
      data: { totalIncome: 600, netProfit: 570 },
    });
  });

  it('rejects an out-of-range page size', async () => {
    const res = await request(app).get('/wallet/transactions?limit=500').set('Authorization', adminAuth);

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Limit must be between 1 and 100');
    expect(wallet.listWalletTransactions).not.toHaveBeenCalled();
  });
});

describe('PUT /subscriptions/requests/:kind/:requestId', () => {
  const requestId = new Types.ObjectId().toHexString();

  it('passes the decision and the resolved admin to the approval workflow', async () => {
    approval.processSubscriptionRequest.mockResolvedValue({
      requestId,
      entityName: 'Acme Trading',
      planName: 'Gold',
      status: 'approved',
      adminNote: '',
    });

    const res = await request(app)
      .put(`/subscriptions/requests/company/${requestId}`)
      .set('Authorization', adminAuth)
      .send({ status: 'approved' });

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Subscription request approved successfully');
    expect(res.body.data.entityName).toBe('Acme Trading');
    expect(approval.processSubscriptionRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        kind: 'company',
        requestId,
        decision: 'approved',
        note: '',
        actor: expect.objectContaining({ kind: 'admin' }),
      }),
    );
  });

  it('rejects an unknown decision', async () => {
    const res = await request(app)
      .put(`/subscriptions/requests/company/${requestId}`)
      .set('Authorization', adminAuth)
      .send({ status: 'maybe' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Invalid status. Must be 'approved' or 'rejected'");
  });

  it('rejects an unknown entity kind', async () => {
    const res = await request(app)
      .put(`/subscriptions/requests/shops/${requestId}`)
      .set('Authorization', adminAuth)
      .send({ status: 'rejected' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Invalid entity type. Must be company, wholesaler or serviceProvider');
    expect(approval.processSubscriptionRequest).not.toHaveBeenCalled();
  });

  it('keeps salespersons out', async () => {
    const res = await request(app)
      .put(`/subscriptions/requests/company/${requestId}`)
      .set('Authorization', salespersonAuth)
      .send({ status: 'approved' });

    expect(res.status).toBe(403);
  });
});
