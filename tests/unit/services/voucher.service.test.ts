import { Types } from 'mongoose';
import { mockQuery } from '../../__helpers__/mockQuery';
import { ModelModule } from '../../__helpers__/modelMock';
import { RegistryModule } from '../../__helpers__/registryMock';
import { TokenClaims } from '../../../src/utils/token';
import { listAvailableVouchers, purchaseVoucher } from '../../../src/services/voucher.service';

jest.mock('../../../src/models/voucher.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/voucherPurchase.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/user', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/registry', () => require('../../__helpers__/registryMock').registryModule());

const Voucher = jest.requireMock<ModelModule>('../../../src/models/voucher.model').default;
const Purchase = jest.requireMock<ModelModule>('../../../src/models/voucherPurchase.model').default;
const User = jest.requireMock<ModelModule>('../../../src/models/user').default;
const companies = jest.requireMock<RegistryModule>('../../../src/models/registry').registry.company;

const accountId = new Types.ObjectId();
const userClaims: TokenClaims = { userId: accountId.toHexString(), email: 'dana@example.com', userType: 'user' };
const companyClaims: TokenClaims = { ...userClaims, userType: 'company' };

const voucherId = new Types.ObjectId();
const coffee = { _id: voucherId, name: 'Free coffee', points: 50, isActive: true, targetUserType: 'user' };

beforeEach(() => {
  Voucher.findOne.mockReturnValue(mockQuery(coffee));
  Purchase.exists.mockResolvedValue(null);
  Purchase.create.mockImplementation(async (doc: Record<string, unknown>) => ({
    toObject: () => ({ _id: new Types.ObjectId(), ...doc }),
  }));
  User.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
  User.findById.mockReturnValue(mockQuery({ _id: accountId, points: 80 }));
});

describe('purchaseVoucher', () => {
  it('deducts the voucher points and records a used purchase', async () => {
    const { purchase } = await purchaseVoucher(userClaims, voucherId.toHexString());

    expect(purchase).toMatchObject({ voucherId, holderType: 'user', pointsUsed: 50, isUsed: true });
    expect(String(purchase.holderId)).toBe(accountId.toHexString());
    expect(purchase.usedAt).toBeInstanceOf(Date);

    const [filter, update] = User.updateOne.mock.calls[0];
    expect(String(filter._id)).toBe(accountId.toHexString());
    expect(filter.points).toEqual({ $gte: 50 });
    expect(update).toEqual({ $inc: { points: -50 } });
  });

  it('refuses a voucher the caller already bought', async () => {
    Purchase.exists.mockResolvedValue({ _id: new Types.ObjectId() });

    await expect(purchaseVoucher(userClaims, voucherId.toHexString())).rejects.toMatchObject({
      status: 409,
      message: 'You have already purchased this voucher',
    });
    expect(User.updateOne).not.toHaveBeenCalled();
    expect(Purchase.create).not.toHaveBeenCalled();
  });

  it('refuses when the balance does not cover the cost', async () => {
    User.updateOne.mockResolvedValue({ matchedCount: 0, modifiedCount: 0 });
    User.findById.mockReturnValue(mockQuery({ _id: accountId, points: 10 }));

    await expect(purchaseVoucher(userClaims, voucherId.toHexString())).rejects.toMatchObject({
      status: 400,
      message: 'Insufficient points',
    });
    expect(Purchase.create).not.toHaveBeenCalled();
  });

  it('gives the points back and answers 409 when a concurrent purchase wins', async () => {
    Purchase.create.mockRejectedValue(Object.assign(new Error('E11000 duplicate key'), { code: 11000 }));

    await expect(purchaseVoucher(userClaims, voucherId.toHexString())).rejects.toMatchObject({
      status: 409,
      message: 'You have already purchased this voucher',
    });

    expect(User.updateOne).toHaveBeenCalledTimes(2);
    const [filter, refund] = User.updateOne.mock.calls[1];
    expect(String(filter._id)).toBe(accountId.toHexString());
    expect(refund).toEqual({ $inc: { points: 50 } });
  });

  it('answers 404 for an inactive or missing voucher', async () => {
    Voucher.findOne.mockReturnValue(mockQuery(null));

    await expect(purchaseVoucher(userClaims, voucherId.toHexString())).rejects.toMatchObject({
      status: 404,
      message: 'Voucher not found or inactive',
    });
  });

  it('keeps a voucher to its target account type', async () => {
    Voucher.findOne.mockReturnValue(mockQuery({ ...coffee, targetUserType: 'company' }));

    await expect(purchaseVoucher(userClaims, voucherId.toHexString())).rejects.toMatchObject({ status: 403 });
    expect(User.updateOne).not.toHaveBeenCalled();
  });

  it('takes a business account points from its entity record', async () => {
    Voucher.findOne.mockReturnValue(mockQuery({ ...coffee, targetUserType: 'company' }));
    companies.entity.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });

    const { purchase } = await purchaseVoucher(companyClaims, voucherId.toHexString());

    expect(purchase.holderType).toBe('company');
    const [filter, update] = companies.entity.updateOne.mock.calls[0];
    expect(String(filter.userId)).toBe(accountId.toHexString());
    expect(update).toEqual({ $inc: { points: -50 } });
    expect(User.updateOne).not.toHaveBeenCalled();
  });

  it('is closed to staff accounts', async () => {
    await expect(
      purchaseVoucher({ ...userClaims, userType: 'salesperson' }, voucherId.toHexString()),
    ).rejects.toMatchObject({ status: 403, message: 'Only account holders can use vouchers' });
  });
});

describe('listAvailableVouchers', () => {
  it('flags what the caller can still afford and what is already bought', async () => {
    const cheap = { _id: new Types.ObjectId(), name: 'Sticker', points: 20 };
    const pricey = { _id: new Types.ObjectId(), name: 'Dinner', points: 100 };
    User.findById.mockReturnValue(mockQuery({ _id: accountId, points: 60 }));
    Voucher.find.mockReturnValue(mockQuery([cheap, coffee, pricey]));
    Purchase.find.mockReturnValue(mockQuery([{ voucherId: cheap._id }]));

    const { points, vouchers } = await listAvailableVouchers(userClaims);

    expect(points).toBe(60);
    expect(vouchers.map((v) => [v.name, v.purchased, v.canPurchase])).toEqual([
      ['Sticker', true, false],
      ['Free coffee', false, true],
      ['Dinner', false, false],
    ]);
    expect(Voucher.find).toHaveBeenCalledWith({ isActive: true, targetUserType: 'user' });
  });

  it('answers 404 when the account is gone', async () => {
    User.findById.mockReturnValue(mockQuery(null));

    await expect(listAvailableVouchers(userClaims)).rejects.toMatchObject({ status: 404 });
  });
});
