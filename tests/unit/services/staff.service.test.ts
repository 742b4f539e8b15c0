import bcrypt from 'bcryptjs';
import { Types } from 'mongoose';
import { mockQuery } from '../../__helpers__/mockQuery';
import { ModelModule } from '../../__helpers__/modelMock';
import { Principal } from '../../../src/services/access.service';
import { createManager, createSalesperson, listSalespersons } from '../../../src/services/staff.service';

jest.mock('../../../src/models/manager.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/salesManager.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/salesperson.model', () => require('../../__helpers__/modelMock').modelModule());

const Manager = jest.requireMock<ModelModule>('../../../src/models/manager.model').default;
const SalesManager = jest.requireMock<ModelModule>('../../../src/models/salesManager.model').default;
const Salesperson = jest.requireMock<ModelModule>('../../../src/models/salesperson.model').default;

const salesManagerId = new Types.ObjectId();

const admin: Principal = {
  kind: 'admin',
  userId: '000000000000000000000000',
  email: 'admin@example.com',
  hasCapability: () => true,
};

const salesManager: Principal = {
  kind: 'sales_manager',
  userId: salesManagerId.toHexString(),
  email: 'sara@example.com',
  rolesAccess: ['user_management'],
  hasCapability: (capability) => capability === 'user_management',
};

const input = {
  fullName: 'Sam Rep',
  email: 'sam@example.com',
  password: 'staff-password',
  commissionPercent: 10,
};

beforeEach(() => {
  Manager.exists.mockResolvedValue(null);
  Salesperson.exists.mockResolvedValue(null);
  SalesManager.exists.mockImplementation((filter: Record<string, unknown>) =>
    Promise.resolve('_id' in filter ? { _id: salesManagerId } : null),
  );
  SalesManager.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
});

describe('createSalesperson', () => {
  it('puts a new salesperson on the calling sales manager team', async () => {
    const salespersonId = new Types.ObjectId();
    Salesperson.create.mockResolvedValue({ _id: salespersonId, toJSON: () => ({ _id: salespersonId, fullName: 'Sam Rep' }) });

    const created = await createSalesperson(input, salesManager);

    expect(created).toEqual({ _id: salespersonId, fullName: 'Sam Rep' });
    const [doc] = Salesperson.create.mock.calls[0];
    expect(doc.salesManagerId.equals(salesManagerId)).toBe(true);
    expect(doc.createdBy.equals(salesManagerId)).toBe(true);
    expect(doc.referralCode).toMatch(/^SPR-[A-Z2-7]{6}$/);
    expect(doc.password).not.toBe('staff-password');
    expect(bcrypt.compareSync('staff-password', doc.password)).toBe(true);
    expect(SalesManager.updateOne).toHaveBeenCalledWith(
      { _id: salesManagerId },
      { $addToSet: { salespersons: salespersonId } },
    );
  });

  it('refuses to add to a team the sales manager does not run', async () => {
    await expect(
      createSalesperson({ ...input, salesManagerId: new Types.ObjectId().toHexString() }, salesManager),
    ).rejects.toMatchObject({ status: 403 });
    expect(Salesperson.create).not.toHaveBeenCalled();
  });

  it('requires admins to name the sales manager', async () => {
    await expect(createSalesperson(input, admin)).rejects.toMatchObject({
      status: 400,
      message: 'salesManagerId is required',
    });
  });

  it('fails when the sales manager does not exist', async () => {
    SalesManager.exists.mockResolvedValue(null);

    await expect(
      createSalesperson({ ...input, salesManagerId: salesManagerId.toHexString() }, admin),
    ).rejects.toMatchObject({ status: 404, message: 'Sales manager not found' });
  });

  it('rejects an email used by any staff account', async () => {
    Manager.exists.mockResolvedValue({ _id: new Types.ObjectId() });

    await expect(
      createSalesperson({ ...input, salesManagerId: salesManagerId.toHexString() }, admin),
    ).rejects.toMatchObject({ status: 409, message: 'Email already in use' });
  });
});

describe('createManager', () => {
  it('rejects an email already held by a salesperson', async () => {
    Salesperson.exists.mockResolvedValue({ _id: new Types.ObjectId() });

    await expect(
      createManager({ fullName: 'Mona', email: 'sam@example.com', password: 'staff-password', rolesAccess: [] }),
    ).rejects.toMatchObject({ status: 409 });
    expect(Manager.create).not.toHaveBeenCalled();
  });
});

describe('listSalespersons', () => {
  it('shows a sales manager only their own team', async () => {
    Salesperson.find.mockReturnValue(mockQuery([]));
    Salesperson.countDocuments.mockReturnValue(mockQuery(0));

    const result = await listSalespersons({ page: 2, limit: 10 }, salesManager);

    const [filter] = Salesperson.find.mock.calls[0];
    expect(filter.salesManagerId.equals(salesManagerId)).toBe(true);
    expect(result.meta).toEqual({ page: 2, limit: 10, total: 0, totalPages: 0 });
  });

  it('shows admins every salesperson', async () => {
    Salesperson.find.mockReturnValue(mockQuery([]));
    Salesperson.countDocuments.mockReturnValue(mockQuery(3));

    const result = await listSalespersons({ page: 1, limit: 2 }, admin);

    expect(Salesperson.find).toHaveBeenCalledWith({});
    expect(result.meta.totalPages).toBe(2);
  });
});
