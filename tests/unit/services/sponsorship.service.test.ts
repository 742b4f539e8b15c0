import { Types } from 'mongoose';
import { addDays } from 'date-fns';
import { mockQuery } from '../../__helpers__/mockQuery';
import { ModelModule } from '../../__helpers__/modelMock';
import { RegistryModule } from '../../__helpers__/registryMock';
import { EntityPrincipal, Principal } from '../../../src/services/access.service';
import {
  discountedPrice,
  processSponsorshipRequest,
  requestSponsorship,
} from '../../../src/services/sponsorship.service';

jest.mock('../../../src/models/sponsorship.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/sponsorshipRequest.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/sponsorshipSubscription.model', () =>
  require('../../__helpers__/modelMock').modelModule(),
);
jest.mock('../../../src/models/adminWallet.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/registry', () => require('../../__helpers__/registryMock').registryModule());
jest.mock('../../../src/services/notification.service', () => ({
  notifyEntity: jest.fn().mockResolvedValue(undefined),
}));

const Sponsorship = jest.requireMock<ModelModule>('../../../src/models/sponsorship.model').default;
const Request = jest.requireMock<ModelModule>('../../../src/models/sponsorshipRequest.model').default;
const SponsorshipSubscription = jest.requireMock<ModelModule>('../../../src/models/sponsorshipSubscription.model').default;
const AdminWallet = jest.requireMock<ModelModule>('../../../src/models/adminWallet.model').default;
const { registry } = jest.requireMock<RegistryModule>('../../../src/models/registry');
const { notifyEntity } = jest.requireMock<{ notifyEntity: jest.Mock }>('../../../src/services/notification.service');

const ownerId = new Types.ObjectId();
const entityId = new Types.ObjectId();
const branchId = new Types.ObjectId();
const sponsorshipId = new Types.ObjectId();
const requestId = new Types.ObjectId();

const ownerOf = (entityKind: EntityPrincipal['entityKind']): EntityPrincipal => ({
  kind: 'entity',
  entityKind,
  userId: ownerId.toHexString(),
  email: 'owner@example.com',
  hasCapability: (capability) => capability === 'entity_self_service',
  owns: (id) => String(id) === ownerId.toHexString(),
});

const admin: Principal = {
  kind: 'admin',
  userId: '000000000000000000000000',
  email: 'admin@example.com',
  hasCapability: () => true,
};

const spotlight = {
  _id: sponsorshipId,
  title: 'Spotlight',
  price: 200,
  duration: 30,
  discount: 25,
  isActive: true,
  endDate: null,
};

describe('discountedPrice', () => {
  it('takes the percentage off and rounds to cents', () => {
    expect(discountedPrice(200, 25)).toBe(150);
    expect(discountedPrice(99.99, 15)).toBe(84.99);
    expect(discountedPrice(80, 0)).toBe(80);
  });
});

describe('requestSponsorship', () => {
  beforeEach(() => {
    Sponsorship.findById.mockReturnValue(mockQuery(spotlight));
    SponsorshipSubscription.exists.mockResolvedValue(null);
    Request.exists.mockResolvedValue(null);
    Request.create.mockImplementation(async (doc: Record<string, unknown>) => ({ toObject: () => doc }));
    registry.serviceProvider.entity.findOne.mockReturnValue(mockQuery({ _id: entityId, branches: [] }));
    registry.company.entity.findOne.mockReturnValue(mockQuery({ _id: entityId, branches: [{ _id: branchId }] }));
  });

  it('lets a service provider sponsor itself', async () => {
    const request = await requestSponsorship(ownerOf('serviceProvider'), sponsorshipId.toHexString());

    expect(request).toMatchObject({
      sponsorshipId,
      entityType: 'serviceProvider',
      entityId,
      branchId: null,
      status: 'pending',
    });
  });

  it('sponsors the named branch of a company', async () => {
    const request = await requestSponsorship(ownerOf('company'), sponsorshipId.toHexString(), branchId.toHexString());

    expect(request).toMatchObject({ entityType: 'company', entityId, branchId });
    expect(Request.exists).toHaveBeenCalledWith({ entityId, branchId, status: 'pending' });
  });

  it('needs a branch for companies', async () => {
    await expect(requestSponsorship(ownerOf('company'), sponsorshipId.toHexString())).rejects.toMatchObject({
      status: 400,
      message: 'Branch ID is required',
    });
  });

  it('answers 404 for a branch the company does not have', async () => {
    await expect(
      requestSponsorship(ownerOf('company'), sponsorshipId.toHexString(), new Types.ObjectId().toHexString()),
    ).rejects.toMatchObject({ status: 404, message: 'Branch not found' });
  });

  it('refuses an expired sponsorship', async () => {
    Sponsorship.findById.mockReturnValue(mockQuery({ ...spotlight, endDate: new Date('2020-01-01T00:00:00Z') }));

    await expect(requestSponsorship(ownerOf('serviceProvider'), sponsorshipId.toHexString())).rejects.toMatchObject({
      status: 400,
      message: 'Sponsorship has expired',
    });
    expect(Request.create).not.toHaveBeenCalled();
  });

  it('refuses a target that is already sponsored', async () => {
    SponsorshipSubscription.exists.mockResolvedValue({ _id: new Types.ObjectId() });

    await expect(requestSponsorship(ownerOf('serviceProvider'), sponsorshipId.toHexString())).rejects.toMatchObject({
      status: 409,
      message: 'This target already has an active sponsorship',
    });
  });

  it('refuses a second pending request for the same target', async () => {
    Request.exists.mockResolvedValue({ _id: requestId });

    await expect(requestSponsorship(ownerOf('serviceProvider'), sponsorshipId.toHexString())).rejects.toMatchObject({
      status: 409,
      message: 'A sponsorship request is already pending for this target',
    });
    expect(Request.create).not.toHaveBeenCalled();
  });
});

describe('processSponsorshipRequest', () => {
  const companies = registry.company;

  const pending = (status = 'pending') => ({
    _id: requestId,
    sponsorshipId,
    entityType: 'company',
    entityId,
    branchId,
    status,
  });

  beforeEach(() => {
    Request.findById.mockReturnValue(mockQuery(pending()));
    Sponsorship.findById.mockReturnValue(mockQuery(spotlight));
    companies.entity.findById.mockReturnValue(
      mockQuery({ _id: entityId, businessName: 'Harbour Traders', email: 'harbour@example.com' }),
    );
    Request.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
    SponsorshipSubscription.create.mockImplementation(async ([doc]: Array<Record<string, unknown>>) => [
      { toObject: () => ({ _id: new Types.ObjectId(), ...doc }) },
    ]);
    Sponsorship.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
    companies.entity.updateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
    AdminWallet.create.mockResolvedValue([{}]);
  });

  const decide = (overrides: Partial<Parameters<typeof processSponsorshipRequest>[0]> = {}) =>
    processSponsorshipRequest({ requestId: requestId.toHexString(), decision: 'approved', actor: admin, ...overrides });

  it('starts the sponsorship, flags the branch and books the discounted income', async () => {
    const result = await decide();

    expect(result.status).toBe('approved');
    expect(result.amount).toBe(150);
    expect(result.subscription).toMatchObject({
      sponsorshipId,
      entityId,
      entityType: 'company',
      branchId,
      status: 'active',
      discountApplied: 25,
      amountPaid: 150,
    });
    expect(result.subscription?.endDate).toEqual(addDays(result.processedAt, 30));

    const [claimFilter, claim] = Request.updateOne.mock.calls[0];
    expect(String(claimFilter._id)).toBe(requestId.toHexString());
    expect(claimFilter.status).toBe('pending');
    expect(claim.$set.status).toBe('approved');

    expect(Sponsorship.updateOne).toHaveBeenCalledWith(
      { _id: sponsorshipId },
      { $inc: { usedCount: 1 } },
      { session: undefined },
    );
    expect(companies.entity.updateOne).toHaveBeenCalledWith(
      { _id: entityId, 'branches._id': branchId },
      { $set: { 'branches.$.sponsored': true } },
      { session: undefined },
    );

    const [[walletLine]] = AdminWallet.create.mock.calls[0];
    expect(walletLine).toMatchObject({ type: 'sponsorship_income', amount: 150, entityType: 'company', entityId });

    const [notification] = notifyEntity.mock.calls[0];
    expect(notification.subject).toBe('Sponsorship Approved');
    expect(notification.message).toBe('Your sponsorship "Spotlight" is active for 30 days.');
  });

  it('rejects by clearing the flag without a subscription or income', async () => {
    const result = await decide({ decision: 'rejected', note: 'Photos missing' });

    expect(result.subscription).toBeNull();
    expect(result.amount).toBe(0);
    expect(SponsorshipSubscription.create).not.toHaveBeenCalled();
    expect(AdminWallet.create).not.toHaveBeenCalled();
    expect(companies.entity.updateOne).toHaveBeenCalledWith(
      { _id: entityId, 'branches._id': branchId },
      { $set: { 'branches.$.sponsored': false } },
      { session: undefined },
    );
    expect(notifyEntity.mock.calls[0][0].message).toBe(
      'Your sponsorship request for "Spotlight" was rejected. Note: Photos missing',
    );
  });

  it('refuses a request that was already processed', async () => {
    Request.findById.mockReturnValue(mockQuery(pending('approved')));

    await expect(decide()).rejects.toMatchObject({ status: 409, message: 'Sponsorship request is already approved' });
    expect(Request.updateOne).not.toHaveBeenCalled();
    expect(SponsorshipSubscription.create).not.toHaveBeenCalled();
  });

  it('lets only one of two racing approvers through', async () => {
    Request.updateOne.mockResolvedValue({ matchedCount: 0, modifiedCount: 0 });

    await expect(decide()).rejects.toMatchObject({ status: 409 });
    expect(SponsorshipSubscription.create).not.toHaveBeenCalled();
    expect(AdminWallet.create).not.toHaveBeenCalled();
  });

  it('forbids callers without the approval capability', async () => {
    const salesperson: Principal = {
      kind: 'salesperson',
      userId: new Types.ObjectId().toHexString(),
      email: 'rep@example.com',
      hasCapability: (capability) => capability === 'sales_operations',
    };

    await expect(decide({ actor: salesperson })).rejects.toMatchObject({ status: 403 });
    expect(Request.findById).not.toHaveBeenCalled();
  });
});
