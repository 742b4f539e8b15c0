import { mockQuery, mockQueryError } from '../../__helpers__/mockQuery';
import { ModelModule } from '../../__helpers__/modelMock';
import { RegistryModule } from '../../__helpers__/registryMock';
import { getWalletSummary, listWalletTransactions } from '../../../src/services/wallet.service';

jest.mock('../../../src/models/registry', () => require('../../__helpers__/registryMock').registryModule());
jest.mock('../../../src/models/sponsorshipSubscription.model', () =>
  require('../../__helpers__/modelMock').modelModule(),
);
jest.mock('../../../src/models/adminWallet.model', () => require('../../__helpers__/modelMock').modelModule());
jest.mock('../../../src/models/commission.model', () => require('../../__helpers__/modelMock').modelModule());

const { registry } = jest.requireMock<RegistryModule>('../../../src/models/registry');
const Sponsorships = jest.requireMock<ModelModule>('../../../src/models/sponsorshipSubscription.model').default;
const AdminWallet = jest.requireMock<ModelModule>('../../../src/models/adminWallet.model').default;
const Commission = jest.requireMock<ModelModule>('../../../src/models/commission.model').default;

const arrangeIncome = () => {
  registry.company.subscription.aggregate.mockReturnValue(mockQuery([{ total: 300 }]));
  registry.wholesaler.subscription.aggregate.mockReturnValue(mockQuery([{ total: 200 }]));
  registry.serviceProvider.subscription.aggregate.mockReturnValue(mockQuery([]));
  Sponsorships.aggregate.mockReturnValue(mockQuery([{ total: 50 }]));
  AdminWallet.aggregate.mockReturnValue(
    mockQuery([
      { _id: 'subscription_income', total: 40 },
      { _id: 'withdrawal_income', total: 10 },
    ]),
  );
  Commission.aggregate.mockReturnValue(mockQuery([{ salesperson: 20, salesManager: 10 }]));
};

describe('getWalletSummary', () => {
  it('adds every income source and subtracts all commissions', async () => {
    arrangeIncome();

    const summary = await getWalletSummary();

    expect(summary).toEqual({
      totalIncome: 600,
      subscriptionIncome: 550,
      adminWalletIncome: 40,
      withdrawalIncome: 10,
      totalCommissions: 30,
      netProfit: 570,
      incomeBreakdown: {
        company: { income: 300, error: null },
        wholesaler: { income: 200, error: null },
        serviceProvider: { income: 0, error: null },
        sponsorship: { income: 50, error: null },
      },
      commissionBreakdown: {
        salesperson: { commission: 20, percentage: 66.67 },
        salesManager: { commission: 10, percentage: 33.33 },
        total: 30,
      },
    });
  });

  it('joins active subscriptions to their plan prices', async () => {
    arrangeIncome();

    await getWalletSummary();

    const [pipeline] = registry.company.subscription.aggregate.mock.calls[0];
    expect(pipeline).toEqual([
      { $match: { status: 'active' } },
      { $lookup: { from: 'subscription_plans', localField: 'planId', foreignField: '_id', as: 'priced' } },
      { $unwind: '$priced' },
      { $group: { _id: null, total: { $sum: '$priced.price' } } },
    ]);
    const [sponsorPipeline] = Sponsorships.aggregate.mock.calls[0];
    expect(sponsorPipeline[1].$lookup.from).toBe('sponsorships');
  });

  it('reports a failing kind in the breakdown and counts it as zero', async () => {
    arrangeIncome();
    registry.wholesaler.subscription.aggregate.mockReturnValue(
      mockQueryError(new Error('wholesaler_subscriptions unavailable')),
    );

    const summary = await getWalletSummary();

    expect(summary.incomeBreakdown.wholesaler).toEqual({
      income: 0,
      error: 'wholesaler_subscriptions unavailable',
    });
    expect(summary.subscriptionIncome).toBe(350);
    expect(summary.totalIncome).toBe(400);
    expect(summary.netProfit).toBe(370);
  });

  it('returns zeros and zero percentages for an empty ledger', async () => {
    registry.company.subscription.aggregate.mockReturnValue(mockQuery([]));
    registry.wholesaler.subscription.aggregate.mockReturnValue(mockQuery([]));
    registry.serviceProvider.subscription.aggregate.mockReturnValue(mockQuery([]));
    Sponsorships.aggregate.mockReturnValue(mockQuery([]));
    AdminWallet.aggregate.mockReturnValue(mockQuery([]));
    Commission.aggregate.mockReturnValue(mockQuery([]));

    const summary = await getWalletSummary();

    expect(summary.totalIncome).toBe(0);
    expect(summary.netProfit).toBe(0);
    expect(summary.commissionBreakdown).toEqual({
      salesperson: { commission: 0, percentage: 0 },
      salesManager: { commission: 0, percentage: 0 },
      total: 0,
    });
  });

  it('gives the same answer when called twice over unchanged data', async () => {
    arrangeIncome();

    const first = await getWalletSummary();
    const second = await getWalletSummary();

    expect(second).toEqual(first);
  });
});

describe('listWalletTransactions', () => {
  it('filters by type and pages newest first', async () => {
    const page = mockQuery([{ type: 'withdrawal_income', amount: 10 }]);
    AdminWallet.find.mockReturnValue(page);
    AdminWallet.countDocuments.mockReturnValue(mockQuery(12));

    const result = await listWalletTransactions({ page: 2, limit: 5, type: 'withdrawal_income' });

    expect(AdminWallet.find).toHaveBeenCalledWith({ type: 'withdrawal_income' });
    expect(page.sort).toHaveBeenCalledWith({ createdAt: -1 });
    expect(page.skip).toHaveBeenCalledWith(5);
    expect(page.limit).toHaveBeenCalledWith(5);
    expect(result.meta).toEqual({ page: 2, limit: 5, total: 12, totalPages: 3 });
    expect(result.items).toEqual([{ type: 'withdrawal_income', amount: 10 }]);
  });
});
