import type { FinancialInputBundle, ScenarioAssumptions } from '@/dcf/types';

/** Five steadily growing years with a large, lightly levered balance sheet. */
export function makeBundle(overrides: Partial<FinancialInputBundle> = {}): FinancialInputBundle {
  return {
    symbol: 'TEST',
    currentPrice: 100,
    sharesOutstanding: 1_000_000,
    marketCap: 100_000_000,
    revenueHistory: [1000, 1100, 1200, 1300, 1400],
    operatingCashFlowHistory: [200, 220, 240, 260, 280],
    capexHistory: [50, 55, 60, 65, 70],
    workingCapitalChangeHistory: [10, 12, 14, 16, 18],
    totalDebt: 500_000,
    cashAndEquivalents: 100_000,
    beta: 1.2,
    riskFreeRate: 0.03,
    marketRiskPremium: 0.06,
    taxRate: 0.25,
    ...overrides,
  };
}

export function makeAssumptions(overrides: Partial<ScenarioAssumptions> = {}): ScenarioAssumptions {
  return {
    name: 'custom',
    revenueGrowthRate: 0.05,
    marginAdjustmentFactor: 1,
    discountRate: 0.1,
    terminalGrowthRate: 0.025,
    confidenceLevel: 0.5,
    projectionYears: 5,
    ...overrides,
  };
}
