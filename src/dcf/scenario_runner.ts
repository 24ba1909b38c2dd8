/**
 * Scenario Runner
 *
 * One valuation for one set of assumptions:
 * revenue → FCF → terminal value → present value → equity → per share.
 * Pure function of (bundle, assumptions); safe to run concurrently.
 */

import {
  calculateFcfMargin,
  calculateHistoricalFcf,
  DEFAULT_PROJECTION_SETTINGS,
  projectFreeCashFlows,
  projectRevenue,
  type ProjectionSettings,
} from './projections';
import { discountCashFlows, type DiscountRates, type DiscountedCashFlows } from './present_value';
import { assertDiscountExceedsGrowth, calculateTerminalValue } from './terminal_value';
import type { FinancialInputBundle, ScenarioAssumptions, ScenarioName, ScenarioResult } from './types';

type BalanceSheetInputs = Pick<
  FinancialInputBundle,
  'totalDebt' | 'cashAndEquivalents' | 'sharesOutstanding' | 'currentPrice'
>;

export interface EquityValuation {
  enterpriseValue: number;
  equityValue: number;
  intrinsicValuePerShare: number;
  upsideDownsidePercentage: number;
}

export function deriveEquityValue(enterpriseValue: number, bundle: BalanceSheetInputs): EquityValuation {
  const equityValue = enterpriseValue - bundle.totalDebt + bundle.cashAndEquivalents;
  const intrinsicValuePerShare = equityValue / bundle.sharesOutstanding;
  return {
    enterpriseValue,
    equityValue,
    intrinsicValuePerShare,
    upsideDownsidePercentage:
      ((intrinsicValuePerShare - bundle.currentPrice) / bundle.currentPrice) * 100,
  };
}

export interface CashFlowValuation extends EquityValuation {
  terminalValue: number;
  discounted: DiscountedCashFlows;
}

/**
 * Values an already-projected cash-flow path under the given rates. Shared by
 * the scenario runner and the sensitivity grid so both discount identically.
 */
export function valueCashFlows(
  bundle: BalanceSheetInputs,
  cashFlows: ReadonlyArray<number>,
  rates: DiscountRates,
  scenario: ScenarioName | null = null
): CashFlowValuation {
  const finalCashFlow = cashFlows.length > 0 ? cashFlows[cashFlows.length - 1] : 0;
  const terminalValue = calculateTerminalValue(
    finalCashFlow,
    rates.discountRate,
    rates.terminalGrowthRate,
    scenario
  );
  const discounted = discountCashFlows(cashFlows, terminalValue, rates, scenario);

  return {
    ...deriveEquityValue(discounted.total, bundle),
    terminalValue,
    discounted,
  };
}

export function runScenario(
  bundle: FinancialInputBundle,
  assumptions: ScenarioAssumptions,
  settings: ProjectionSettings = DEFAULT_PROJECTION_SETTINGS
): ScenarioResult {
  assertDiscountExceedsGrowth(assumptions.discountRate, assumptions.terminalGrowthRate, assumptions.name);

  const projectedRevenues = projectRevenue(bundle.revenueHistory, assumptions, settings);
  const fcfMargin = calculateFcfMargin(calculateHistoricalFcf(bundle, settings.fcfLookbackYears));
  const projectedCashFlows = projectFreeCashFlows(
    projectedRevenues,
    fcfMargin,
    assumptions.marginAdjustmentFactor
  );

  const valuation = valueCashFlows(
    bundle,
    projectedCashFlows,
    { discountRate: assumptions.discountRate, terminalGrowthRate: assumptions.terminalGrowthRate },
    assumptions.name
  );

  return {
    scenario: assumptions.name,
    intrinsicValuePerShare: valuation.intrinsicValuePerShare,
    totalEnterpriseValue: valuation.enterpriseValue,
    equityValue: valuation.equityValue,
    terminalValue: valuation.terminalValue,
    projectedRevenues,
    projectedCashFlows,
    presentValues: valuation.discounted.presentValues,
    discountRate: assumptions.discountRate,
    terminalGrowthRate: assumptions.terminalGrowthRate,
    upsideDownsidePercentage: valuation.upsideDownsidePercentage,
    assumptions,
  };
}
