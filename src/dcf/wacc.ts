/**
 * Weighted Average Cost of Capital
 *
 * cost of equity = rf + beta × MRP (CAPM)
 * cost of debt   = rf + flat spread
 * WACC           = E/(E+D) × Ke + D/(E+D) × Kd × (1 − t)
 *
 * The debt spread is a simplifying assumption, not derived from credit data.
 */

import { DEFAULT_VALUATION_CONFIG } from '@/core/config';
import type { FinancialInputBundle, WaccBreakdown } from './types';

export const DEFAULT_DEBT_SPREAD = DEFAULT_VALUATION_CONFIG.wacc.debtSpread;

type CapitalInputs = Pick<
  FinancialInputBundle,
  'marketCap' | 'totalDebt' | 'beta' | 'riskFreeRate' | 'marketRiskPremium' | 'taxRate'
>;

export function calculateWaccBreakdown(
  inputs: CapitalInputs,
  debtSpread: number = DEFAULT_DEBT_SPREAD
): WaccBreakdown {
  const costOfEquity = inputs.riskFreeRate + inputs.beta * inputs.marketRiskPremium;
  const costOfDebt = inputs.riskFreeRate + debtSpread;
  const afterTaxCostOfDebt = costOfDebt * (1 - inputs.taxRate);
  const totalCapital = inputs.marketCap + inputs.totalDebt;

  // No capital structure to weight: fall back to pure equity
  if (totalCapital === 0) {
    return {
      costOfEquity,
      costOfDebt,
      afterTaxCostOfDebt,
      equityWeight: 1,
      debtWeight: 0,
      wacc: costOfEquity,
    };
  }

  const equityWeight = inputs.marketCap / totalCapital;
  const debtWeight = 1 - equityWeight;

  return {
    costOfEquity,
    costOfDebt,
    afterTaxCostOfDebt,
    equityWeight,
    debtWeight,
    wacc: equityWeight * costOfEquity + debtWeight * costOfDebt * (1 - inputs.taxRate),
  };
}

export function calculateWacc(inputs: CapitalInputs, debtSpread: number = DEFAULT_DEBT_SPREAD): number {
  return calculateWaccBreakdown(inputs, debtSpread).wacc;
}
