/**
 * Revenue and free-cash-flow projections
 *
 * Revenue growth starts from a blend of historical and scenario growth and
 * relaxes geometrically toward the terminal rate:
 *
 *   g(y) = blended × decay^y + terminal × (1 − decay^y),  y = 0, 1, ...
 *
 * Free cash flow is projected revenue times the historical FCF margin,
 * scaled by the scenario's margin adjustment.
 */

import { DEFAULT_VALUATION_CONFIG, type ValuationConfig } from '@/core/config';
import { mean } from './stats';
import type { FinancialInputBundle, ScenarioAssumptions } from './types';

export type ProjectionSettings = Pick<
  ValuationConfig['projection'],
  'historicalGrowthWeight' | 'scenarioGrowthWeight' | 'growthDecay' | 'fcfLookbackYears'
>;

export const DEFAULT_PROJECTION_SETTINGS: ProjectionSettings = DEFAULT_VALUATION_CONFIG.projection;

// ============================================================================
// Revenue
// ============================================================================

/**
 * Year-over-year growth rates. Periods following a non-positive revenue have
 * no meaningful growth rate and are skipped.
 */
export function calculateHistoricalGrowthRates(revenueHistory: ReadonlyArray<number>): number[] {
  const rates: number[] = [];
  for (let i = 1; i < revenueHistory.length; i++) {
    const previous = revenueHistory[i - 1];
    if (previous > 0) {
      rates.push((revenueHistory[i] - previous) / previous);
    }
  }
  return rates;
}

export function calculateBlendedGrowth(
  revenueHistory: ReadonlyArray<number>,
  scenarioGrowthRate: number,
  settings: ProjectionSettings = DEFAULT_PROJECTION_SETTINGS
): number {
  // Without usable history the scenario rate stands alone
  const historical = mean(calculateHistoricalGrowthRates(revenueHistory)) ?? scenarioGrowthRate;
  return (
    settings.historicalGrowthWeight * historical +
    settings.scenarioGrowthWeight * scenarioGrowthRate
  );
}

export function projectRevenue(
  revenueHistory: ReadonlyArray<number>,
  assumptions: Pick<ScenarioAssumptions, 'revenueGrowthRate' | 'terminalGrowthRate' | 'projectionYears'>,
  settings: ProjectionSettings = DEFAULT_PROJECTION_SETTINGS
): number[] {
  const blended = calculateBlendedGrowth(revenueHistory, assumptions.revenueGrowthRate, settings);
  const projected: number[] = [];
  let lastRevenue = revenueHistory[revenueHistory.length - 1];

  for (let year = 0; year < assumptions.projectionYears; year++) {
    const decayFactor = settings.growthDecay ** year;
    const yearGrowth = blended * decayFactor + assumptions.terminalGrowthRate * (1 - decayFactor);
    lastRevenue = lastRevenue * (1 + yearGrowth);
    projected.push(lastRevenue);
  }

  return projected;
}

// ============================================================================
// Free Cash Flow
// ============================================================================

export interface HistoricalFcfPoint {
  revenue: number;
  freeCashFlow: number;
}

/** FCF = operating cash flow − capex − working-capital change, for the most recent years. */
export function calculateHistoricalFcf(
  bundle: Pick<
    FinancialInputBundle,
    'revenueHistory' | 'operatingCashFlowHistory' | 'capexHistory' | 'workingCapitalChangeHistory'
  >,
  lookbackYears: number = DEFAULT_PROJECTION_SETTINGS.fcfLookbackYears
): HistoricalFcfPoint[] {
  const length = bundle.revenueHistory.length;
  const start = Math.max(0, length - lookbackYears);
  const points: HistoricalFcfPoint[] = [];

  for (let i = start; i < length; i++) {
    points.push({
      revenue: bundle.revenueHistory[i],
      freeCashFlow:
        bundle.operatingCashFlowHistory[i] -
        bundle.capexHistory[i] -
        bundle.workingCapitalChangeHistory[i],
    });
  }

  return points;
}

/** Mean FCF / revenue over the lookback; years without positive revenue are left out. */
export function calculateFcfMargin(points: ReadonlyArray<HistoricalFcfPoint>): number {
  const margins = points
    .filter((point) => point.revenue > 0)
    .map((point) => point.freeCashFlow / point.revenue);
  return mean(margins) ?? 0;
}

export function projectFreeCashFlows(
  projectedRevenues: ReadonlyArray<number>,
  fcfMargin: number,
  marginAdjustmentFactor: number
): number[] {
  const adjustedMargin = fcfMargin * marginAdjustmentFactor;
  return projectedRevenues.map((revenue) => revenue * adjustedMargin);
}
