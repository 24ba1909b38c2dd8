/**
 * Canonical scenario table
 *
 * Scenario constants live in config (config/valuation.json → scenarios).
 * Each scenario's discount rate is the base WACC shifted by its offset;
 * capital structure is not recomputed per scenario.
 */

import type { ScenarioProfile, ValuationConfig } from '@/core/config';
import type { CanonicalScenarioName, ScenarioAssumptions } from './types';

export function buildScenarioAssumptions(
  name: CanonicalScenarioName,
  baseWacc: number,
  profile: ScenarioProfile
): ScenarioAssumptions {
  return {
    name,
    revenueGrowthRate: profile.revenueGrowthRate,
    marginAdjustmentFactor: profile.marginAdjustmentFactor,
    discountRate: baseWacc + profile.waccOffset,
    terminalGrowthRate: profile.terminalGrowthRate,
    confidenceLevel: profile.confidenceLevel,
    projectionYears: profile.projectionYears,
  };
}

export function buildCanonicalScenarios(
  baseWacc: number,
  table: ValuationConfig['scenarios']
): Record<CanonicalScenarioName, ScenarioAssumptions> {
  return {
    worst_case: buildScenarioAssumptions('worst_case', baseWacc, table.worst_case),
    base_case: buildScenarioAssumptions('base_case', baseWacc, table.base_case),
    best_case: buildScenarioAssumptions('best_case', baseWacc, table.best_case),
  };
}
