/**
 * Sensitivity Grid
 *
 * Intrinsic value per share over a WACC × terminal-growth grid centred on
 * the base case. Cells reuse the base case's projected cash flows: only the
 * discount rate and terminal growth vary, never the revenue path. This
 * measures discounting sensitivity, not full-model sensitivity.
 */

import { DEFAULT_VALUATION_CONFIG, type ValuationConfig } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { DomainError } from './errors';
import { valueCashFlows } from './scenario_runner';
import type { FinancialInputBundle, ScenarioResult, SensitivityGrid } from './types';

const logger = createChildLogger('dcf_sensitivity');

export type SensitivitySettings = ValuationConfig['sensitivity'];

export const DEFAULT_SENSITIVITY_SETTINGS: SensitivitySettings = DEFAULT_VALUATION_CONFIG.sensitivity;

/** 2 × steps + 1 points; the middle one is exactly `center`. */
export function buildSensitivityAxis(center: number, step: number, steps: number): number[] {
  const axis: number[] = [];
  for (let offset = -steps; offset <= steps; offset++) {
    axis.push(offset === 0 ? center : center + offset * step);
  }
  return axis;
}

export function generateSensitivityGrid(
  bundle: FinancialInputBundle,
  baseCase: ScenarioResult,
  settings: SensitivitySettings = DEFAULT_SENSITIVITY_SETTINGS
): SensitivityGrid {
  const waccAxis = buildSensitivityAxis(baseCase.discountRate, settings.waccStep, settings.steps);
  const growthAxis = buildSensitivityAxis(
    baseCase.terminalGrowthRate,
    settings.growthStep,
    settings.steps
  );

  let invalidCellCount = 0;
  const valueMatrix = waccAxis.map((discountRate) =>
    growthAxis.map((terminalGrowthRate) => {
      try {
        return valueCashFlows(bundle, baseCase.projectedCashFlows, {
          discountRate,
          terminalGrowthRate,
        }).intrinsicValuePerShare;
      } catch (err) {
        if (err instanceof DomainError) {
          invalidCellCount += 1;
          return null;
        }
        throw err;
      }
    })
  );

  if (invalidCellCount > 0) {
    logger.warn(
      { symbol: bundle.symbol, invalidCellCount },
      'Sensitivity cells with discount rate <= terminal growth were left empty'
    );
  }

  return {
    waccAxis,
    growthAxis,
    valueMatrix,
    baseCaseValue: valueMatrix[settings.steps][settings.steps],
    invalidCellCount,
  };
}
