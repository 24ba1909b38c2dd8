/**
 * Input validation for the DCF engine.
 *
 * Shape and ranges come from the JSON schemas; the checks here cover what a
 * schema cannot express (aligned history lengths, finite values).
 */

import { validateAssumptionsShape, validateBundleShape } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { ValidationError } from './errors';
import type { FinancialInputBundle, ScenarioAssumptions } from './types';

const logger = createChildLogger('dcf_validation');

const HISTORY_FIELDS = [
  'revenueHistory',
  'operatingCashFlowHistory',
  'capexHistory',
  'workingCapitalChangeHistory',
] as const;

export const MIN_HISTORY_YEARS = 3;

export function checkBundleConsistency(bundle: FinancialInputBundle): string[] {
  const issues: string[] = [];
  const expectedLength = bundle.revenueHistory.length;

  for (const field of HISTORY_FIELDS) {
    const series = bundle[field];
    if (series.length < MIN_HISTORY_YEARS) {
      issues.push(`/${field}: needs at least ${MIN_HISTORY_YEARS} years, got ${series.length}`);
    }
    if (series.length !== expectedLength) {
      issues.push(
        `/${field}: length ${series.length} does not match revenueHistory length ${expectedLength}`
      );
    }
    series.forEach((value, index) => {
      if (!Number.isFinite(value)) {
        issues.push(`/${field}/${index}: must be a finite number`);
      }
    });
  }

  const scalars: Array<[string, number]> = [
    ['currentPrice', bundle.currentPrice],
    ['sharesOutstanding', bundle.sharesOutstanding],
    ['marketCap', bundle.marketCap],
    ['totalDebt', bundle.totalDebt],
    ['cashAndEquivalents', bundle.cashAndEquivalents],
    ['beta', bundle.beta],
    ['riskFreeRate', bundle.riskFreeRate],
    ['marketRiskPremium', bundle.marketRiskPremium],
    ['taxRate', bundle.taxRate],
  ];
  for (const [field, value] of scalars) {
    if (!Number.isFinite(value)) {
      issues.push(`/${field}: must be a finite number`);
    }
  }

  return issues;
}

export function validateFinancialInputBundle(data: unknown): FinancialInputBundle {
  const shape = validateBundleShape(data);
  if (!shape.valid) {
    logger.debug({ errors: shape.errors }, 'Bundle schema validation failed');
    throw new ValidationError('FinancialInputBundle', shape.errors);
  }

  const issues = checkBundleConsistency(shape.data);
  if (issues.length > 0) {
    logger.debug({ symbol: shape.data.symbol, issues }, 'Bundle consistency check failed');
    throw new ValidationError('FinancialInputBundle', issues);
  }

  return shape.data;
}

/**
 * Validates caller-supplied assumptions and fills in the projection horizon.
 * The discount/growth ordering is left to the calculation, which raises DomainError.
 */
export function validateScenarioAssumptions(
  data: unknown,
  defaultProjectionYears: number
): ScenarioAssumptions {
  const shape = validateAssumptionsShape(data);
  if (!shape.valid) {
    logger.debug({ errors: shape.errors }, 'Assumptions schema validation failed');
    throw new ValidationError('ScenarioAssumptions', shape.errors);
  }

  const input = shape.data;
  return {
    name: input.name,
    revenueGrowthRate: input.revenueGrowthRate,
    marginAdjustmentFactor: input.marginAdjustmentFactor,
    discountRate: input.discountRate,
    terminalGrowthRate: input.terminalGrowthRate,
    confidenceLevel: input.confidenceLevel,
    projectionYears: input.projectionYears ?? defaultProjectionYears,
  };
}
