/**
 * Ajv validation instance with schema validators
 * Input shapes are defined by the JSON schemas under schemas/
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { FinancialInputBundle, ScenarioAssumptionsInput } from '@/dcf/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date-time for FinancialInputBundle.asOf
addFormats(ajv);

// Lazy-loaded validators
let bundleValidator: ValidateFunction<FinancialInputBundle> | null = null;
let assumptionsValidator: ValidateFunction<ScenarioAssumptionsInput> | null = null;

export function getBundleValidator(): ValidateFunction<FinancialInputBundle> {
  if (!bundleValidator) {
    bundleValidator = ajv.compile<FinancialInputBundle>(loadSchema('financial_input_bundle.v1'));
  }
  return bundleValidator;
}

export function getAssumptionsValidator(): ValidateFunction<ScenarioAssumptionsInput> {
  if (!assumptionsValidator) {
    assumptionsValidator = ajv.compile<ScenarioAssumptionsInput>(
      loadSchema('scenario_assumptions.v1')
    );
  }
  return assumptionsValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateBundleShape(data: unknown): ValidationResult<FinancialInputBundle> {
  return runValidator(getBundleValidator(), data);
}

export function validateAssumptionsShape(data: unknown): ValidationResult<ScenarioAssumptionsInput> {
  return runValidator(getAssumptionsValidator(), data);
}
