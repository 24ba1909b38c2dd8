/**
 * Schema registry
 * The JSON schemas under schemas/ are bundled as modules, so validation never
 * depends on the working directory.
 */

import type { SchemaObject } from 'ajv';
import financialInputBundleSchema from '../../schemas/financial_input_bundle.v1.schema.json';
import scenarioAssumptionsSchema from '../../schemas/scenario_assumptions.v1.schema.json';

export type SchemaName = 'financial_input_bundle.v1' | 'scenario_assumptions.v1';

const SCHEMAS: Record<SchemaName, SchemaObject> = {
  'financial_input_bundle.v1': financialInputBundleSchema,
  'scenario_assumptions.v1': scenarioAssumptionsSchema,
};

export function loadSchema(schemaName: SchemaName): SchemaObject {
  return SCHEMAS[schemaName];
}
