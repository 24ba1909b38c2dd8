/**
 * DCF debug run
 * Loads a FinancialInputBundle JSON file and prints the full analysis.
 *
 * Usage: npx tsx scripts/debug-dcf.ts [path/to/bundle.json]
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { DCFCalculationEngine } from '../src/dcf/engine';
import { DomainError, ValidationError } from '../src/dcf/errors';
import { formatReport } from '../src/dcf/presentation';
import { validateFinancialInputBundle } from '../src/dcf/validation';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('debug_dcf');

async function main() {
  const bundlePath = resolve(process.cwd(), process.argv[2] ?? 'tests/fixtures/sample_bundle.json');
  const bundle = validateFinancialInputBundle(JSON.parse(readFileSync(bundlePath, 'utf-8')));

  const engine = new DCFCalculationEngine();
  const report = await engine.calculateComprehensiveDcf(bundle);
  console.log(formatReport(report));
}

main().catch((err: unknown) => {
  if (err instanceof ValidationError) {
    logger.error({ issues: err.issues }, err.message);
  } else if (err instanceof DomainError) {
    logger.error({ scenario: err.scenario }, err.message);
  } else {
    logger.error({ err }, 'DCF debug run failed');
  }
  process.exitCode = 1;
});
