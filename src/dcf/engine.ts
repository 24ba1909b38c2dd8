/**
 * DCF Calculation Engine
 * Orchestrates validation, quality assessment, WACC, the three canonical
 * scenarios (plus an optional custom one) and the sensitivity grid.
 *
 * The engine holds configuration only; nothing is shared between requests.
 * Any scenario failure rejects the whole request: partial reports are never
 * returned.
 */

import { getValuationConfig, type ValuationConfig } from '@/core/config';
import { formatTimestamp, systemClock, type Clock } from '@/core/time';
import { contentHashShort } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import { DomainError } from './errors';
import type { ProjectionSettings } from './projections';
import {
  assessDataFreshness,
  assessQuality,
  buildQualityWarnings,
  generateQualityRecommendations,
} from './quality';
import { runScenario } from './scenario_runner';
import { buildCanonicalScenarios } from './scenarios';
import { generateSensitivityGrid } from './sensitivity';
import type {
  DCFAnalysisReport,
  FinancialInputBundle,
  ScenarioAssumptions,
  ScenarioAssumptionsInput,
  ScenarioResult,
} from './types';
import { validateFinancialInputBundle, validateScenarioAssumptions } from './validation';
import { calculateWaccBreakdown } from './wacc';

const logger = createChildLogger('dcf_engine');

export interface DCFEngineOptions {
  config?: ValuationConfig;
  /** Source of the report timestamp and the freshness reference time */
  clock?: Clock;
}

export interface ComprehensiveDcfOptions {
  /** Valued alongside the canonical scenarios and reported under `custom` */
  customScenario?: ScenarioAssumptionsInput;
}

export class DCFCalculationEngine {
  private readonly config: ValuationConfig;
  private readonly clock: Clock;

  constructor(options: DCFEngineOptions = {}) {
    this.config = options.config ?? getValuationConfig();
    this.clock = options.clock ?? systemClock;
  }

  private get projectionSettings(): ProjectionSettings {
    return this.config.projection;
  }

  async calculateComprehensiveDcf(
    input: FinancialInputBundle,
    options: ComprehensiveDcfOptions = {}
  ): Promise<DCFAnalysisReport> {
    const bundle = validateFinancialInputBundle(input);
    const customAssumptions = options.customScenario
      ? { ...this.resolveAssumptions(options.customScenario), name: 'custom' as const }
      : null;

    const quality = assessQuality(bundle, this.config.quality.volatilityThreshold);
    const wacc = calculateWaccBreakdown(bundle, this.config.wacc.debtSpread);
    logger.debug(
      { symbol: bundle.symbol, qualityScore: quality.score, wacc: wacc.wacc },
      'Inputs assessed'
    );

    const scenarios = buildCanonicalScenarios(wacc.wacc, this.config.scenarios);
    const [worstCase, baseCase, bestCase, custom] = await Promise.all([
      this.runScenarioTask(bundle, scenarios.worst_case),
      this.runScenarioTask(bundle, scenarios.base_case),
      this.runScenarioTask(bundle, scenarios.best_case),
      customAssumptions ? this.runScenarioTask(bundle, customAssumptions) : Promise.resolve(null),
    ]);

    const sensitivity = generateSensitivityGrid(bundle, baseCase, this.config.sensitivity);

    const now = this.clock();
    const freshness = assessDataFreshness(bundle.asOf, now);
    const qualityWarnings = buildQualityWarnings(quality, freshness, this.config.quality);
    if (qualityWarnings.length > 0) {
      logger.warn(
        { symbol: bundle.symbol, warnings: qualityWarnings.map((w) => w.code) },
        'Valuation inputs raised quality warnings'
      );
    }

    logger.info(
      {
        symbol: bundle.symbol,
        worst: worstCase.intrinsicValuePerShare,
        base: baseCase.intrinsicValuePerShare,
        best: bestCase.intrinsicValuePerShare,
      },
      'DCF analysis completed'
    );

    return {
      symbol: bundle.symbol,
      currentPrice: bundle.currentPrice,
      scenarios: {
        worst_case: worstCase,
        base_case: baseCase,
        best_case: bestCase,
        ...(custom ? { custom } : {}),
      },
      sensitivity,
      baseWacc: wacc.wacc,
      qualityScore: quality.score,
      qualityGrade: quality.grade,
      qualityWarnings,
      recommendations: generateQualityRecommendations(quality, freshness),
      dataFreshnessScore: freshness.score,
      inputHash: contentHashShort(bundle),
      timestamp: formatTimestamp(now),
    };
  }

  /** Ad-hoc valuation of a single set of assumptions. */
  calculateScenarioDcf(input: FinancialInputBundle, assumptions: ScenarioAssumptionsInput): ScenarioResult {
    const bundle = validateFinancialInputBundle(input);
    return runScenario(bundle, this.resolveAssumptions(assumptions), this.projectionSettings);
  }

  private resolveAssumptions(assumptions: ScenarioAssumptionsInput): ScenarioAssumptions {
    return validateScenarioAssumptions(
      assumptions,
      this.config.projection.defaultProjectionYears
    );
  }

  private async runScenarioTask(
    bundle: FinancialInputBundle,
    assumptions: ScenarioAssumptions
  ): Promise<ScenarioResult> {
    try {
      return runScenario(bundle, assumptions, this.projectionSettings);
    } catch (err) {
      if (err instanceof DomainError) {
        logger.error({ symbol: bundle.symbol, scenario: assumptions.name }, err.message);
      }
      throw err;
    }
  }
}

let defaultEngine: DCFCalculationEngine | null = null;

function getDefaultEngine(): DCFCalculationEngine {
  if (!defaultEngine) {
    defaultEngine = new DCFCalculationEngine();
  }
  return defaultEngine;
}

export function calculateComprehensiveDcf(
  bundle: FinancialInputBundle,
  options: ComprehensiveDcfOptions = {}
): Promise<DCFAnalysisReport> {
  return getDefaultEngine().calculateComprehensiveDcf(bundle, options);
}

export function calculateScenarioDcf(
  bundle: FinancialInputBundle,
  assumptions: ScenarioAssumptionsInput
): ScenarioResult {
  return getDefaultEngine().calculateScenarioDcf(bundle, assumptions);
}

export function resetDefaultEngine(): void {
  defaultEngine = null;
}
