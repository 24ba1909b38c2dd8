/**
 * Valuation configuration loaded from config/valuation.json with built-in defaults.
 *
 * The file is snake_case on disk; every field is optional and falls back to
 * DEFAULT_VALUATION_CONFIG. VALUATION_CONFIG may point at another file
 * (absolute, or relative to the working directory).
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { loadEnvConfig } from './env';
import type { CanonicalScenarioName } from '@/dcf/types';

export interface ScenarioProfile {
  revenueGrowthRate: number;
  marginAdjustmentFactor: number;
  /** Added to the base WACC to obtain this scenario's discount rate */
  waccOffset: number;
  terminalGrowthRate: number;
  confidenceLevel: number;
  projectionYears: number;
}

export interface ValuationConfig {
  wacc: {
    debtSpread: number;
  };
  projection: {
    historicalGrowthWeight: number;
    scenarioGrowthWeight: number;
    growthDecay: number;
    fcfLookbackYears: number;
    defaultProjectionYears: number;
  };
  scenarios: Record<CanonicalScenarioName, ScenarioProfile>;
  sensitivity: {
    steps: number;
    waccStep: number;
    growthStep: number;
  };
  quality: {
    warningThreshold: number;
    volatilityThreshold: number;
    staleAfterHours: number;
  };
}

export const DEFAULT_VALUATION_CONFIG: ValuationConfig = {
  wacc: {
    debtSpread: 0.02, // flat credit spread over the risk-free rate
  },
  projection: {
    historicalGrowthWeight: 0.3,
    scenarioGrowthWeight: 0.7,
    growthDecay: 0.8,
    fcfLookbackYears: 3,
    defaultProjectionYears: 5,
  },
  scenarios: {
    worst_case: {
      revenueGrowthRate: 0.02,
      marginAdjustmentFactor: 0.85,
      waccOffset: 0.02,
      terminalGrowthRate: 0.02,
      confidenceLevel: 0.2,
      projectionYears: 5,
    },
    base_case: {
      revenueGrowthRate: 0.05,
      marginAdjustmentFactor: 1.0,
      waccOffset: 0,
      terminalGrowthRate: 0.025,
      confidenceLevel: 0.6,
      projectionYears: 5,
    },
    best_case: {
      revenueGrowthRate: 0.08,
      marginAdjustmentFactor: 1.15,
      waccOffset: -0.01,
      terminalGrowthRate: 0.03,
      confidenceLevel: 0.2,
      projectionYears: 5,
    },
  },
  sensitivity: {
    steps: 4,
    waccStep: 0.005,
    growthStep: 0.0025,
  },
  quality: {
    warningThreshold: 0.5,
    volatilityThreshold: 0.3,
    staleAfterHours: 72,
  },
};

type RawRecord = Record<string, unknown>;

function asRecord(raw: unknown): RawRecord {
  return raw && typeof raw === 'object' && !Array.isArray(raw) ? (raw as RawRecord) : {};
}

function num(raw: unknown, fallback: number): number {
  return typeof raw === 'number' && Number.isFinite(raw) ? raw : fallback;
}

function int(raw: unknown, fallback: number, min: number): number {
  return typeof raw === 'number' && Number.isInteger(raw) && raw >= min ? raw : fallback;
}

function normalizeScenario(raw: unknown, defaults: ScenarioProfile): ScenarioProfile {
  const parsed = asRecord(raw);
  return {
    revenueGrowthRate: num(parsed.revenue_growth_rate, defaults.revenueGrowthRate),
    marginAdjustmentFactor: num(parsed.margin_adjustment_factor, defaults.marginAdjustmentFactor),
    waccOffset: num(parsed.wacc_offset, defaults.waccOffset),
    terminalGrowthRate: num(parsed.terminal_growth_rate, defaults.terminalGrowthRate),
    confidenceLevel: num(parsed.confidence_level, defaults.confidenceLevel),
    projectionYears: int(parsed.projection_years, defaults.projectionYears, 1),
  };
}

export function normalizeValuationConfig(raw: unknown): ValuationConfig {
  const defaults = DEFAULT_VALUATION_CONFIG;
  const parsed = asRecord(raw);
  const wacc = asRecord(parsed.wacc);
  const projection = asRecord(parsed.projection);
  const scenarios = asRecord(parsed.scenarios);
  const sensitivity = asRecord(parsed.sensitivity);
  const quality = asRecord(parsed.quality);

  return {
    wacc: {
      debtSpread: num(wacc.debt_spread, defaults.wacc.debtSpread),
    },
    projection: {
      historicalGrowthWeight: num(
        projection.historical_growth_weight,
        defaults.projection.historicalGrowthWeight
      ),
      scenarioGrowthWeight: num(
        projection.scenario_growth_weight,
        defaults.projection.scenarioGrowthWeight
      ),
      growthDecay: num(projection.growth_decay, defaults.projection.growthDecay),
      fcfLookbackYears: int(projection.fcf_lookback_years, defaults.projection.fcfLookbackYears, 1),
      defaultProjectionYears: int(
        projection.default_projection_years,
        defaults.projection.defaultProjectionYears,
        1
      ),
    },
    scenarios: {
      worst_case: normalizeScenario(scenarios.worst_case, defaults.scenarios.worst_case),
      base_case: normalizeScenario(scenarios.base_case, defaults.scenarios.base_case),
      best_case: normalizeScenario(scenarios.best_case, defaults.scenarios.best_case),
    },
    sensitivity: {
      steps: int(sensitivity.steps, defaults.sensitivity.steps, 0),
      waccStep: num(sensitivity.wacc_step, defaults.sensitivity.waccStep),
      growthStep: num(sensitivity.growth_step, defaults.sensitivity.growthStep),
    },
    quality: {
      warningThreshold: num(quality.warning_threshold, defaults.quality.warningThreshold),
      volatilityThreshold: num(quality.volatility_threshold, defaults.quality.volatilityThreshold),
      staleAfterHours: num(quality.stale_after_hours, defaults.quality.staleAfterHours),
    },
  };
}

function resolveConfigPath(projectRoot: string): string {
  const envPath = loadEnvConfig().valuationConfigPath;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'valuation.json');
}

let cachedConfig: ValuationConfig | null = null;

export function loadValuationConfig(): ValuationConfig {
  const configPath = resolveConfigPath(process.cwd());
  if (!existsSync(configPath)) {
    return DEFAULT_VALUATION_CONFIG;
  }
  const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
  return normalizeValuationConfig(raw);
}

export function getValuationConfig(): ValuationConfig {
  if (!cachedConfig) {
    cachedConfig = loadValuationConfig();
  }
  return cachedConfig;
}

export function resetValuationConfig(): void {
  cachedConfig = null;
}
