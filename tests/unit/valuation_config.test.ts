import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_VALUATION_CONFIG,
  getValuationConfig,
  normalizeValuationConfig,
  resetValuationConfig,
} from '@/core/config';
import { DEFAULT_PROJECTION_SETTINGS } from '@/dcf/projections';
import { DEFAULT_VOLATILITY_THRESHOLD } from '@/dcf/quality';
import { DEFAULT_SENSITIVITY_SETTINGS } from '@/dcf/sensitivity';
import { DEFAULT_DEBT_SPREAD } from '@/dcf/wacc';

let originalCwd: string;
let tempDir: string;
let originalEnv: string | undefined;

describe('valuation config loader', () => {
  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = mkdtempSync(join(tmpdir(), 'valuation-config-'));
    process.chdir(tempDir);
    originalEnv = process.env.VALUATION_CONFIG;
    delete process.env.VALUATION_CONFIG;
    resetValuationConfig();
  });

  afterEach(() => {
    resetValuationConfig();
    process.chdir(originalCwd);
    rmSync(tempDir, { recursive: true, force: true });
    if (originalEnv === undefined) {
      delete process.env.VALUATION_CONFIG;
    } else {
      process.env.VALUATION_CONFIG = originalEnv;
    }
  });

  it('falls back to defaults when no config file exists', () => {
    expect(getValuationConfig()).toEqual(DEFAULT_VALUATION_CONFIG);
  });

  it('merges config/valuation.json over the defaults', () => {
    mkdirSync('config', { recursive: true });
    writeFileSync(
      join('config', 'valuation.json'),
      JSON.stringify({
        wacc: { debt_spread: 0.03 },
        scenarios: { worst_case: { wacc_offset: 0.04 } },
        sensitivity: { steps: 2 },
      })
    );

    const config = getValuationConfig();
    expect(config.wacc.debtSpread).toBe(0.03);
    expect(config.scenarios.worst_case.waccOffset).toBe(0.04);
    expect(config.scenarios.worst_case.revenueGrowthRate).toBe(0.02);
    expect(config.scenarios.base_case).toEqual(DEFAULT_VALUATION_CONFIG.scenarios.base_case);
    expect(config.sensitivity).toEqual({ steps: 2, waccStep: 0.005, growthStep: 0.0025 });
  });

  it('reads the file named by VALUATION_CONFIG', () => {
    writeFileSync('alt.json', JSON.stringify({ quality: { warning_threshold: 0.7 } }));
    process.env.VALUATION_CONFIG = 'alt.json';

    expect(getValuationConfig().quality.warningThreshold).toBe(0.7);
  });

  it('caches until reset', () => {
    const first = getValuationConfig();
    mkdirSync('config', { recursive: true });
    writeFileSync(join('config', 'valuation.json'), JSON.stringify({ wacc: { debt_spread: 0.05 } }));

    expect(getValuationConfig()).toBe(first);
    resetValuationConfig();
    expect(getValuationConfig().wacc.debtSpread).toBe(0.05);
  });
});

describe('normalizeValuationConfig', () => {
  it('ignores values of the wrong type', () => {
    const config = normalizeValuationConfig({
      projection: { growth_decay: 'fast', default_projection_years: 0, fcf_lookback_years: 4 },
      scenarios: { best_case: { projection_years: 7.5, confidence_level: 0.3 } },
    });

    expect(config.projection.growthDecay).toBe(0.8);
    expect(config.projection.defaultProjectionYears).toBe(5);
    expect(config.projection.fcfLookbackYears).toBe(4);
    expect(config.scenarios.best_case.projectionYears).toBe(5);
    expect(config.scenarios.best_case.confidenceLevel).toBe(0.3);
  });

  it('treats a non-object as empty', () => {
    expect(normalizeValuationConfig(null)).toEqual(DEFAULT_VALUATION_CONFIG);
  });
});

describe('module defaults', () => {
  it('come from DEFAULT_VALUATION_CONFIG', () => {
    expect(DEFAULT_PROJECTION_SETTINGS).toBe(DEFAULT_VALUATION_CONFIG.projection);
    expect(DEFAULT_SENSITIVITY_SETTINGS).toBe(DEFAULT_VALUATION_CONFIG.sensitivity);
    expect(DEFAULT_DEBT_SPREAD).toBe(DEFAULT_VALUATION_CONFIG.wacc.debtSpread);
    expect(DEFAULT_VOLATILITY_THRESHOLD).toBe(DEFAULT_VALUATION_CONFIG.quality.volatilityThreshold);
  });
});
