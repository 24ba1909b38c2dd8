import { describe, expect, it } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DCFCalculationEngine } from '@/dcf/engine';
import { DEFAULT_VALUATION_CONFIG, type ValuationConfig } from '@/core/config';
import { DomainError, ValidationError } from '@/dcf/errors';
import { validateFinancialInputBundle } from '@/dcf/validation';
import { calculateWacc } from '@/dcf/wacc';
import { makeBundle } from '../fixtures/bundles';

const NOW = new Date('2026-10-19T12:00:00Z');

function makeEngine(config: ValuationConfig = DEFAULT_VALUATION_CONFIG): DCFCalculationEngine {
  return new DCFCalculationEngine({ config, clock: () => NOW });
}

function withScenarioOverride(
  name: keyof ValuationConfig['scenarios'],
  overrides: Partial<ValuationConfig['scenarios']['base_case']>
): ValuationConfig {
  return {
    ...DEFAULT_VALUATION_CONFIG,
    scenarios: {
      ...DEFAULT_VALUATION_CONFIG.scenarios,
      [name]: { ...DEFAULT_VALUATION_CONFIG.scenarios[name], ...overrides },
    },
  };
}

describe('DCFCalculationEngine', () => {
  it('assembles a report with all canonical scenarios', async () => {
    const bundle = makeBundle({ asOf: '2026-10-19T10:00:00Z' });
    const report = await makeEngine().calculateComprehensiveDcf(bundle);
    const baseWacc = calculateWacc(bundle);

    expect(report.symbol).toBe('TEST');
    expect(report.currentPrice).toBe(100);
    expect(Object.keys(report.scenarios)).toEqual(['worst_case', 'base_case', 'best_case']);
    expect(report.baseWacc).toBe(baseWacc);
    expect(report.scenarios.base_case.discountRate).toBe(baseWacc);
    expect(report.scenarios.worst_case.discountRate).toBeCloseTo(baseWacc + 0.02, 12);
    expect(report.scenarios.best_case.discountRate).toBeCloseTo(baseWacc - 0.01, 12);
    expect(report.qualityScore).toBe(1);
    expect(report.qualityGrade).toBe('excellent');
    expect(report.dataFreshnessScore).toBe(0.9);
    expect(report.qualityWarnings).toEqual([]);
    expect(report.timestamp).toBe('2026-10-19T12:00:00.000Z');
    expect(report.inputHash).toMatch(/^[0-9a-f]{16}$/);
  });

  it('keeps discount rate above terminal growth in every scenario', async () => {
    const report = await makeEngine().calculateComprehensiveDcf(makeBundle());
    for (const result of Object.values(report.scenarios)) {
      expect(result.discountRate).toBeGreaterThan(result.terminalGrowthRate);
    }
  });

  it('orders intrinsic values worst <= base <= best', async () => {
    const fixture = validateFinancialInputBundle(
      JSON.parse(readFileSync(join(process.cwd(), 'tests/fixtures/sample_bundle.json'), 'utf-8'))
    );
    for (const bundle of [makeBundle(), fixture]) {
      const { scenarios } = await makeEngine().calculateComprehensiveDcf(bundle);
      expect(scenarios.worst_case.intrinsicValuePerShare).toBeLessThanOrEqual(
        scenarios.base_case.intrinsicValuePerShare
      );
      expect(scenarios.base_case.intrinsicValuePerShare).toBeLessThanOrEqual(
        scenarios.best_case.intrinsicValuePerShare
      );
    }
  });

  it('centres the sensitivity grid on the base case', async () => {
    const report = await makeEngine().calculateComprehensiveDcf(makeBundle());
    expect(report.sensitivity.baseCaseValue).toBe(report.scenarios.base_case.intrinsicValuePerShare);
    expect(report.sensitivity.waccAxis[4]).toBe(report.scenarios.base_case.discountRate);
    expect(report.sensitivity.growthAxis[4]).toBe(0.025);
  });

  it('is idempotent for identical inputs', async () => {
    const engine = makeEngine();
    const first = await engine.calculateComprehensiveDcf(makeBundle());
    const second = await engine.calculateComprehensiveDcf(makeBundle());

    expect(second).toEqual(first);
    expect(second.scenarios.base_case.intrinsicValuePerShare).toBe(
      first.scenarios.base_case.intrinsicValuePerShare
    );
    expect(second.sensitivity.valueMatrix).toEqual(first.sensitivity.valueMatrix);
  });

  it('values a custom scenario alongside the canonical ones', async () => {
    const report = await makeEngine().calculateComprehensiveDcf(makeBundle(), {
      customScenario: {
        name: 'custom',
        revenueGrowthRate: 0.1,
        marginAdjustmentFactor: 1,
        discountRate: 0.09,
        terminalGrowthRate: 0.02,
        confidenceLevel: 0.5,
      },
    });

    expect(report.scenarios.custom?.scenario).toBe('custom');
    expect(report.scenarios.custom?.discountRate).toBe(0.09);
    expect(report.scenarios.custom?.projectedCashFlows).toHaveLength(5);
  });

  it('surfaces quality warnings without rejecting the request', async () => {
    const report = await makeEngine().calculateComprehensiveDcf(
      makeBundle({
        revenueHistory: [100, 500, 100, 500, 100],
        operatingCashFlowHistory: [200, 220, -10, 260, 280],
        marketCap: 0,
        totalDebt: 0,
      })
    );

    expect(report.qualityScore).toBeCloseTo(0.4, 10);
    expect(report.dataFreshnessScore).toBe(0);
    expect(report.qualityWarnings.map((w) => w.code)).toEqual(['low_quality_score', 'missing_timestamp']);
    expect(report.recommendations.length).toBeGreaterThan(0);
  });

  it('fails the whole request and names the offending scenario', async () => {
    const engine = makeEngine(withScenarioOverride('worst_case', { terminalGrowthRate: 0.5 }));
    const request = engine.calculateComprehensiveDcf(makeBundle());

    await expect(request).rejects.toBeInstanceOf(DomainError);
    await expect(request).rejects.toMatchObject({ scenario: 'worst_case', terminalGrowthRate: 0.5 });
    await expect(request).rejects.toThrow(/^Scenario worst_case: /);
  });

  it('rejects malformed bundles before calculating', async () => {
    const request = makeEngine().calculateComprehensiveDcf(
      makeBundle({ capexHistory: [50, 55, 60, 65] })
    );
    await expect(request).rejects.toBeInstanceOf(ValidationError);
    await expect(request).rejects.toMatchObject({
      issues: ['/capexHistory: length 4 does not match revenueHistory length 5'],
    });
  });

  it('rejects malformed custom assumptions', async () => {
    const request = makeEngine().calculateComprehensiveDcf(makeBundle(), {
      customScenario: {
        name: 'custom',
        revenueGrowthRate: 0.1,
        marginAdjustmentFactor: 1,
        discountRate: 0.09,
        terminalGrowthRate: 0.02,
        confidenceLevel: 2,
      },
    });
    await expect(request).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('calculateScenarioDcf', () => {
  it('fills in the default projection horizon', () => {
    const result = makeEngine().calculateScenarioDcf(makeBundle(), {
      name: 'custom',
      revenueGrowthRate: 0.05,
      marginAdjustmentFactor: 1,
      discountRate: 0.1,
      terminalGrowthRate: 0.025,
      confidenceLevel: 0.5,
    });

    expect(result.assumptions.projectionYears).toBe(5);
    expect(result.presentValues).toHaveLength(6);
  });

  it('raises DomainError for r <= g', () => {
    expect(() =>
      makeEngine().calculateScenarioDcf(makeBundle(), {
        name: 'custom',
        revenueGrowthRate: 0.05,
        marginAdjustmentFactor: 1,
        discountRate: 0.08,
        terminalGrowthRate: 0.1,
        confidenceLevel: 0.5,
      })
    ).toThrow(DomainError);
  });
});
