/**
 * DCF value objects
 *
 * Everything here is created fresh per calculation request and never mutated
 * afterwards. Rates are decimal fractions (0.1 = 10%).
 */

// ============================================================================
// Inputs
// ============================================================================

export interface FinancialInputBundle {
  readonly symbol: string;
  readonly currentPrice: number;
  readonly sharesOutstanding: number;
  readonly marketCap: number;

  /** Chronological, oldest first. All four histories share one length. */
  readonly revenueHistory: ReadonlyArray<number>;
  readonly operatingCashFlowHistory: ReadonlyArray<number>;
  readonly capexHistory: ReadonlyArray<number>;
  readonly workingCapitalChangeHistory: ReadonlyArray<number>;

  readonly totalDebt: number;
  readonly cashAndEquivalents: number;

  readonly beta: number;
  readonly riskFreeRate: number;
  readonly marketRiskPremium: number;
  readonly taxRate: number;

  /** ISO-8601 timestamp of the upstream data snapshot */
  readonly asOf?: string;
}

export const CANONICAL_SCENARIOS = ['worst_case', 'base_case', 'best_case'] as const;

export type CanonicalScenarioName = (typeof CANONICAL_SCENARIOS)[number];
export type ScenarioName = CanonicalScenarioName | 'custom';

export interface ScenarioAssumptions {
  readonly name: ScenarioName;
  readonly revenueGrowthRate: number;
  readonly marginAdjustmentFactor: number;
  readonly discountRate: number;
  readonly terminalGrowthRate: number;
  readonly confidenceLevel: number;
  readonly projectionYears: number;
}

/** Assumptions as a caller may submit them: the horizon falls back to the configured default. */
export type ScenarioAssumptionsInput = Omit<ScenarioAssumptions, 'projectionYears'> & {
  readonly projectionYears?: number;
};

// ============================================================================
// Outputs
// ============================================================================

export interface WaccBreakdown {
  readonly costOfEquity: number;
  readonly costOfDebt: number;
  readonly afterTaxCostOfDebt: number;
  readonly equityWeight: number;
  readonly debtWeight: number;
  readonly wacc: number;
}

export interface ScenarioResult {
  readonly scenario: ScenarioName;
  readonly intrinsicValuePerShare: number;
  readonly totalEnterpriseValue: number;
  readonly equityValue: number;
  readonly terminalValue: number;
  readonly projectedRevenues: ReadonlyArray<number>;
  readonly projectedCashFlows: ReadonlyArray<number>;
  /** Discounted projections followed by the discounted terminal value. */
  readonly presentValues: ReadonlyArray<number>;
  readonly discountRate: number;
  readonly terminalGrowthRate: number;
  readonly upsideDownsidePercentage: number;
  readonly assumptions: ScenarioAssumptions;
}

export interface SensitivityGrid {
  readonly waccAxis: ReadonlyArray<number>;
  readonly growthAxis: ReadonlyArray<number>;
  /** valueMatrix[i][j] is the value per share at (waccAxis[i], growthAxis[j]); null when discount <= growth. */
  readonly valueMatrix: ReadonlyArray<ReadonlyArray<number | null>>;
  readonly baseCaseValue: number | null;
  readonly invalidCellCount: number;
}

export type QualityGrade = 'excellent' | 'good' | 'fair' | 'poor' | 'very_poor';

export type QualityIssue =
  | 'non_positive_revenue'
  | 'non_positive_operating_cash_flow'
  | 'high_revenue_volatility'
  | 'invalid_capitalization';

export interface QualityAssessment {
  readonly score: number;
  readonly grade: QualityGrade;
  readonly issues: ReadonlyArray<QualityIssue>;
  readonly revenueCoefficientOfVariation: number | null;
}

export interface QualityWarning {
  readonly code: 'low_quality_score' | 'stale_data' | 'missing_timestamp';
  readonly message: string;
  readonly value: number;
  readonly threshold: number;
}

export type ScenarioResultMap = {
  readonly [K in CanonicalScenarioName]: ScenarioResult;
} & {
  readonly custom?: ScenarioResult;
};

export interface DCFAnalysisReport {
  readonly symbol: string;
  readonly currentPrice: number;
  readonly scenarios: ScenarioResultMap;
  readonly sensitivity: SensitivityGrid;
  readonly baseWacc: number;
  readonly qualityScore: number;
  readonly qualityGrade: QualityGrade;
  readonly qualityWarnings: ReadonlyArray<QualityWarning>;
  readonly recommendations: ReadonlyArray<string>;
  readonly dataFreshnessScore: number;
  readonly inputHash: string;
  readonly timestamp: string;
}
