/**
 * Input Quality Assessment
 *
 * Scores how far a FinancialInputBundle can be trusted before any valuation
 * runs. The score is a heuristic: independent deductions from 1.0, clamped
 * to [0, 1]. Low scores are surfaced as warnings, never rejected.
 */

import { DEFAULT_VALUATION_CONFIG } from '@/core/config';
import { hoursSince, parseTimestamp } from '@/core/time';
import { clamp, coefficientOfVariation } from './stats';
import type {
  FinancialInputBundle,
  QualityAssessment,
  QualityGrade,
  QualityIssue,
  QualityWarning,
} from './types';

// ============================================================================
// Constants
// ============================================================================

const DEDUCTIONS: Record<QualityIssue, number> = {
  non_positive_revenue: 0.2,
  non_positive_operating_cash_flow: 0.2,
  high_revenue_volatility: 0.1,
  invalid_capitalization: 0.3,
};

export const DEFAULT_VOLATILITY_THRESHOLD = DEFAULT_VALUATION_CONFIG.quality.volatilityThreshold;

const GRADE_THRESHOLDS: Array<[number, QualityGrade]> = [
  [0.9, 'excellent'],
  [0.75, 'good'],
  [0.6, 'fair'],
  [0.4, 'poor'],
];

// Age (hours) → freshness score
const FRESHNESS_BANDS: Array<[number, number]> = [
  [1, 1.0],
  [6, 0.9],
  [24, 0.7],
  [72, 0.5],
];
const FRESHNESS_FLOOR = 0.3;

// ============================================================================
// Quality Score
// ============================================================================

export function assessQuality(
  bundle: FinancialInputBundle,
  volatilityThreshold: number = DEFAULT_VOLATILITY_THRESHOLD
): QualityAssessment {
  const issues: QualityIssue[] = [];

  if (bundle.revenueHistory.some((v) => v <= 0)) {
    issues.push('non_positive_revenue');
  }
  if (bundle.operatingCashFlowHistory.some((v) => v <= 0)) {
    issues.push('non_positive_operating_cash_flow');
  }

  const cv = coefficientOfVariation(bundle.revenueHistory);
  if (cv !== null && cv > volatilityThreshold) {
    issues.push('high_revenue_volatility');
  }

  if (bundle.marketCap <= 0 || bundle.sharesOutstanding <= 0) {
    issues.push('invalid_capitalization');
  }

  const raw = issues.reduce((score, issue) => score - DEDUCTIONS[issue], 1.0);
  const score = clamp(raw, 0, 1);

  return {
    score,
    grade: getQualityGrade(score),
    issues,
    revenueCoefficientOfVariation: cv,
  };
}

export function getQualityGrade(score: number): QualityGrade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (score >= threshold) return grade;
  }
  return 'very_poor';
}

// ============================================================================
// Freshness
// ============================================================================

export interface FreshnessAssessment {
  score: number;
  ageHours: number | null;
}

export function assessDataFreshness(asOf: string | undefined, now: Date): FreshnessAssessment {
  const snapshot = asOf ? parseTimestamp(asOf) : null;
  if (!snapshot) {
    return { score: 0, ageHours: null };
  }

  const ageHours = hoursSince(snapshot, now);
  const band = FRESHNESS_BANDS.find(([maxHours]) => ageHours <= maxHours);
  return { score: band ? band[1] : FRESHNESS_FLOOR, ageHours };
}

// ============================================================================
// Warnings & Recommendations
// ============================================================================

export interface QualityWarningThresholds {
  warningThreshold: number;
  staleAfterHours: number;
}

export function buildQualityWarnings(
  quality: QualityAssessment,
  freshness: FreshnessAssessment,
  thresholds: QualityWarningThresholds
): QualityWarning[] {
  const warnings: QualityWarning[] = [];

  if (quality.score < thresholds.warningThreshold) {
    warnings.push({
      code: 'low_quality_score',
      message: `Quality score ${quality.score.toFixed(2)} is below ${thresholds.warningThreshold}`,
      value: quality.score,
      threshold: thresholds.warningThreshold,
    });
  }

  if (freshness.ageHours === null) {
    warnings.push({
      code: 'missing_timestamp',
      message: 'Input bundle has no usable asOf timestamp',
      value: 0,
      threshold: thresholds.staleAfterHours,
    });
  } else if (freshness.ageHours > thresholds.staleAfterHours) {
    warnings.push({
      code: 'stale_data',
      message: `Input data is ${freshness.ageHours.toFixed(1)} hours old`,
      value: freshness.ageHours,
      threshold: thresholds.staleAfterHours,
    });
  }

  return warnings;
}

const ISSUE_RECOMMENDATIONS: Record<QualityIssue, string> = {
  non_positive_revenue: 'Check revenue history for missing or restated periods',
  non_positive_operating_cash_flow: 'Check operating cash flow history for loss years before relying on margins',
  high_revenue_volatility: 'Revenue is volatile; weigh the worst case more heavily',
  invalid_capitalization: 'Market cap or share count is missing; per-share values are unreliable',
};

export function generateQualityRecommendations(
  quality: QualityAssessment,
  freshness: FreshnessAssessment
): string[] {
  const recommendations = quality.issues.map((issue) => ISSUE_RECOMMENDATIONS[issue]);

  if (freshness.score < 0.7) {
    recommendations.push('Refresh the input data to improve freshness');
  }
  if (quality.score < 0.6) {
    recommendations.push('Consider cross-checking the inputs against an alternative data source');
  }

  return recommendations;
}
