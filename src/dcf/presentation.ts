/**
 * Presentation helpers
 *
 * The engine keeps full double precision; rounding happens only here, at the
 * boundary where reports are displayed or exported.
 */

import { formatPercent } from '@/lib/percent';
import { CANONICAL_SCENARIOS, type DCFAnalysisReport, type ScenarioName, type ScenarioResult } from './types';

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export interface ScenarioSummaryRow {
  scenario: ScenarioName;
  intrinsicValuePerShare: number;
  upsidePct: number;
  discountRatePct: number;
  terminalGrowthPct: number;
  terminalValueShare: number;
}

/** Share of enterprise value that comes from the discounted terminal value. */
export function terminalValueShare(result: ScenarioResult): number {
  const discountedTerminal = result.presentValues[result.presentValues.length - 1] ?? 0;
  return result.totalEnterpriseValue !== 0 ? discountedTerminal / result.totalEnterpriseValue : 0;
}

export function summarizeScenario(result: ScenarioResult): ScenarioSummaryRow {
  return {
    scenario: result.scenario,
    intrinsicValuePerShare: roundTo(result.intrinsicValuePerShare, 2),
    upsidePct: roundTo(result.upsideDownsidePercentage, 1),
    discountRatePct: roundTo(result.discountRate * 100, 2),
    terminalGrowthPct: roundTo(result.terminalGrowthRate * 100, 2),
    terminalValueShare: roundTo(terminalValueShare(result), 3),
  };
}

export function summarizeReport(report: DCFAnalysisReport): ScenarioSummaryRow[] {
  const rows = CANONICAL_SCENARIOS.map((name) => summarizeScenario(report.scenarios[name]));
  if (report.scenarios.custom) {
    rows.push(summarizeScenario(report.scenarios.custom));
  }
  return rows;
}

function formatCell(value: number | null): string {
  return value === null ? '--' : value.toFixed(2);
}

/** Plain-text rendering for logs and the debug script. */
export function formatReport(report: DCFAnalysisReport): string {
  const lines: string[] = [];
  lines.push(`${report.symbol} @ ${report.currentPrice.toFixed(2)} (${report.timestamp})`);
  lines.push(
    `WACC ${formatPercent(report.baseWacc, { decimals: 2 })} | quality ${report.qualityScore.toFixed(2)} (${report.qualityGrade}) | freshness ${report.dataFreshnessScore.toFixed(2)}`
  );

  for (const row of summarizeReport(report)) {
    const upside = formatPercent(row.upsidePct, { scale: 'percent', signed: true });
    lines.push(
      `  ${row.scenario.padEnd(10)} ${row.intrinsicValuePerShare.toFixed(2).padStart(12)}  ${upside.padStart(9)}  r=${row.discountRatePct.toFixed(2)}% g=${row.terminalGrowthPct.toFixed(2)}%`
    );
  }

  const grid = report.sensitivity;
  lines.push('Sensitivity (rows: WACC, columns: terminal growth)');
  lines.push(
    '        ' + grid.growthAxis.map((g) => formatPercent(g, { decimals: 2 }).padStart(9)).join('')
  );
  grid.valueMatrix.forEach((row, i) => {
    const label = formatPercent(grid.waccAxis[i], { decimals: 2 }).padStart(7);
    lines.push(`${label} ` + row.map((cell) => formatCell(cell).padStart(9)).join(''));
  });

  for (const warning of report.qualityWarnings) {
    lines.push(`! ${warning.message}`);
  }
  for (const recommendation of report.recommendations) {
    lines.push(`- ${recommendation}`);
  }

  return lines.join('\n');
}
