export {
  DCFCalculationEngine,
  calculateComprehensiveDcf,
  calculateScenarioDcf,
  type ComprehensiveDcfOptions,
  type DCFEngineOptions,
} from './dcf/engine';
export { DomainError, ValidationError } from './dcf/errors';
export {
  assessQuality,
  assessDataFreshness,
  getQualityGrade,
  buildQualityWarnings,
  generateQualityRecommendations,
} from './dcf/quality';
export { calculateWacc, calculateWaccBreakdown } from './dcf/wacc';
export {
  projectRevenue,
  projectFreeCashFlows,
  calculateHistoricalGrowthRates,
  calculateHistoricalFcf,
  calculateFcfMargin,
} from './dcf/projections';
export { calculateTerminalValue } from './dcf/terminal_value';
export { discountCashFlows } from './dcf/present_value';
export { runScenario } from './dcf/scenario_runner';
export { buildCanonicalScenarios, buildScenarioAssumptions } from './dcf/scenarios';
export { generateSensitivityGrid, buildSensitivityAxis } from './dcf/sensitivity';
export { formatReport, summarizeReport } from './dcf/presentation';
export { getValuationConfig, resetValuationConfig, type ValuationConfig } from './core/config';
export type * from './dcf/types';
export { CANONICAL_SCENARIOS } from './dcf/types';
