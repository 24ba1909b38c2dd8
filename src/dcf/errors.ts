import type { ScenarioName } from './types';

/**
 * Malformed bundle or assumptions. Raised before any calculation starts.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`${subject} validation failed: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export interface DomainErrorDetails {
  scenario: ScenarioName | null;
  discountRate: number;
  terminalGrowthRate: number;
}

/**
 * Discount rate does not exceed terminal growth, so the Gordon model has no
 * finite positive solution.
 */
export class DomainError extends Error {
  readonly scenario: ScenarioName | null;
  readonly discountRate: number;
  readonly terminalGrowthRate: number;

  constructor(details: DomainErrorDetails) {
    const prefix = details.scenario ? `Scenario ${details.scenario}: ` : '';
    super(
      `${prefix}discount rate (${details.discountRate}) must exceed terminal growth rate (${details.terminalGrowthRate})`
    );
    this.name = 'DomainError';
    this.scenario = details.scenario;
    this.discountRate = details.discountRate;
    this.terminalGrowthRate = details.terminalGrowthRate;
  }
}
