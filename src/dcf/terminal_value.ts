/**
 * Terminal value via the Gordon growth model:
 *
 *   TV = FCF_N × (1 + g) / (r − g)
 */

import { DomainError } from './errors';
import type { ScenarioName } from './types';

export function assertDiscountExceedsGrowth(
  discountRate: number,
  terminalGrowthRate: number,
  scenario: ScenarioName | null = null
): void {
  if (!(discountRate > terminalGrowthRate)) {
    throw new DomainError({ scenario, discountRate, terminalGrowthRate });
  }
}

export function calculateTerminalValue(
  finalCashFlow: number,
  discountRate: number,
  terminalGrowthRate: number,
  scenario: ScenarioName | null = null
): number {
  assertDiscountExceedsGrowth(discountRate, terminalGrowthRate, scenario);
  const terminalCashFlow = finalCashFlow * (1 + terminalGrowthRate);
  return terminalCashFlow / (discountRate - terminalGrowthRate);
}
