/**
 * Present value discounting
 */

import { assertDiscountExceedsGrowth } from './terminal_value';
import type { ScenarioName } from './types';

export interface DiscountRates {
  discountRate: number;
  terminalGrowthRate: number;
}

export interface DiscountedCashFlows {
  /** One entry per projected year, followed by the discounted terminal value */
  presentValues: number[];
  discountedTerminalValue: number;
  total: number;
}

/**
 * Discounts year i (1-indexed) by (1 + r)^i and the terminal value by
 * (1 + r)^N, N being the number of projected years. The terminal value only
 * exists while r > g, so the same precondition applies here.
 */
export function discountCashFlows(
  cashFlows: ReadonlyArray<number>,
  terminalValue: number,
  rates: DiscountRates,
  scenario: ScenarioName | null = null
): DiscountedCashFlows {
  assertDiscountExceedsGrowth(rates.discountRate, rates.terminalGrowthRate, scenario);
  const base = 1 + rates.discountRate;

  const presentValues = cashFlows.map((cashFlow, index) => cashFlow / base ** (index + 1));
  const discountedTerminalValue = terminalValue / base ** cashFlows.length;
  presentValues.push(discountedTerminalValue);

  return {
    presentValues,
    discountedTerminalValue,
    total: presentValues.reduce((sum, value) => sum + value, 0),
  };
}
