/**
 * Price trend series for the report chart: the daily close with its
 * 50-day and 200-day simple moving averages.
 */

import type { PricePoint } from '@/providers/types';

export const SHORT_WINDOW = 50;
export const LONG_WINDOW = 200;

/**
 * Trailing simple moving average. Entries before the window fills are null,
 * so a year of closes yields a 200-day line only for its last months.
 */
export function simpleMovingAverage(values: readonly number[], window: number): Array<number | null> {
  if (window < 1) throw new RangeError(`Moving average window must be positive, got ${window}`);

  const averages: Array<number | null> = [];
  let sum = 0;
  values.forEach((value, index) => {
    sum += value;
    if (index >= window) sum -= values[index - window];
    averages.push(index >= window - 1 ? sum / window : null);
  });
  return averages;
}

export interface PriceTrend {
  points: PricePoint[];
  shortAverage: Array<number | null>;
  longAverage: Array<number | null>;
  first: PricePoint;
  last: PricePoint;
  /** Change from the first to the last close, as a fraction */
  change: number;
  high: number;
  low: number;
}

export function buildPriceTrend(points: readonly PricePoint[]): PriceTrend | null {
  const sorted = [...points].sort((a, b) => a.t - b.t);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last || sorted.length < 2) return null;

  const closes = sorted.map((point) => point.close);
  return {
    points: sorted,
    shortAverage: simpleMovingAverage(closes, SHORT_WINDOW),
    longAverage: simpleMovingAverage(closes, LONG_WINDOW),
    first,
    last,
    change: first.close === 0 ? 0 : last.close / first.close - 1,
    high: Math.max(...closes),
    low: Math.min(...closes),
  };
}
