/**
 * Peer comparison
 *
 * Each metric of the target stock is compared with the arithmetic mean of
 * its peer group. Lower-than-peers is favourable by default (valuation
 * multiples); metrics listed as higher-is-better (yield-type) invert the
 * rule. A tie is unfavourable in both directions, and a metric without peer
 * data gets no verdict at all.
 */

import type { MetricStore } from '@/data/metric_store';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('comparator');

/** Yield-type metrics; extend through the `higherIsBetter` config list. */
export const DEFAULT_HIGHER_IS_BETTER: readonly string[] = ['Dividend Yield'];

export type Favorability = boolean | 'undetermined';

export type VerdictTone = 'favorable' | 'unfavorable' | 'undetermined';

export interface Verdict {
  stockId: string;
  metricName: string;
  stockValue: number;
  peerMean: number | null;
  peerCount: number;
  favorable: Favorability;
}

export interface ComparatorOptions {
  higherIsBetter?: Iterable<string>;
}

export interface CompareStockOptions extends ComparatorOptions {
  /** Report order; empty means every metric the stock has, in sheet order. */
  metrics?: readonly string[];
}

function metricKey(metricName: string): string {
  return metricName.trim().toLowerCase();
}

export function higherIsBetterSet(names: Iterable<string> = DEFAULT_HIGHER_IS_BETTER): Set<string> {
  return new Set(Array.from(names, metricKey));
}

export function isHigherBetter(metricName: string, higherIsBetter: ReadonlySet<string>): boolean {
  return higherIsBetter.has(metricKey(metricName));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function compare(
  stockId: string,
  metricName: string,
  stockValue: number,
  peerValues: readonly number[],
  options: ComparatorOptions = {}
): Verdict {
  const peerMean = mean(peerValues);
  const base = { stockId, metricName, stockValue, peerMean, peerCount: peerValues.length };

  if (peerMean === null) {
    return { ...base, favorable: 'undetermined' };
  }

  const higherIsBetter = higherIsBetterSet(options.higherIsBetter);
  const favorable = isHigherBetter(metricName, higherIsBetter)
    ? stockValue > peerMean
    : stockValue < peerMean;

  return { ...base, favorable };
}

export function verdictTone(verdict: Pick<Verdict, 'favorable'>): VerdictTone {
  if (verdict.favorable === 'undetermined') return 'undetermined';
  return verdict.favorable ? 'favorable' : 'unfavorable';
}

/** Verdicts for one stock in report order. */
export function compareStock(
  store: MetricStore,
  stockId: string,
  options: CompareStockOptions = {}
): Verdict[] {
  const metrics = store.metricsFor(stockId);
  const higherIsBetter = Array.from(options.higherIsBetter ?? DEFAULT_HIGHER_IS_BETTER);
  const requested =
    options.metrics && options.metrics.length > 0 ? options.metrics : Array.from(metrics.keys());

  const byKey = new Map(Array.from(metrics.keys(), (name) => [metricKey(name), name] as const));

  const verdicts: Verdict[] = [];
  for (const requestedName of requested) {
    const metricName = byKey.get(metricKey(requestedName));
    const stockValue = metricName === undefined ? undefined : metrics.get(metricName);
    if (metricName === undefined || stockValue === undefined) {
      logger.warn({ stockId, metricName: requestedName }, 'Configured metric missing for stock, skipping');
      continue;
    }
    verdicts.push(
      compare(stockId, metricName, stockValue, store.peerValuesFor(stockId, metricName), {
        higherIsBetter,
      })
    );
  }

  logger.debug(
    {
      stockId,
      favorable: verdicts.filter((v) => v.favorable === true).length,
      unfavorable: verdicts.filter((v) => v.favorable === false).length,
      undetermined: verdicts.filter((v) => v.favorable === 'undetermined').length,
    },
    'Peer comparison complete'
  );
  return verdicts;
}
