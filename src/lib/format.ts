import { format } from 'date-fns';

export const EMPTY_VALUE = '—';

export function formatNumber(value: number | null | undefined, decimals: number = 2): string {
  if (value === null || value === undefined || Number.isNaN(value)) return EMPTY_VALUE;
  return value.toFixed(decimals);
}

/** Yield-like metrics and anything listed in `percentMetrics` display as percentages. */
export function isPercentMetric(metricName: string, percentMetrics: ReadonlySet<string>): boolean {
  const normalized = metricName.trim().toLowerCase();
  return normalized.includes('yield') || normalized.includes('%') || percentMetrics.has(normalized);
}

export function percentMetricSet(names: Iterable<string>): Set<string> {
  return new Set(Array.from(names, (name) => name.trim().toLowerCase()));
}

export function formatMetricValue(
  metricName: string,
  value: number | null | undefined,
  percentMetrics: ReadonlySet<string> = new Set()
): string {
  const text = formatNumber(value);
  if (text === EMPTY_VALUE) return text;
  return isPercentMetric(metricName, percentMetrics) ? `${text}%` : text;
}

export function money(value: number | null | undefined, currency: string = 'USD'): string {
  if (value === null || value === undefined || Number.isNaN(value)) return EMPTY_VALUE;
  try {
    return new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency,
      maximumFractionDigits: 2,
    }).format(value);
  } catch {
    return `${value.toFixed(2)} ${currency}`;
  }
}

export function formatTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm');
}

export function filenameDate(date: Date): string {
  return format(date, 'yyyyMMdd');
}
