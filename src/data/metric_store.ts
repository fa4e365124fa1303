/**
 * Metric Store
 *
 * Holds the target-stock metrics (primary dataset) and the peer-group
 * metrics (peer dataset, one row per comparable company, keyed by the stock
 * it is compared against). Loaded once per run and read-only afterwards.
 */

import { DataLoadError } from '@/core/errors';
import type { SpreadsheetSource } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { findHeader, readSheetTable, toNumber, type SheetTable } from './spreadsheet';

const logger = createChildLogger('metric_store');

export interface MetricRecord {
  stockId: string;
  metricName: string;
  value: number;
}

export interface PeerMetricRecord extends MetricRecord {
  peerId: string | null;
}

export interface MetricStoreOptions {
  idColumn?: string;
  peerColumn?: string;
}

export function normalizeStockId(raw: string): string {
  return raw.trim().toUpperCase();
}

// Metric names match across the two sheets regardless of case.
function peerKey(stockId: string, metricName: string): string {
  return `${stockId}\u0000${metricName.trim().toLowerCase()}`;
}

export class MetricStore {
  private readonly primary = new Map<string, Map<string, number>>();
  private readonly peerValues = new Map<string, number[]>();
  private readonly peerIds = new Map<string, Set<string>>();
  private readonly metricOrder: string[] = [];

  constructor(records: readonly MetricRecord[], peerRecords: readonly PeerMetricRecord[]) {
    for (const record of records) {
      const stockId = normalizeStockId(record.stockId);
      let metrics = this.primary.get(stockId);
      if (!metrics) {
        metrics = new Map();
        this.primary.set(stockId, metrics);
      }
      metrics.set(record.metricName, record.value);
      if (!this.metricOrder.includes(record.metricName)) {
        this.metricOrder.push(record.metricName);
      }
    }

    for (const record of peerRecords) {
      const stockId = normalizeStockId(record.stockId);
      const key = peerKey(stockId, record.metricName);
      const values = this.peerValues.get(key) ?? [];
      values.push(record.value);
      this.peerValues.set(key, values);

      if (record.peerId) {
        const peers = this.peerIds.get(stockId) ?? new Set<string>();
        peers.add(record.peerId);
        this.peerIds.set(stockId, peers);
      }
    }
  }

  hasStock(stockId: string): boolean {
    return this.primary.has(normalizeStockId(stockId));
  }

  stockIds(): string[] {
    return Array.from(this.primary.keys());
  }

  /** Metric names in first-seen column order of the primary dataset. */
  metricNames(): string[] {
    return [...this.metricOrder];
  }

  metricsFor(stockId: string): ReadonlyMap<string, number> {
    const metrics = this.primary.get(normalizeStockId(stockId));
    if (!metrics) {
      throw new DataLoadError(`No metrics found for ${normalizeStockId(stockId)} in the primary dataset`);
    }
    return metrics;
  }

  /** Peer values for one metric; empty when the stock has no peer data for it. */
  peerValuesFor(stockId: string, metricName: string): readonly number[] {
    return this.peerValues.get(peerKey(normalizeStockId(stockId), metricName)) ?? [];
  }

  peersFor(stockId: string): string[] {
    return Array.from(this.peerIds.get(normalizeStockId(stockId)) ?? []);
  }
}

function requireIdHeader(table: SheetTable, idColumn: string): string {
  const header = findHeader(table.headers, idColumn);
  if (!header) {
    throw new DataLoadError(
      `Required identifier column "${idColumn}" is missing (found: ${table.headers.join(', ') || 'none'})`,
      table.path
    );
  }
  return header;
}

function readIdentifier(value: string | number | null): string | null {
  if (value === null) return null;
  const id = normalizeStockId(String(value));
  return id || null;
}

export function primaryRecordsFromTable(table: SheetTable, idColumn: string): MetricRecord[] {
  const idHeader = requireIdHeader(table, idColumn);
  const metricHeaders = table.headers.filter((header) => header !== idHeader);
  const records: MetricRecord[] = [];

  for (const row of table.records) {
    const stockId = readIdentifier(row[idHeader] ?? null);
    if (!stockId) continue;
    for (const metricName of metricHeaders) {
      const value = toNumber(row[metricName] ?? null);
      if (value !== null) {
        records.push({ stockId, metricName, value });
      }
    }
  }
  return records;
}

export function peerRecordsFromTable(
  table: SheetTable,
  idColumn: string,
  peerColumn: string
): PeerMetricRecord[] {
  const idHeader = requireIdHeader(table, idColumn);
  const peerHeader = findHeader(table.headers, peerColumn);
  const metricHeaders = table.headers.filter(
    (header) => header !== idHeader && header !== peerHeader
  );
  const records: PeerMetricRecord[] = [];

  for (const row of table.records) {
    const stockId = readIdentifier(row[idHeader] ?? null);
    if (!stockId) continue;
    const peerId = peerHeader ? readIdentifier(row[peerHeader] ?? null) : null;
    for (const metricName of metricHeaders) {
      const value = toNumber(row[metricName] ?? null);
      if (value !== null) {
        records.push({ stockId, peerId, metricName, value });
      }
    }
  }
  return records;
}

export async function loadMetricStore(
  primarySource: SpreadsheetSource,
  peerSource: SpreadsheetSource,
  options: MetricStoreOptions = {}
): Promise<MetricStore> {
  const idColumn = options.idColumn ?? 'Stock';
  const peerColumn = options.peerColumn ?? 'Peer';

  const primaryTable = await readSheetTable(primarySource);
  const primaryRecords = primaryRecordsFromTable(primaryTable, idColumn);

  const peerTable = await readSheetTable(peerSource);
  const peerRecords = peerRecordsFromTable(peerTable, idColumn, peerColumn);

  const store = new MetricStore(primaryRecords, peerRecords);
  logger.info(
    {
      stocks: store.stockIds().length,
      metrics: store.metricNames().length,
      peerValues: peerRecords.length,
    },
    'Metric store loaded'
  );
  return store;
}
