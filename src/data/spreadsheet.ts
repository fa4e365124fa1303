/**
 * Spreadsheet ingestion (.xlsx and .csv) through exceljs.
 *
 * A sheet is read into a header row plus records keyed by that header, in
 * either orientation: one record per row (the usual layout) or one record
 * per column (stocks laid out side by side).
 */

import ExcelJS from 'exceljs';
import { existsSync } from 'fs';
import { extname } from 'path';
import { DataLoadError, describeError } from '@/core/errors';
import type { SheetOrientation, SpreadsheetSource } from '@/core/config';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('spreadsheet');

export type CellContent = string | number | null;

export interface SheetTable {
  path: string;
  headers: string[];
  records: Array<Record<string, CellContent>>;
}

function cellContent(value: ExcelJS.CellValue): CellContent {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return null;
  if (value instanceof Date) return value.toISOString();

  if ('result' in value) {
    const result = value.result;
    if (typeof result === 'number' || typeof result === 'string') return cellContent(result);
    return null;
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('text' in value && typeof value.text === 'string') {
    return value.text;
  }
  return null;
}

/**
 * Parses a numeric cell. Text such as "1,234.5" or "3.2%" is accepted;
 * blanks and placeholders ("N/A", "-") are absent values.
 */
export function toNumber(content: CellContent): number | null {
  if (content === null) return null;
  if (typeof content === 'number') return Number.isFinite(content) ? content : null;

  const cleaned = content.replace(/[,\s]/g, '').replace(/%$/, '');
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeHeader(header: string): string {
  return header.replace(/\s+/g, ' ').trim();
}

async function readWorksheet(source: SpreadsheetSource): Promise<ExcelJS.Worksheet> {
  const workbook = new ExcelJS.Workbook();
  const extension = extname(source.path).toLowerCase();

  if (extension === '.csv') {
    return workbook.csv.readFile(source.path);
  }
  if (extension !== '.xlsx') {
    throw new DataLoadError(`Unsupported spreadsheet type "${extension}"`, source.path);
  }

  await workbook.xlsx.readFile(source.path);
  const sheet = source.sheet ? workbook.getWorksheet(source.sheet) : workbook.worksheets[0];
  if (!sheet) {
    throw new DataLoadError(
      source.sheet ? `Sheet "${source.sheet}" not found` : 'Workbook has no worksheets',
      source.path
    );
  }
  return sheet;
}

function toMatrix(sheet: ExcelJS.Worksheet): CellContent[][] {
  const matrix: CellContent[][] = [];
  sheet.eachRow({ includeEmpty: false }, (row) => {
    const cells: CellContent[] = [];
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      cells[colNumber - 1] = cellContent(cell.value);
    });
    matrix.push(Array.from(cells, (cell) => cell ?? null));
  });
  return matrix;
}

function transpose(matrix: CellContent[][]): CellContent[][] {
  const width = matrix.reduce((max, row) => Math.max(max, row.length), 0);
  return Array.from({ length: width }, (_, col) => matrix.map((row) => row[col] ?? null));
}

export function tableFromMatrix(
  path: string,
  matrix: CellContent[][],
  orientation: SheetOrientation = 'rows'
): SheetTable {
  const lines = orientation === 'columns' ? transpose(matrix) : matrix;
  const [headerLine, ...body] = lines;
  if (!headerLine) {
    throw new DataLoadError('Sheet is empty', path);
  }

  const headers = headerLine.map((cell) => (cell === null ? '' : normalizeHeader(String(cell))));
  const records = body
    .filter((line) => line.some((cell) => cell !== null && cell !== ''))
    .map((line) => {
      const record: Record<string, CellContent> = {};
      headers.forEach((header, index) => {
        if (header) record[header] = line[index] ?? null;
      });
      return record;
    });

  return { path, headers: headers.filter(Boolean), records };
}

export async function readSheetTable(source: SpreadsheetSource): Promise<SheetTable> {
  if (!existsSync(source.path)) {
    throw new DataLoadError(`File not found: ${source.path}`, source.path);
  }

  let sheet: ExcelJS.Worksheet;
  try {
    sheet = await readWorksheet(source);
  } catch (error) {
    if (error instanceof DataLoadError) throw error;
    throw new DataLoadError(
      `Could not parse ${source.path}: ${describeError(error)}`,
      source.path,
      error
    );
  }

  const table = tableFromMatrix(source.path, toMatrix(sheet), source.orientation);
  logger.debug(
    { path: source.path, headers: table.headers.length, records: table.records.length },
    'Sheet loaded'
  );
  return table;
}

/** Case-insensitive header lookup; returns the header as it appears in the sheet. */
export function findHeader(headers: string[], wanted: string): string | null {
  const target = normalizeHeader(wanted).toLowerCase();
  return headers.find((header) => header.toLowerCase() === target) ?? null;
}
