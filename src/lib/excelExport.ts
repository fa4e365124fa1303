import ExcelJS from 'exceljs';
import type { VerdictTone } from '@/scoring/comparator';
import { isUnavailable } from '@/providers/types';
import type { Report } from '@/run/builder';

const HEADER_BG = '1A1F36';
const HEADER_FONT = 'FFFFFF';

export const TONE_FILLS: Record<VerdictTone, { bg: string; font: string }> = {
  favorable: { bg: 'C6EFCE', font: '006100' },
  unfavorable: { bg: 'FFC7CE', font: '9C0006' },
  undetermined: { bg: 'EDEDED', font: '595959' },
};

function applyToneFormatting(cell: ExcelJS.Cell, tone: VerdictTone) {
  const colors = TONE_FILLS[tone];
  cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: colors.bg } };
  cell.font = { bold: true, color: { argb: colors.font } };
}

function styleHeaderRow(row: ExcelJS.Row) {
  row.height = 20;
  row.eachCell((cell) => {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_BG } };
    cell.font = { bold: true, color: { argb: HEADER_FONT }, size: 11 };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = {
      top: { style: 'thin' },
      left: { style: 'thin' },
      bottom: { style: 'thin' },
      right: { style: 'thin' },
    };
  });
}

function setColumnWidths(sheet: ExcelJS.Worksheet, widths: number[]) {
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });
}

/** Companion workbook of the PDF: the metric table with the same verdict colours. */
export async function generateReportWorkbook(report: Report): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'stock-one-pager';
  workbook.created = report.generatedAt;

  const sheet = workbook.addWorksheet(report.stockId.slice(0, 31));
  sheet.addRow(['Metric', 'Stock', 'Peer avg', 'Peers', 'Verdict']);
  styleHeaderRow(sheet.getRow(1));

  for (const row of report.rows) {
    const added = sheet.addRow([
      row.metricName,
      row.stockValue,
      row.peerMean ?? '-',
      row.peerCount,
      row.tone,
    ]);
    added.getCell(2).numFmt = '#,##0.00';
    added.getCell(3).numFmt = '#,##0.00';
    added.getCell(2).alignment = { horizontal: 'right' };
    added.getCell(3).alignment = { horizontal: 'right' };
    added.getCell(4).alignment = { horizontal: 'center' };
    applyToneFormatting(added.getCell(2), row.tone);
  }

  sheet.addRow([]);
  if (isUnavailable(report.market)) {
    sheet.addRow(['Market data', `Unavailable: ${report.market.reason}`]);
  } else {
    sheet.addRow(['Price', report.market.price ?? '-', report.market.currency ?? '']);
    for (const figure of [...report.market.figures, ...report.market.health]) {
      sheet.addRow([figure.label, figure.value]);
    }
  }
  if (!isUnavailable(report.profile)) {
    sheet.addRow(['Sector', report.profile.sector ?? '-']);
    sheet.addRow(['Industry', report.profile.industry ?? '-']);
  }
  if (!isUnavailable(report.analyst)) {
    sheet.addRow(['Recommendation', report.analyst.recommendation ?? '-']);
    sheet.addRow(['Mean target', report.analyst.targetMeanPrice ?? '-']);
  }

  setColumnWidths(sheet, [30, 14, 14, 8, 16]);
  sheet.views = [{ state: 'frozen', ySplit: 1 }];

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
