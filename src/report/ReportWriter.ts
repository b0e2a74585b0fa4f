import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { ReportTotals } from '../types';
import { FatalError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('report-writer');

export type ReportFormat = 'csv' | 'json';

export const ROW_HEADER = ['Quantity', 'Item', 'Id', 'Category', 'Unit Price', 'Subtotal'];
export const UNRESOLVED_HEADER = ['Line', 'Quantity', 'Entry', 'Reason', 'Detail'];
export const SKIPPED_HEADER = ['Line', 'Entry', 'Detail'];
export const ABORTED_HEADER = ['Line', 'Quantity', 'Entry', 'Id', 'Reason'];

const FORMATS_BY_EXTENSION = new Map<string, ReportFormat>([
  ['.csv', 'csv'],
  ['.json', 'json'],
]);

/** Report format for an output path; anything but .csv or .json is rejected. */
export function formatForPath(outputPath: string): ReportFormat {
  const extension = path.extname(outputPath).toLowerCase();
  const format = FORMATS_BY_EXTENSION.get(extension);
  if (!format) {
    throw new FatalError(`Unsupported report format "${extension || outputPath}": use a .csv or .json path`, {
      outputPath,
    });
  }
  return format;
}

/** Spreadsheet-shaped records: priced rows, a total row, then review sections. */
export function buildReportRecords(totals: ReportTotals): string[][] {
  const records: string[][] = [ROW_HEADER];

  for (const row of totals.rows) {
    records.push([
      String(row.quantity),
      row.displayName,
      row.item.id,
      row.item.category,
      String(row.unitPrice),
      String(row.subtotal),
    ]);
  }
  records.push(['', 'Total', '', '', '', String(totals.grandTotal)]);

  if (totals.unresolved.length > 0) {
    records.push([''], ['Unresolved'], UNRESOLVED_HEADER);
    for (const item of totals.unresolved) {
      records.push([String(item.entry.lineNumber), String(item.quantity), item.entry.text, item.reason, item.message]);
    }
  }

  if (totals.skipped.length > 0) {
    records.push([''], ['Skipped'], SKIPPED_HEADER);
    for (const item of totals.skipped) {
      records.push([String(item.entry.lineNumber), item.entry.text, item.message]);
    }
  }

  if (totals.aborted.length > 0) {
    records.push([''], ['Aborted'], ABORTED_HEADER);
    for (const item of totals.aborted) {
      records.push([String(item.entry.lineNumber), String(item.quantity), item.entry.text, item.itemId, item.reason]);
    }
    if (totals.abortReason) {
      records.push(['Reason', totals.abortReason]);
    }
  }

  return records;
}

export function renderReport(totals: ReportTotals, format: ReportFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(totals, null, 2)}\n`;
  }
  return stringify(buildReportRecords(totals));
}

export async function writeReport(totals: ReportTotals, outputPath: string): Promise<ReportFormat> {
  const format = formatForPath(outputPath);

  try {
    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    await fs.writeFile(outputPath, renderReport(totals, format), 'utf-8');
  } catch (error) {
    throw new FatalError(`Cannot write report to ${outputPath}`, { outputPath }, { cause: error });
  }

  log.info({ outputPath, format, rows: totals.rows.length }, 'Report written');
  return format;
}
