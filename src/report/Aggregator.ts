import type { LineResult, ReportRow, ReportTotals } from '../types';

// Money is summed in hundredths of platinum so totals stay exact
const toMinor = (platinum: number): number => Math.round(platinum * 100);
const fromMinor = (minor: number): number => minor / 100;

interface RowAccumulator {
  row: ReportRow;
  unitMinor: number;
}

/**
 * Folds line results into report totals. Rows keep the order in which each
 * canonical id first appears in the input.
 */
export function aggregate(results: readonly LineResult[], abortReason?: string): ReportTotals {
  const rows = new Map<string, RowAccumulator>();
  const totals: ReportTotals = { rows: [], grandTotal: 0, unresolved: [], skipped: [], aborted: [] };

  for (const result of results) {
    switch (result.kind) {
      case 'priced': {
        const existing = rows.get(result.item.id);
        if (existing) {
          existing.row.quantity += result.parsed.quantity;
        } else {
          rows.set(result.item.id, {
            unitMinor: toMinor(result.quote.platinum),
            row: {
              item: result.item,
              displayName: result.parsed.rawName,
              quantity: result.parsed.quantity,
              unitPrice: fromMinor(toMinor(result.quote.platinum)),
              subtotal: 0,
            },
          });
        }
        break;
      }
      case 'unresolved':
        totals.unresolved.push({
          entry: result.entry,
          quantity: result.parsed.quantity,
          rawName: result.parsed.rawName,
          reason: result.error.reason,
          itemId: result.item?.id,
          message: result.error.message,
        });
        break;
      case 'skipped':
        totals.skipped.push({ entry: result.entry, message: result.error.message });
        break;
      case 'aborted':
        totals.aborted.push({
          entry: result.entry,
          quantity: result.parsed.quantity,
          rawName: result.parsed.rawName,
          itemId: result.item.id,
          reason: result.reason,
        });
        break;
    }
  }

  let grandMinor = 0;
  for (const { row, unitMinor } of rows.values()) {
    const subtotalMinor = unitMinor * row.quantity;
    row.subtotal = fromMinor(subtotalMinor);
    grandMinor += subtotalMinor;
    totals.rows.push(row);
  }
  totals.grandTotal = fromMinor(grandMinor);

  if (abortReason) totals.abortReason = abortReason;
  return totals;
}
