import type { ItemCategory } from '../schemas/aliasTable';
import type { ParseError, ResolutionError } from '../utils/errors';

export type { ItemCategory } from '../schemas/aliasTable';

export interface RawLineEntry {
  text: string;
  lineNumber: number;
  categoryHint?: ItemCategory;
}

export interface ParsedRequest {
  quantity: number;
  rawName: string;
}

export interface CanonicalItem {
  id: string;
  category: ItemCategory;
}

export type Resolution =
  | { status: 'resolved'; item: CanonicalItem; via: 'alias' | 'normalized' }
  | { status: 'unresolved'; rawName: string; candidateId: string };

export interface PriceQuote {
  itemId: string;
  platinum: number;
}

export type AbortReason = 'fatal-lookup' | 'timeout';

export type LineResult =
  | {
      kind: 'priced';
      entry: RawLineEntry;
      parsed: ParsedRequest;
      item: CanonicalItem;
      quote: PriceQuote;
      subtotal: number;
    }
  | {
      kind: 'unresolved';
      entry: RawLineEntry;
      parsed: ParsedRequest;
      item?: CanonicalItem;
      error: ResolutionError;
      subtotal: 0;
    }
  | {
      kind: 'skipped';
      entry: RawLineEntry;
      error: ParseError;
    }
  | {
      kind: 'aborted';
      entry: RawLineEntry;
      parsed: ParsedRequest;
      item: CanonicalItem;
      reason: AbortReason;
    };

export interface ReportRow {
  item: CanonicalItem;
  displayName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export interface UnresolvedEntry {
  entry: RawLineEntry;
  quantity: number;
  rawName: string;
  reason: ResolutionError['reason'];
  itemId?: string;
  message: string;
}

export interface SkippedEntry {
  entry: RawLineEntry;
  message: string;
}

export interface AbortedEntry {
  entry: RawLineEntry;
  quantity: number;
  rawName: string;
  itemId: string;
  reason: AbortReason;
}

export interface ReportTotals {
  rows: ReportRow[];
  grandTotal: number;
  unresolved: UnresolvedEntry[];
  skipped: SkippedEntry[];
  aborted: AbortedEntry[];
  abortReason?: string;
}
