import type { AppConfig } from '../config';
import { readDonationFile } from '../input/InputReader';
import { parseLine } from '../parsing/LineParser';
import { aggregate } from '../report/Aggregator';
import { formatForPath, writeReport } from '../report/ReportWriter';
import type {
  AbortReason,
  CanonicalItem,
  LineResult,
  ParsedRequest,
  PriceQuote,
  RawLineEntry,
  ReportTotals,
  Resolution,
} from '../types';
import { FatalError, LookupError, ParseError, ResolutionError, errorMessage } from '../utils/errors';
import { runPool } from '../utils/workerPool';
import { createRunContext, type RunContext, type RunContextOverrides } from './context';

type StagedLine =
  | { entry: RawLineEntry; error: ParseError }
  | { entry: RawLineEntry; parsed: ParsedRequest; resolution: Resolution };

type LookupOutcome = { status: 'ok'; quote: PriceQuote | null } | { status: 'failed'; error: LookupError };

export interface PricingOutcome {
  results: LineResult[];
  totals: ReportTotals;
}

async function stageLines(ctx: RunContext, entries: readonly RawLineEntry[]): Promise<StagedLine[]> {
  const staged: StagedLine[] = [];

  for (const entry of entries) {
    let parsed: ParsedRequest;
    try {
      parsed = parseLine(entry);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      ctx.logger.warn({ lineNumber: entry.lineNumber, text: entry.text, reason: error.message }, 'Skipping line');
      staged.push({ entry, error });
      continue;
    }

    const resolution = await ctx.canonicalizer.resolve(parsed.rawName, entry.categoryHint);
    staged.push({ entry, parsed, resolution });
  }

  return staged;
}

// Distinct ids in order of first appearance
function distinctItems(staged: readonly StagedLine[]): CanonicalItem[] {
  const items = new Map<string, CanonicalItem>();
  for (const line of staged) {
    if ('resolution' in line && line.resolution.status === 'resolved' && !items.has(line.resolution.item.id)) {
      items.set(line.resolution.item.id, line.resolution.item);
    }
  }
  return [...items.values()];
}

function toMinorSubtotal(quantity: number, platinum: number): number {
  return (Math.round(platinum * 100) * quantity) / 100;
}

function toLineResult(
  line: StagedLine,
  outcomes: ReadonlyMap<string, LookupOutcome>,
  abortKind: AbortReason,
): LineResult {
  if ('error' in line) {
    return { kind: 'skipped', entry: line.entry, error: line.error };
  }

  const { entry, parsed, resolution } = line;
  if (resolution.status === 'unresolved') {
    return {
      kind: 'unresolved',
      entry,
      parsed,
      error: new ResolutionError(`No alias or catalog entry for "${parsed.rawName}"`, 'no-match', parsed.rawName),
      subtotal: 0,
    };
  }

  const { item } = resolution;
  const outcome = outcomes.get(item.id);

  if (!outcome) {
    return { kind: 'aborted', entry, parsed, item, reason: abortKind };
  }
  if (outcome.status === 'failed') {
    return {
      kind: 'unresolved',
      entry,
      parsed,
      item,
      error: new ResolutionError(`Price lookup failed: ${outcome.error.message}`, 'lookup-failed', parsed.rawName, item.id),
      subtotal: 0,
    };
  }
  if (!outcome.quote) {
    return {
      kind: 'unresolved',
      entry,
      parsed,
      item,
      error: new ResolutionError(`No sell orders for ${item.id}`, 'no-price', parsed.rawName, item.id),
      subtotal: 0,
    };
  }

  return {
    kind: 'priced',
    entry,
    parsed,
    item,
    quote: outcome.quote,
    subtotal: toMinorSubtotal(parsed.quantity, outcome.quote.platinum),
  };
}

/**
 * Parses, resolves and prices every entry, then aggregates.
 *
 * Lookups run on a bounded pool; results are assembled in input order once
 * every started lookup has settled. A FatalError from the price service (or
 * the run timeout) stops new lookups; their lines are reported as aborted.
 */
export async function priceEntries(ctx: RunContext, entries: readonly RawLineEntry[]): Promise<PricingOutcome> {
  const staged = await stageLines(ctx, entries);
  const items = distinctItems(staged);

  const outcomes = new Map<string, LookupOutcome>();
  const controller = new AbortController();
  let abortKind: AbortReason = 'fatal-lookup';
  let abortReason: string | undefined;

  const { runTimeoutMs, concurrency } = ctx.config.pricing;
  const timer =
    runTimeoutMs !== undefined
      ? setTimeout(() => {
          abortKind = 'timeout';
          abortReason = `Price lookups exceeded ${runTimeoutMs} ms`;
          ctx.logger.warn({ runTimeoutMs }, 'Run timeout reached; remaining lookups cancelled');
          controller.abort();
        }, runTimeoutMs)
      : undefined;

  try {
    const { skipped } = await runPool(
      items,
      concurrency,
      async (item) => {
        try {
          const quote = await ctx.priceCache.get(item.id, item.category);
          outcomes.set(item.id, { status: 'ok', quote });
        } catch (error) {
          if (error instanceof FatalError) {
            if (!controller.signal.aborted) {
              abortKind = 'fatal-lookup';
              abortReason = error.message;
              ctx.logger.error({ itemId: item.id, error: error.message }, 'Aborting remaining lookups');
              controller.abort();
            }
            return;
          }
          const lookupError =
            error instanceof LookupError
              ? error
              : new LookupError(errorMessage(error), false, item.id, undefined, { cause: error });
          outcomes.set(item.id, { status: 'failed', error: lookupError });
        }
      },
      controller.signal,
    );

    if (skipped.length > 0) {
      ctx.logger.warn({ cancelled: skipped.map((item) => item.id) }, 'Lookups not started');
    }
  } finally {
    if (timer) clearTimeout(timer);
  }

  const results = staged.map((line) => toLineResult(line, outcomes, abortKind));
  // A timeout that fires during the last lookup leaves nothing aborted
  const anyAborted = results.some((result) => result.kind === 'aborted');
  const totals = aggregate(results, anyAborted ? abortReason : undefined);

  ctx.logger.info(
    {
      entries: entries.length,
      rows: totals.rows.length,
      grandTotal: totals.grandTotal,
      unresolved: totals.unresolved.length,
      skipped: totals.skipped.length,
      aborted: totals.aborted.length,
      externalLookups: ctx.priceCache.externalLookups,
      cache: ctx.priceCache.stats(),
    },
    'Pricing complete',
  );

  return { results, totals };
}

export interface ReportRunOptions {
  inputPath: string;
  outputPath: string;
  config: AppConfig;
  overrides?: RunContextOverrides;
}

/** Input file to report file. Only FatalError escapes. */
export async function runDonationReport(options: ReportRunOptions): Promise<ReportTotals> {
  // Fail on an unwritable format before any lookup is spent
  formatForPath(options.outputPath);
  const entries = await readDonationFile(options.inputPath);
  const ctx = await createRunContext(options.config, options.overrides);

  try {
    const { totals } = await priceEntries(ctx, entries);
    await writeReport(totals, options.outputPath);
    return totals;
  } finally {
    ctx.close();
  }
}
