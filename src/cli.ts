#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from './config';
import { runDonationReport } from './app/pipeline';
import { MarketPlatformSchema } from './schemas/market';
import { DonationError, FatalError, errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('cli');

interface CliOptions {
  aliases?: string;
  concurrency?: number;
  platform?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function applyCliOptions(config: AppConfig, options: CliOptions): AppConfig {
  let platform = config.market.platform;
  if (options.platform !== undefined) {
    const parsed = MarketPlatformSchema.safeParse(options.platform);
    if (!parsed.success) {
      throw new FatalError(`Invalid platform: ${options.platform}`);
    }
    platform = parsed.data;
  }

  return {
    ...config,
    aliasTablePath: options.aliases ?? config.aliasTablePath,
    market: {
      ...config.market,
      platform,
    },
    pricing: {
      ...config.pricing,
      concurrency: options.concurrency ?? config.pricing.concurrency,
    },
  };
}

async function priceCommand(input: string, output: string, options: CliOptions): Promise<void> {
  const config = applyCliOptions(loadConfig(), options);

  logger.info({ input, output, platform: config.market.platform }, 'Pricing donations');
  const totals = await runDonationReport({ inputPath: input, outputPath: output, config });

  logger.info(
    {
      rows: totals.rows.length,
      grandTotal: totals.grandTotal,
      unresolved: totals.unresolved.length,
      skipped: totals.skipped.length,
      aborted: totals.aborted.length,
    },
    `✓ Report written to ${output}: ${totals.grandTotal} platinum`,
  );

  for (const item of totals.unresolved) {
    logger.warn(`  Line ${item.entry.lineNumber}: "${item.entry.text}" needs manual review (${item.reason})`);
  }
  if (totals.abortReason) {
    logger.error(`  ${totals.aborted.length} item(s) not priced: ${totals.abortReason}`);
  }
}

const program = new Command();

program
  .name('donation-pricer')
  .description('Price a donation list against warframe.market and write a totaled report')
  .argument('<input>', 'text file with one donation per line')
  .argument('[output]', 'report file (.csv or .json)', 'report.csv')
  .option('-a, --aliases <path>', 'alias table JSON file')
  .option('-c, --concurrency <n>', 'parallel price lookups', parsePositiveInt)
  .option('-p, --platform <platform>', 'market platform (pc, ps4, xbox, switch)')
  .action(async (input: string, output: string, options: CliOptions) => {
    try {
      await priceCommand(input, output, options);
    } catch (error) {
      const code = error instanceof DonationError ? error.code : 'UNEXPECTED';
      logger.fatal({ code, err: error }, errorMessage(error));
      process.exitCode = 1;
    }
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    logger.fatal({ err: error }, errorMessage(error));
    process.exitCode = 1;
  });
}

export { program };
