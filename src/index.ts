export * from './types';
export { loadConfig, type AppConfig, type MarketConfig, type PricingConfig } from './config';
export { AliasTable } from './aliases/AliasTable';
export { splitInput, readDonationFile } from './input/InputReader';
export { parseLine } from './parsing/LineParser';
export { normalizeItemName, aliasKey } from './resolution/normalize';
export { Canonicalizer } from './resolution/Canonicalizer';
export { PriceCache } from './pricing/PriceCache';
export { MarketClient, pickSellPrice } from './pricing/MarketClient';
export type { Catalog, PriceResolver } from './pricing/types';
export { aggregate } from './report/Aggregator';
export { renderReport, writeReport, buildReportRecords } from './report/ReportWriter';
export { createRunContext, type RunContext } from './app/context';
export { priceEntries, runDonationReport } from './app/pipeline';
export * from './utils/errors';
