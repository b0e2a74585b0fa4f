import type { ItemCategory } from '../types';

/** Source of truth for valid canonical identifiers. */
export interface Catalog {
  exists(candidateId: string): Promise<boolean>;
}

/**
 * Current price of one item in platinum; null when the catalog knows the
 * item but nobody is selling it.
 */
export interface PriceResolver {
  fetchPrice(itemId: string, category: ItemCategory): Promise<number | null>;
}
