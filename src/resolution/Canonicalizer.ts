import type { AliasTable } from '../aliases/AliasTable';
import type { Catalog } from '../pricing/types';
import type { ItemCategory, Resolution } from '../types';
import { createLogger, type Logger } from '../utils/logger';
import { normalizeItemName } from './normalize';

/**
 * Maps a human-written name to a catalog identifier.
 *
 * 1. alias table (explicit overrides)
 * 2. normalization pipeline, confirmed against the catalog
 * 3. otherwise unresolved; there is no fuzzy fallback
 *
 * Results are memoized for the lifetime of the instance, which is one run.
 */
export class Canonicalizer {
  private readonly memo = new Map<string, Promise<Resolution>>();
  private readonly log: Logger;

  constructor(
    private readonly aliases: AliasTable,
    private readonly catalog: Catalog,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('canonicalizer');
  }

  resolve(rawName: string, categoryHint?: ItemCategory): Promise<Resolution> {
    const key = `${rawName.trim()}|${categoryHint ?? ''}`;
    const cached = this.memo.get(key);
    if (cached) return cached;

    const pending = this.resolveUncached(rawName, categoryHint);
    this.memo.set(key, pending);
    // Failed lookups are not memoized
    void pending.catch(() => this.memo.delete(key));
    return pending;
  }

  private async resolveUncached(rawName: string, categoryHint?: ItemCategory): Promise<Resolution> {
    const alias = this.aliases.match(rawName);
    if (alias) {
      this.log.debug({ rawName, canonicalId: alias.canonicalId }, 'Resolved by alias');
      return {
        status: 'resolved',
        item: { id: alias.canonicalId, category: alias.category },
        via: 'alias',
      };
    }

    const candidateId = normalizeItemName(rawName);
    if (candidateId && (await this.catalog.exists(candidateId))) {
      this.log.debug({ rawName, canonicalId: candidateId }, 'Resolved by normalization');
      return {
        status: 'resolved',
        item: { id: candidateId, category: categoryHint ?? 'Item' },
        via: 'normalized',
      };
    }

    this.log.warn({ rawName, candidateId }, 'No catalog entry for name');
    return { status: 'unresolved', rawName, candidateId };
  }
}
