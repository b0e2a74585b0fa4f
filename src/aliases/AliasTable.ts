import { promises as fs } from 'fs';
import { AliasFileSchema, type AliasRule } from '../schemas/aliasTable';
import { FatalError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { aliasKey } from '../resolution/normalize';

const log = createLogger('alias-table');

/**
 * Explicit overrides for names the normalization pipeline cannot derive.
 *
 * Rules are compared on their alias key. When several rules share a key the
 * longest pattern wins; patterns of equal length keep load order, so the
 * first one loaded wins.
 */
export class AliasTable {
  private readonly rules: readonly AliasRule[];
  private readonly byKey: ReadonlyMap<string, AliasRule>;

  constructor(rules: readonly AliasRule[]) {
    // Array.prototype.sort is stable, so equal lengths stay in load order
    this.rules = Object.freeze([...rules].sort((a, b) => b.pattern.length - a.pattern.length));

    const byKey = new Map<string, AliasRule>();
    for (const rule of this.rules) {
      const key = aliasKey(rule.pattern);
      if (!key) continue;

      const existing = byKey.get(key);
      if (!existing) {
        byKey.set(key, rule);
      } else if (existing.canonicalId !== rule.canonicalId) {
        log.warn(
          { key, kept: existing.canonicalId, ignored: rule.canonicalId },
          'Alias patterns collide; keeping the more specific rule',
        );
      }
    }
    this.byKey = byKey;
  }

  static empty(): AliasTable {
    return new AliasTable([]);
  }

  static fromJson(data: unknown, source = 'inline'): AliasTable {
    const parsed = AliasFileSchema.safeParse(data);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new FatalError(`Invalid alias table ${source}: ${problems.join('; ')}`, { source, problems });
    }
    return new AliasTable(parsed.data.aliases);
  }

  static async load(filePath: string): Promise<AliasTable> {
    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new FatalError(`Cannot load alias table ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
    }

    const table = AliasTable.fromJson(data, filePath);
    log.info({ filePath, rules: table.size }, 'Alias table loaded');
    return table;
  }

  get size(): number {
    return this.rules.length;
  }

  match(rawName: string): AliasRule | undefined {
    const key = aliasKey(rawName);
    return key ? this.byKey.get(key) : undefined;
  }

  list(): readonly AliasRule[] {
    return this.rules;
  }
}
