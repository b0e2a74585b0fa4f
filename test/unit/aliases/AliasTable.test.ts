import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AliasTable } from '../../../src/aliases/AliasTable';
import { DEFAULT_ALIAS_TABLE_PATH } from '../../../src/config';
import { FatalError } from '../../../src/utils/errors';

describe('AliasTable', () => {
  const table = AliasTable.fromJson({
    version: 1,
    aliases: [{ pattern: 'semi-shotgun cannonade', canonicalId: 'shotgun_cannonade', category: 'Mod' }],
  });

  describe('match', () => {
    it('matches regardless of case, hyphens and underscores', () => {
      expect(table.match('Semi-Shotgun Cannonade')?.canonicalId).toBe('shotgun_cannonade');
      expect(table.match('semi shotgun cannonade')?.canonicalId).toBe('shotgun_cannonade');
      expect(table.match('SEMI_SHOTGUN_CANNONADE')?.category).toBe('Mod');
    });

    it('does not match partial names', () => {
      expect(table.match('shotgun cannonade')).toBeUndefined();
      expect(table.match('semi-shotgun cannonade prime')).toBeUndefined();
      expect(table.match('')).toBeUndefined();
    });

    it('keeps the first loaded rule when patterns of equal length collide', () => {
      const tied = AliasTable.fromJson({
        version: 1,
        aliases: [
          { pattern: 'foo-bar', canonicalId: 'first_id', category: 'Item' },
          { pattern: 'foo bar', canonicalId: 'second_id', category: 'Item' },
        ],
      });

      expect(tied.match('Foo Bar')?.canonicalId).toBe('first_id');
    });

    it('prefers the longer pattern when keys collide', () => {
      const nested = AliasTable.fromJson({
        version: 1,
        aliases: [
          { pattern: 'foo bar', canonicalId: 'short_id', category: 'Item' },
          { pattern: 'Foo  Bar.', canonicalId: 'long_id', category: 'Item' },
        ],
      });

      expect(nested.match('foo bar')?.canonicalId).toBe('long_id');
      expect(nested.list().map((rule) => rule.canonicalId)).toEqual(['long_id', 'short_id']);
    });
  });

  describe('fromJson', () => {
    it.each([
      ['an unknown version', { version: 2, aliases: [] }],
      ['a malformed id', { version: 1, aliases: [{ pattern: 'x', canonicalId: 'Bad Id', category: 'Mod' }] }],
      ['an unknown category', { version: 1, aliases: [{ pattern: 'x', canonicalId: 'x', category: 'Weapon' }] }],
      ['a blank pattern', { version: 1, aliases: [{ pattern: '  ', canonicalId: 'x', category: 'Item' }] }],
    ])('rejects %s', (_label, data) => {
      expect(() => AliasTable.fromJson(data)).toThrow(FatalError);
    });

    it('builds an empty table', () => {
      expect(AliasTable.fromJson({ version: 1, aliases: [] }).size).toBe(0);
      expect(AliasTable.empty().match('anything')).toBeUndefined();
    });
  });

  describe('load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'alias-table-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads the bundled alias file', async () => {
      const bundled = await AliasTable.load(DEFAULT_ALIAS_TABLE_PATH);

      expect(bundled.size).toBe(2);
      expect(bundled.match('Semi-Shotgun Cannonade')?.canonicalId).toBe('shotgun_cannonade');
    });

    it('raises a FatalError for a missing file', async () => {
      await expect(AliasTable.load(path.join(dir, 'missing.json'))).rejects.toThrow(/^Cannot load alias table/);
    });

    it('raises a FatalError for invalid JSON', async () => {
      const file = path.join(dir, 'aliases.json');
      await fs.writeFile(file, '{ "version": 1, ', 'utf-8');

      await expect(AliasTable.load(file)).rejects.toBeInstanceOf(FatalError);
    });
  });
});
