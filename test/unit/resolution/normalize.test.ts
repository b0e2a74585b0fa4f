import { aliasKey, normalizeItemName } from '../../../src/resolution/normalize';

describe('normalizeItemName', () => {
  it.each([
    ["Amar's Hatred", 'amars_hatred'],
    ['Summoner’s Wrath', 'summoners_wrath'],
    ['Semi-Rifle Cannonade', 'semi_rifle_cannonade'],
    ['  Ash Prime  Blueprint', 'ash_prime_blueprint'],
    ['Lex P. Barrel', 'lex_p_barrel'],
    ['rhino_prime_set', 'rhino_prime_set'],
    ['Primed  -  Continuity', 'primed_continuity'],
  ])('maps %p to %p', (input, expected) => {
    expect(normalizeItemName(input)).toBe(expected);
  });

  it('returns an empty string for empty or punctuation-only input', () => {
    expect(normalizeItemName('')).toBe('');
    expect(normalizeItemName(' - ')).toBe('');
    expect(normalizeItemName('...')).toBe('');
  });

  it('gives the same id for spellings that differ only systematically', () => {
    const ids = ["amar's hatred", "AMAR'S HATRED", 'Amar’s  Hatred', 'amars hatred'].map(normalizeItemName);
    expect(new Set(ids)).toEqual(new Set(['amars_hatred']));
  });

  it('is idempotent', () => {
    for (const name of ["Amar's Hatred", 'Semi-Rifle Cannonade', ' Lex P. Barrel ', 'summoner’s wrath']) {
      const once = normalizeItemName(name);
      expect(normalizeItemName(once)).toBe(once);
    }
  });

  it('only drops an apostrophe that forms a possessive', () => {
    expect(normalizeItemName("Baro Ki'Teer")).toBe('baro_ki_teer');
  });
});

describe('aliasKey', () => {
  it('reads hyphens and underscores as spaces', () => {
    expect(aliasKey('Semi-Shotgun Cannonade')).toBe('semi shotgun cannonade');
    expect(aliasKey('SEMI_SHOTGUN_CANNONADE')).toBe('semi shotgun cannonade');
  });

  it('drops other punctuation and collapses whitespace', () => {
    expect(aliasKey('summoner’s_wrath')).toBe('summoners wrath');
    expect(aliasKey('  Semi   Shotgun  Cannonade. ')).toBe('semi shotgun cannonade');
  });

  it('returns an empty string for empty input', () => {
    expect(aliasKey('')).toBe('');
  });
});
