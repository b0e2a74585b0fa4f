/**
 * Name normalization for catalog identifiers.
 *
 * warframe.market url names are lowercase words joined by underscores, with
 * possessives folded into the word ("Amar's Hatred" -> "amars_hatred").
 * Systematic differences (case, possessives, periods, hyphens, spacing) are
 * handled here; one-off exceptions belong in the alias table.
 *
 * Examples:
 * - "Amar's Hatred"        -> "amars_hatred"
 * - "Summoner’s Wrath"     -> "summoners_wrath"
 * - "Semi-Rifle Cannonade" -> "semi_rifle_cannonade"
 * - "  Ash Prime  Blueprint" -> "ash_prime_blueprint"
 */

const APOSTROPHES = `'’‘ʼ\``;
const POSSESSIVE_RE = new RegExp(`[${APOSTROPHES}](?=s\\b)`, 'g');
const SEPARATOR_RE = new RegExp(`[${APOSTROPHES}\\s-]+`, 'g');

export function normalizeItemName(name: string): string {
  if (!name) return '';

  return name
    .toLowerCase()
    .replace(POSSESSIVE_RE, '') // amar's -> amars
    .replace(/\./g, '')
    .replace(SEPARATOR_RE, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Comparison key for alias patterns: case-folded, hyphens and underscores
 * read as spaces, every other punctuation mark dropped.
 *
 * - "Semi-Shotgun Cannonade" -> "semi shotgun cannonade"
 * - "summoner’s_wrath"       -> "summoners wrath"
 */
export function aliasKey(text: string): string {
  if (!text) return '';

  return text
    .toLowerCase()
    .normalize('NFKC')
    .replace(/[-_]+/g, ' ')
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}
