import { promises as fs } from 'fs';
import type { ItemCategory, RawLineEntry } from '../types';
import { FatalError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('input-reader');

const COMMENT_RE = /^(#|\/\/)/;
const INLINE_LABEL_RE = /^([\p{L}\s]+):\s*/u;

// Checked in order; first match wins
const SECTION_CATEGORIES: Array<{ regex: RegExp; category: ItemCategory }> = [
  { regex: /arcane/i, category: 'Arcane' },
  { regex: /\b(mods?|stances?|auras?|augments?)\b/i, category: 'Mod' },
];

export function categoryForLabel(label: string): ItemCategory | undefined {
  return SECTION_CATEGORIES.find(({ regex }) => regex.test(label))?.category;
}

export function isCommentLine(text: string): boolean {
  return COMMENT_RE.test(text.trim());
}

/**
 * Splits a donation message into entries.
 *
 * Lines such as `warframe mods:` open a section whose category hint applies
 * to the lines below it. A label in front of entries (`stances: 2 foo, 1 bar`)
 * applies only to that line. Comma separated entries on one line share the
 * line number.
 */
export function splitInput(text: string): RawLineEntry[] {
  const entries: RawLineEntry[] = [];
  let sectionHint: ItemCategory | undefined;

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const lineNumber = index + 1;
    let line = rawLine.replace(/^\uFEFF/, '').trim();

    if (!line || isCommentLine(line)) return;

    // Any line ending in a colon opens a section, whatever else it contains
    if (line.endsWith(':')) {
      const label = line.slice(0, -1).trim();
      sectionHint = categoryForLabel(label);
      log.debug({ lineNumber, label, categoryHint: sectionHint }, 'Section header');
      return;
    }

    let hint = sectionHint;
    const label = INLINE_LABEL_RE.exec(line);
    if (label) {
      hint = categoryForLabel(label[1]) ?? sectionHint;
      line = line.slice(label[0].length);
    }

    for (const part of line.split(',')) {
      const entryText = part.trim();
      if (!entryText) continue;
      entries.push(hint ? { text: entryText, lineNumber, categoryHint: hint } : { text: entryText, lineNumber });
    }
  });

  return entries;
}

export async function readDonationFile(filePath: string): Promise<RawLineEntry[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FatalError(`Cannot read input file ${filePath}`, { filePath }, { cause: error });
  }

  const entries = splitInput(text);
  log.info({ filePath, entries: entries.length }, 'Input loaded');
  return entries;
}
