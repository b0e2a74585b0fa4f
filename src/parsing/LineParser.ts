import type { ParsedRequest, RawLineEntry } from '../types';
import { ParseError } from '../utils/errors';
import { isCommentLine } from '../input/InputReader';

/*
 * `<qty><sep><connector?><name>` where sep is whitespace or x/X:
 *   "3 amar's hatred", "3x amar's hatred", "3 x amar's hatred", "2 copies of vitality"
 * The x-separator alternatives come first so "3 xaku prime" still reads as a name.
 */
const QUANTITY_RE = /^(\d+)(?:\s*[xX]\s+|[xX](?=\S)|\s+)(.*)$/;
const BARE_QUANTITY_RE = /^\d+\s*[xX]?$/;
const CONNECTOR_RE = /^(?:copies\s+of|copy\s+of|of)(?:\s+|$)/i;
const MAX_QUANTITY = 100000;

export function parseLine(entry: RawLineEntry): ParsedRequest {
  const text = entry.text.trim();

  if (!text) {
    throw new ParseError('Empty line', entry.lineNumber, entry.text);
  }
  if (isCommentLine(text)) {
    throw new ParseError('Line contains only a comment', entry.lineNumber, entry.text);
  }

  if (BARE_QUANTITY_RE.test(text)) {
    throw new ParseError(`Quantity ${text} has no item name`, entry.lineNumber, entry.text);
  }

  const match = QUANTITY_RE.exec(text);
  if (!match) {
    return { quantity: 1, rawName: text };
  }

  const quantity = Number.parseInt(match[1], 10);
  const rawName = match[2].replace(CONNECTOR_RE, '').trim();

  if (quantity < 1 || quantity > MAX_QUANTITY) {
    throw new ParseError(`Quantity ${match[1]} is out of range`, entry.lineNumber, entry.text);
  }
  if (!rawName) {
    throw new ParseError(`Quantity ${quantity} has no item name`, entry.lineNumber, entry.text);
  }

  return { quantity, rawName };
}
