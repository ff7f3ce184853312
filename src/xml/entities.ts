/**
 * XML entity decoding for character data and attribute values
 */

import { InvalidEntityError } from '../common/errors';
import type { SourcePosition } from './types';

const PREDEFINED: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const DECIMAL_RE = /^#[0-9]+$/;
const HEX_RE = /^#x[0-9a-fA-F]+$/;
// Longest reference we look ahead for before giving up on finding `;`.
const MAX_ENTITY_LENGTH = 32;

const keep = (literal: string) => literal;

function decodeReference(body: string): string | null {
  if (Object.prototype.hasOwnProperty.call(PREDEFINED, body)) {
    return PREDEFINED[body] ?? null;
  }

  let codePoint: number;
  if (DECIMAL_RE.test(body)) codePoint = parseInt(body.slice(1), 10);
  else if (HEX_RE.test(body)) codePoint = parseInt(body.slice(2), 16);
  else return null;

  if (
    codePoint === 0 ||
    codePoint > 0x10ffff ||
    (codePoint >= 0xd800 && codePoint <= 0xdfff)
  ) {
    return null;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Resolve entity and character references in `raw`.
 *
 * `start` is the offset of `raw` in the document; `locate` turns a
 * document offset into a position for the error. `normalize` rewrites the
 * literal runs between references, so offsets stay those of the input and
 * characters written as references are never normalized.
 */
export function decodeEntities(
  raw: string,
  start: number,
  locate: (offset: number) => SourcePosition,
  normalize: (literal: string) => string = keep
): string {
  let amp = raw.indexOf('&');
  if (amp === -1) return normalize(raw);

  let out = '';
  let last = 0;
  while (amp !== -1) {
    out += normalize(raw.slice(last, amp));
    const semi = raw.indexOf(';', amp + 1);
    if (semi === -1 || semi - amp > MAX_ENTITY_LENGTH) {
      const end = Math.min(raw.length, amp + MAX_ENTITY_LENGTH);
      const cut = raw.slice(amp, end).search(/[\s<"']/);
      const entity = raw.slice(amp, cut === -1 ? end : amp + cut);
      throw new InvalidEntityError(entity, locate(start + amp));
    }

    const entity = raw.slice(amp, semi + 1);
    const decoded = decodeReference(raw.slice(amp + 1, semi));
    if (decoded === null) {
      throw new InvalidEntityError(entity, locate(start + amp));
    }
    out += decoded;
    last = semi + 1;
    amp = raw.indexOf('&', last);
  }
  return out + normalize(raw.slice(last));
}
