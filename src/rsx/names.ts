/**
 * Tag and attribute names -> RSX identifiers
 */

import { quoteRsxString } from './escape';

// Strict, reserved and edition-dependent keywords of the host language.
const KEYWORDS = new Set([
  'abstract',
  'as',
  'async',
  'await',
  'become',
  'box',
  'break',
  'const',
  'continue',
  'crate',
  'do',
  'dyn',
  'else',
  'enum',
  'extern',
  'false',
  'final',
  'fn',
  'for',
  'gen',
  'if',
  'impl',
  'in',
  'let',
  'loop',
  'macro',
  'match',
  'mod',
  'move',
  'mut',
  'override',
  'priv',
  'pub',
  'ref',
  'return',
  'self',
  'Self',
  'static',
  'struct',
  'super',
  'trait',
  'true',
  'try',
  'type',
  'typeof',
  'unsafe',
  'unsized',
  'use',
  'virtual',
  'where',
  'while',
  'yield',
]);

// Keywords that cannot be written as raw identifiers.
const NO_RAW = new Set(['crate', 'self', 'Self', 'super', '_']);

const IDENTIFIER_RE = /^[\p{XID_Start}_][\p{XID_Continue}]*$/u;
const NON_IDENTIFIER_CHAR_RE = /[^\p{XID_Continue}]/gu;

/** `stroke-width` -> `stroke_width`. Case is kept; applying it twice is a no-op. */
export function toRsxIdentifier(name: string): string {
  return name.replace(/-/g, '_');
}

export function isRsxIdentifier(name: string): boolean {
  return name !== '_' && IDENTIFIER_RE.test(name);
}

function escapeKeyword(ident: string): string {
  if (NO_RAW.has(ident)) return `${ident}_`;
  if (KEYWORDS.has(ident)) return `r#${ident}`;
  return ident;
}

/**
 * Key for an attribute entry. Names that do not form an identifier once
 * hyphens are mapped (`xlink:href`) become quoted custom-attribute keys.
 */
export function attributeKey(name: string): string {
  const ident = toRsxIdentifier(name);
  if (ident === '_' || isRsxIdentifier(ident)) return escapeKeyword(ident);
  return quoteRsxString(ident);
}

/** Identifier for an element, e.g. `use` -> `r#use`, `svg:g` -> `svg_g`. */
export function elementIdentifier(name: string): string {
  let ident = toRsxIdentifier(name).replace(NON_IDENTIFIER_CHAR_RE, '_');
  if (!isRsxIdentifier(ident) && ident !== '_') ident = `_${ident}`;
  return escapeKeyword(ident);
}
