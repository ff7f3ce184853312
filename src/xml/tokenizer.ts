/**
 * Streaming XML tokenizer
 *
 * Single forward pass. Comments, processing instructions and the doctype
 * are consumed without producing tokens; CDATA sections come out as text.
 */

import { MalformedXmlError } from '../common/errors';
import { invariant } from '../dev/invariant';
import { decodeEntities } from './entities';
import type { SourcePosition } from './types';

export type XmlToken =
  | {
      type: 'start';
      name: string;
      attributes: Map<string, string>;
      selfClosing: boolean;
      position: SourcePosition;
    }
  | { type: 'end'; name: string; position: SourcePosition }
  | { type: 'text'; value: string; position: SourcePosition };

// NameStartChar and NameChar of XML 1.0 (fifth edition).
const NAME_START =
  'A-Za-z_:\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u02FF\\u0370-\\u037D' +
  '\\u037F-\\u1FFF\\u200C\\u200D\\u2070-\\u218F\\u2C00-\\u2FEF' +
  '\\u3001-\\uD7FF\\uF900-\\uFDCF\\uFDF0-\\uFFFD\\u{10000}-\\u{EFFFF}';
const NAME_CHAR = NAME_START + '\\-.0-9\\u00B7\\u0300-\\u036F\\u203F\\u2040';
const NAME_RE = new RegExp(`[${NAME_START}][${NAME_CHAR}]*`, 'uy');

const normalizeLineEnds = (text: string) => text.replace(/\r\n?/g, '\n');
// Attribute-value normalization: literal line breaks and tabs are spaces.
const normalizeAttributeSpace = (text: string) =>
  text.replace(/\r\n?|[\t\n]/g, ' ');
const WHITESPACE_RE = /[ \t\r\n]*/y;

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function describeChar(ch: string | undefined): string {
  return ch === undefined ? 'end of input' : JSON.stringify(ch);
}

export class XmlTokenizer {
  private pos = 0;

  // Line bookkeeping for `locate`. Tokens are produced front to back, so
  // the scan position only has to move forward.
  private lineOffset = 0;
  private line = 1;
  private lineStart = 0;

  constructor(private readonly input: string) {
    if (input.charCodeAt(0) === 0xfeff) this.pos = 1;
  }

  locate = (offset: number): SourcePosition => {
    invariant(
      offset >= 0 && offset <= this.input.length,
      'Source offset out of range',
      { offset, length: this.input.length }
    );
    if (offset < this.lineOffset) {
      this.lineOffset = 0;
      this.line = 1;
      this.lineStart = 0;
    }
    const { input } = this;
    for (let i = this.lineOffset; i < offset && i < input.length; i++) {
      if (input.charCodeAt(i) === 10) {
        this.line++;
        this.lineStart = i + 1;
      }
    }
    this.lineOffset = offset;
    return { offset, line: this.line, column: offset - this.lineStart + 1 };
  };

  /** Next token, or null at end of input. */
  next(): XmlToken | null {
    const { input } = this;
    while (this.pos < input.length) {
      const start = this.pos;

      if (input[start] !== '<') return this.readText(start);

      if (input.startsWith('<!--', start)) {
        this.skipPast('-->', start + 4, start, 'Unterminated comment');
        continue;
      }
      if (input.startsWith('<![CDATA[', start)) {
        const end = this.skipPast(
          ']]>',
          start + 9,
          start,
          'Unterminated CDATA section'
        );
        return {
          type: 'text',
          value: normalizeLineEnds(input.slice(start + 9, end - 3)),
          position: this.locate(start),
        };
      }
      if (input.startsWith('<!DOCTYPE', start)) {
        this.skipDoctype(start);
        continue;
      }
      if (input.startsWith('<!', start)) {
        throw this.malformed('Unsupported markup declaration', start);
      }
      if (input.startsWith('<?', start)) {
        this.skipPast(
          '?>',
          start + 2,
          start,
          'Unterminated processing instruction'
        );
        continue;
      }
      if (input.startsWith('</', start)) return this.readEndTag(start);
      return this.readStartTag(start);
    }
    return null;
  }

  private malformed(message: string, offset: number): MalformedXmlError {
    return new MalformedXmlError(message, this.locate(offset));
  }

  /** Move past the next `terminator` and return the new position. */
  private skipPast(
    terminator: string,
    from: number,
    start: number,
    message: string
  ): number {
    const idx = this.input.indexOf(terminator, from);
    if (idx === -1) throw this.malformed(message, start);
    this.pos = idx + terminator.length;
    return this.pos;
  }

  private skipDoctype(start: number): void {
    const { input } = this;
    let quote: string | null = null;
    let depth = 0;
    for (let i = start + 9; i < input.length; i++) {
      const ch = input[i];
      if (quote !== null) {
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '[') {
        depth++;
      } else if (ch === ']') {
        depth--;
      } else if (ch === '>' && depth <= 0) {
        this.pos = i + 1;
        return;
      }
    }
    throw this.malformed('Unterminated doctype declaration', start);
  }

  private readText(start: number): XmlToken {
    const { input } = this;
    const lt = input.indexOf('<', start);
    const end = lt === -1 ? input.length : lt;
    this.pos = end;
    return {
      type: 'text',
      value: decodeEntities(
        input.slice(start, end),
        start,
        this.locate,
        normalizeLineEnds
      ),
      position: this.locate(start),
    };
  }

  private readName(kind: string): string {
    NAME_RE.lastIndex = this.pos;
    const match = NAME_RE.exec(this.input);
    if (!match) {
      const ch = this.input[this.pos];
      throw this.malformed(
        ch === undefined || isWhitespace(ch) || ch === '>' || ch === '/'
          ? `Expected ${kind} name`
          : `Invalid character ${describeChar(ch)} in ${kind} name`,
        this.pos
      );
    }
    this.pos += match[0].length;
    return match[0];
  }

  private skipWhitespace(): boolean {
    WHITESPACE_RE.lastIndex = this.pos;
    WHITESPACE_RE.exec(this.input);
    const moved = WHITESPACE_RE.lastIndex !== this.pos;
    this.pos = WHITESPACE_RE.lastIndex;
    return moved;
  }

  private readEndTag(start: number): XmlToken {
    this.pos = start + 2;
    const name = this.readName('tag');
    this.skipWhitespace();
    const ch = this.input[this.pos];
    if (ch !== '>') {
      throw this.malformed(
        ch === undefined
          ? `Unterminated closing tag </${name}`
          : `Unexpected ${describeChar(ch)} in closing tag </${name}>`,
        ch === undefined ? start : this.pos
      );
    }
    this.pos++;
    return { type: 'end', name, position: this.locate(start) };
  }

  private readStartTag(start: number): XmlToken {
    const { input } = this;
    this.pos = start + 1;
    const name = this.readName('tag');
    const attributes = new Map<string, string>();

    for (;;) {
      const spaced = this.skipWhitespace();
      const ch = input[this.pos];

      if (ch === undefined) {
        throw this.malformed(`Unterminated tag <${name}`, start);
      }
      if (ch === '>') {
        this.pos++;
        return {
          type: 'start',
          name,
          attributes,
          selfClosing: false,
          position: this.locate(start),
        };
      }
      if (ch === '/') {
        if (input[this.pos + 1] !== '>') {
          throw this.malformed(`Expected '>' after '/' in <${name}>`, this.pos);
        }
        this.pos += 2;
        return {
          type: 'start',
          name,
          attributes,
          selfClosing: true,
          position: this.locate(start),
        };
      }
      if (!spaced) {
        throw this.malformed(
          attributes.size === 0
            ? `Invalid character ${describeChar(ch)} in tag name`
            : `Expected whitespace between attributes in <${name}>`,
          this.pos
        );
      }

      const attrStart = this.pos;
      const attrName = this.readName('attribute');
      if (attributes.has(attrName)) {
        throw this.malformed(
          `Duplicate attribute '${attrName}' in <${name}>`,
          attrStart
        );
      }
      this.skipWhitespace();
      if (input[this.pos] !== '=') {
        throw this.malformed(
          `Expected '=' after attribute '${attrName}'`,
          this.pos
        );
      }
      this.pos++;
      this.skipWhitespace();
      attributes.set(attrName, this.readAttributeValue(attrName));
    }
  }

  private readAttributeValue(attrName: string): string {
    const { input } = this;
    const quote = input[this.pos];
    if (quote !== '"' && quote !== "'") {
      throw this.malformed(
        `Expected quoted value for attribute '${attrName}'`,
        this.pos
      );
    }
    const valueStart = this.pos + 1;
    const valueEnd = input.indexOf(quote, valueStart);
    if (valueEnd === -1) {
      throw this.malformed(
        `Unterminated value for attribute '${attrName}'`,
        this.pos
      );
    }
    const raw = input.slice(valueStart, valueEnd);
    const lt = raw.indexOf('<');
    if (lt !== -1) {
      throw this.malformed(
        `'<' is not allowed in the value of attribute '${attrName}'`,
        valueStart + lt
      );
    }
    this.pos = valueEnd + 1;
    return decodeEntities(
      raw,
      valueStart,
      this.locate,
      normalizeAttributeSpace
    );
  }
}
