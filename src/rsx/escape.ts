/**
 * RSX string literal escaping
 *
 * Text and attribute values are emitted as double-quoted literals. Inside
 * `rsx!` those literals are format strings, so braces are doubled on top of
 * the usual backslash escapes.
 */

const ESCAPE_TEST_RE = /[\\"{}\u0000-\u001f\u007f]/;
const ESCAPE_RE = /[\\"{}\u0000-\u001f\u007f]/g;

function mapEscape(ch: string): string {
  switch (ch) {
    case '\\':
      return '\\\\';
    case '"':
      return '\\"';
    case '{':
      return '{{';
    case '}':
      return '}}';
    case '\n':
      return '\\n';
    case '\r':
      return '\\r';
    case '\t':
      return '\\t';
    case '\0':
      return '\\0';
    default:
      return `\\u{${ch.charCodeAt(0).toString(16)}}`;
  }
}

/** Escape `text` for use between the quotes of an RSX string literal. */
export function escapeRsxString(text: string): string {
  // Fast path: most SVG text and attribute values need nothing
  if (!ESCAPE_TEST_RE.test(text)) return text;
  return text.replace(ESCAPE_RE, mapEscape);
}

export function quoteRsxString(text: string): string {
  return `"${escapeRsxString(text)}"`;
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  '"': '"',
  "'": "'",
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
};

/**
 * Decode a double-quoted RSX string literal back into its text.
 * Interpolations (`{name}`) have no text equivalent and are rejected.
 *
 * @throws {SyntaxError} when `literal` is not a plain string literal
 */
export function parseRsxString(literal: string): string {
  if (literal.length < 2 || literal[0] !== '"' || !literal.endsWith('"')) {
    throw new SyntaxError('RSX string literal must be enclosed in quotes');
  }

  let out = '';
  const end = literal.length - 1;
  let i = 1;
  while (i < end) {
    const ch = literal[i];

    if (ch === '"') {
      throw new SyntaxError(`Unescaped quote at index ${i}`);
    }

    if (ch === '{' || ch === '}') {
      if (literal[i + 1] !== ch || i + 1 >= end) {
        throw new SyntaxError(`Unpaired '${ch}' at index ${i}`);
      }
      out += ch;
      i += 2;
      continue;
    }

    if (ch !== '\\') {
      out += ch;
      i++;
      continue;
    }

    const next = literal[i + 1];
    if (next === undefined || i + 1 >= end) {
      throw new SyntaxError(`Dangling backslash at index ${i}`);
    }
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }
    if (next === 'u') {
      const close = literal.indexOf('}', i);
      const hex = literal.slice(i + 3, close);
      if (
        literal[i + 2] !== '{' ||
        close === -1 ||
        !/^[0-9a-fA-F]{1,6}$/.test(hex)
      ) {
        throw new SyntaxError(`Malformed unicode escape at index ${i}`);
      }
      const codePoint = parseInt(hex, 16);
      if (codePoint > 0x10ffff) {
        throw new SyntaxError(`Unicode escape out of range at index ${i}`);
      }
      out += String.fromCodePoint(codePoint);
      i = close + 1;
      continue;
    }
    if (next === '\n') {
      // Line continuation: the newline and leading whitespace are dropped.
      i += 2;
      while (i < end && /\s/.test(literal[i] ?? '')) i++;
      continue;
    }
    throw new SyntaxError(`Unknown escape '\\${next}' at index ${i}`);
  }
  return out;
}
