/**
 * XML tree builder
 *
 * Drives the tokenizer and assembles elements on an explicit stack of open
 * elements. Fails on the first structural problem; nothing partial is ever
 * returned.
 */

import {
  MalformedXmlError,
  MismatchedTagError,
  MultipleRootElementsError,
  NoRootElementError,
  UnclosedElementError,
} from '../common/errors';
import { unreachable } from '../dev/invariant';
import { XmlTokenizer } from './tokenizer';
import type { SourcePosition, XmlElement, XmlNode } from './types';

export interface ParseOptions {
  /**
   * Keep text nodes that contain only whitespace. Defaults to true; typst
   * indents its SVG output, so callers that only want the drawing can turn
   * this off.
   */
  preserveWhitespace?: boolean;
}

type OpenElement = {
  name: string;
  attributes: Map<string, string>;
  children: XmlNode[];
  position: SourcePosition;
};

const WHITESPACE_ONLY_RE = /^[ \t\r\n]*$/;

function appendText(parent: OpenElement, value: string): void {
  const last = parent.children[parent.children.length - 1];
  if (last && last.kind === 'text') {
    parent.children[parent.children.length - 1] = {
      kind: 'text',
      value: last.value + value,
    };
    return;
  }
  parent.children.push({ kind: 'text', value });
}

function freeze(open: OpenElement, preserveWhitespace: boolean): XmlElement {
  return {
    kind: 'element',
    name: open.name,
    attributes: open.attributes,
    children: preserveWhitespace
      ? open.children
      : open.children.filter(
          (child) =>
            child.kind === 'element' || !WHITESPACE_ONLY_RE.test(child.value)
        ),
  };
}

function decodeInput(input: string | Uint8Array): string {
  if (typeof input === 'string') return input;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch {
    throw new MalformedXmlError('Input is not valid UTF-8', {
      offset: 0,
      line: 1,
      column: 1,
    });
  }
}

/**
 * Parse an XML document and return its root element.
 *
 * @throws {ConvertError} `MalformedXmlError`, `InvalidEntityError`,
 * `MismatchedTagError`, `UnclosedElementError`, `NoRootElementError` or
 * `MultipleRootElementsError`.
 */
export function parseXml(
  input: string | Uint8Array,
  options: ParseOptions = {}
): XmlElement {
  const preserveWhitespace = options.preserveWhitespace ?? true;
  const tokenizer = new XmlTokenizer(decodeInput(input));
  const stack: OpenElement[] = [];
  let root: XmlElement | null = null;

  for (let token = tokenizer.next(); token; token = tokenizer.next()) {
    const parent = stack[stack.length - 1];

    switch (token.type) {
      case 'start': {
        if (!parent && root) {
          throw new MultipleRootElementsError(token.name, token.position);
        }
        const open: OpenElement = {
          name: token.name,
          attributes: token.attributes,
          children: [],
          position: token.position,
        };
        if (token.selfClosing) {
          const element = freeze(open, preserveWhitespace);
          if (parent) parent.children.push(element);
          else root = element;
        } else {
          stack.push(open);
        }
        break;
      }

      case 'end': {
        if (!parent) {
          throw new MismatchedTagError(null, token.name, token.position);
        }
        if (parent.name !== token.name) {
          throw new MismatchedTagError(parent.name, token.name, token.position);
        }
        stack.pop();
        const element = freeze(parent, preserveWhitespace);
        const grandparent = stack[stack.length - 1];
        if (grandparent) grandparent.children.push(element);
        else root = element;
        break;
      }

      case 'text': {
        if (!parent) {
          if (!WHITESPACE_ONLY_RE.test(token.value)) {
            throw new MalformedXmlError(
              'Character data outside the root element',
              token.position
            );
          }
          break;
        }
        if (token.value === '') break;
        appendText(parent, token.value);
        break;
      }

      default:
        unreachable(token, 'token');
    }
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw new UnclosedElementError(unclosed.name, unclosed.position);
  }
  if (!root) throw new NoRootElementError();
  return root;
}
