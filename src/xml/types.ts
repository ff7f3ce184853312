/**
 * XML node model
 *
 * The parser builds these once per document; nothing mutates them
 * afterwards. Each element owns its children exclusively.
 */

export type Attributes = ReadonlyMap<string, string>;

export interface XmlElement {
  readonly kind: 'element';
  /** Tag name exactly as written, prefix included (`svg:path`). */
  readonly name: string;
  /** Source order is preserved. */
  readonly attributes: Attributes;
  readonly children: readonly XmlNode[];
}

export interface XmlText {
  readonly kind: 'text';
  /** Character data with entities already decoded. */
  readonly value: string;
}

export type XmlNode = XmlElement | XmlText;

/** Location in the input; line and column are 1-based. */
export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export function createElement(
  name: string,
  attributes: Iterable<readonly [string, string]> = [],
  children: readonly XmlNode[] = []
): XmlElement {
  return {
    kind: 'element',
    name,
    attributes: new Map(attributes),
    children,
  };
}

export function createText(value: string): XmlText {
  return { kind: 'text', value };
}

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === 'element';
}

export function isText(node: XmlNode): node is XmlText {
  return node.kind === 'text';
}

/** Number of element nodes in the subtree, the root included. */
export function countElements(node: XmlNode): number {
  let count = 0;
  const pending: XmlNode[] = [node];
  for (let next = pending.pop(); next; next = pending.pop()) {
    if (next.kind === 'text') continue;
    count++;
    for (const child of next.children) pending.push(child);
  }
  return count;
}
