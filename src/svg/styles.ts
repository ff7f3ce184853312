/**
 * Read-only styling views over SVG elements
 *
 * These are projections computed on demand from an element's attributes.
 * The renderer never consults them; they exist for consumers that want the
 * well-known shape fields by name. Values are passed through as written.
 */

import type { XmlElement, XmlNode } from '../xml/types';

/** Field name -> SVG attribute name. */
export const STYLE_ATTRIBUTES = {
  d: 'd',
  class: 'class',
  fill: 'fill',
  stroke: 'stroke',
  fillRule: 'fill-rule',
  strokeWidth: 'stroke-width',
  strokeLinecap: 'stroke-linecap',
  strokeLinejoin: 'stroke-linejoin',
  strokeMiterlimit: 'stroke-miterlimit',
} as const;

export type PathStyle = {
  -readonly [K in keyof typeof STYLE_ATTRIBUTES]?: string;
};

export type SvgDimensions = {
  width?: string;
  height?: string;
  viewBox?: string;
  class?: string;
};

const STYLE_FIELDS: ReadonlyArray<keyof typeof STYLE_ATTRIBUTES> = [
  'd',
  'class',
  'fill',
  'stroke',
  'fillRule',
  'strokeWidth',
  'strokeLinecap',
  'strokeLinejoin',
  'strokeMiterlimit',
];

export function pathStyle(element: XmlElement): PathStyle {
  const style: PathStyle = {};
  for (const field of STYLE_FIELDS) {
    const value = element.attributes.get(STYLE_ATTRIBUTES[field]);
    if (value !== undefined) style[field] = value;
  }
  return style;
}

/** Size attributes of the root `<svg>`, as typst writes them. */
export function svgDimensions(root: XmlElement): SvgDimensions {
  const dims: SvgDimensions = {};
  for (const key of ['width', 'height', 'viewBox', 'class'] as const) {
    const value = root.attributes.get(key);
    if (value !== undefined) dims[key] = value;
  }
  return dims;
}

/**
 * Every `<path>` in document order, wherever it sits (groups, `<defs>`,
 * `<symbol>`).
 */
export function collectPaths(root: XmlNode): PathStyle[] {
  const out: PathStyle[] = [];
  const pending: XmlNode[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    if (node.kind === 'text') continue;
    if (node.name === 'path') out.push(pathStyle(node));
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) pending.push(child);
    }
  }
  return out;
}
