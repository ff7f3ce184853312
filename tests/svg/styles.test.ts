import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { collectPaths, pathStyle, svgDimensions } from '../../src/svg/styles';
import { parseXml } from '../../src/xml/parse';
import { createElement } from '../../src/xml/types';

const glyph = readFileSync(
  fileURLToPath(new URL('../fixtures/glyph.svg', import.meta.url)),
  'utf8'
);

describe('pathStyle (SVG)', () => {
  it('should read the well-known fields from attributes', () => {
    const path = createElement('path', [
      ['d', 'M 0 0 Z'],
      ['fill', '#000'],
      ['fill-rule', 'evenodd'],
      ['stroke-width', '2'],
      ['stroke-linecap', 'round'],
      ['id', 'ignored'],
    ]);

    expect(pathStyle(path)).toEqual({
      d: 'M 0 0 Z',
      fill: '#000',
      fillRule: 'evenodd',
      strokeWidth: '2',
      strokeLinecap: 'round',
    });
  });

  it('should leave absent fields out and pass values through unvalidated', () => {
    const path = createElement('path', [['stroke-miterlimit', 'not-a-number']]);
    expect(pathStyle(path)).toEqual({ strokeMiterlimit: 'not-a-number' });
  });
});

describe('svgDimensions (SVG)', () => {
  it('should read size attributes of the root', () => {
    const root = parseXml(glyph);
    expect(svgDimensions(root)).toEqual({
      width: '20pt',
      height: '10pt',
      viewBox: '0 0 20 10',
      class: 'typst-doc',
    });
  });

  it('should return an empty view when no size is given', () => {
    expect(svgDimensions(createElement('svg'))).toEqual({});
  });
});

describe('collectPaths (SVG)', () => {
  it('should find paths in groups and definitions in document order', () => {
    const root = parseXml(glyph);
    expect(collectPaths(root)).toEqual([
      {
        d: 'M 0 0 v 10 h 20 v -10 Z ',
        class: 'typst-shape',
        fill: '#ffffff',
        fillRule: 'nonzero',
      },
      { d: 'M 1 2 L 3 4 Z ' },
    ]);
  });
});
