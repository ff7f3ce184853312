import { describe, it, expect } from 'vitest';
import { renderRsx, renderToSink } from '../../src/rsx/render';
import type { RenderSink } from '../../src/rsx/sink';
import { StringSink } from '../../src/rsx/sink';
import { createElement, createText } from '../../src/xml/types';
import { parseXml } from '../../src/xml/parse';

const greeting = parseXml(
  '<svg><text x="10" y="20">Hello, <tspan font-weight="bold">Typst!</tspan></text></svg>'
);

describe('renderRsx layout (RSX)', () => {
  it('should render nested elements with attributes before children', () => {
    expect(renderRsx(greeting)).toBe(
      [
        'svg {',
        '    text {',
        '        x: "10",',
        '        y: "20",',
        '        "Hello, ",',
        '        tspan {',
        '            font_weight: "bold",',
        '            "Typst!",',
        '        },',
        '    },',
        '}',
      ].join('\n')
    );
  });

  it('should put everything on one line given an empty indent', () => {
    expect(renderRsx(greeting, { indent: '' })).toBe(
      'svg { text { x: "10", y: "20", "Hello, ", tspan { font_weight: "bold", "Typst!", }, }, }'
    );
  });

  it('should use the given indent for each level', () => {
    const rect = createElement('rect', [['width', '5']]);
    expect(renderRsx(createElement('g', [], [rect]), { indent: '\t' })).toBe(
      'g {\n\trect {\n\t\twidth: "5",\n\t},\n}'
    );
  });

  it('should render an element without entries as an empty body', () => {
    expect(renderRsx(parseXml('<svg><rect/></svg>'))).toBe(
      'svg {\n    rect {},\n}'
    );
  });

  it('should render a lone attribute on its own line', () => {
    expect(renderRsx(parseXml('<rect width="5"/>'))).toBe(
      'rect {\n    width: "5",\n}'
    );
  });

  it('should wrap the tree in an rsx! block when asked', () => {
    expect(renderRsx(createElement('g'), { wrap: true })).toBe(
      'rsx! {\n    g {}\n}'
    );
    expect(
      renderRsx(createElement('g', [['id', 'a']]), { wrap: true, indent: '' })
    ).toBe('rsx! { g { id: "a", } }');
  });

  it('should render a bare text node as a string literal', () => {
    expect(renderRsx(createText('a "b"'))).toBe('"a \\"b\\""');
  });
});

describe('renderRsx naming and escaping (RSX)', () => {
  it('should escape keywords and quote prefixed attribute names', () => {
    const use = createElement('use', [
      ['xlink:href', '#g'],
      ['type', 'x'],
    ]);
    expect(renderRsx(use)).toBe(
      'r#use {\n    "xlink:href": "#g",\n    r#type: "x",\n}'
    );
  });

  it('should escape quotes, braces and newlines in values and text', () => {
    const el = createElement(
      'text',
      [['data-json', '{"a":1}']],
      [createText('line 1\nline 2')]
    );
    expect(renderRsx(el)).toBe(
      'text {\n    data_json: "{{\\"a\\":1}}",\n    "line 1\\nline 2",\n}'
    );
  });

  it('should keep whitespace-only text nodes as escaped literals', () => {
    const root = parseXml('<svg>\n  <g/>\n</svg>');
    expect(renderRsx(root)).toBe(
      'svg {\n    "\\n  ",\n    g {},\n    "\\n",\n}'
    );
  });

  it('should keep attribute order as written', () => {
    const root = parseXml('<path z="1" d="M0 0" a="2"/>');
    expect(renderRsx(root, { indent: '' })).toBe(
      'path { z: "1", d: "M0 0", a: "2", }'
    );
  });
});

describe('renderToSink (RSX)', () => {
  it('should write chunks in order and end the sink once', () => {
    const chunks: string[] = [];
    let ended = 0;
    const sink: RenderSink = {
      write: (chunk) => chunks.push(chunk),
      end: () => {
        ended++;
      },
    };

    renderToSink(createElement('g', [['id', 'a']]), sink, { indent: '' });

    expect(chunks.join('')).toBe('g { id: "a", }');
    expect(ended).toBe(1);
  });

  it('should produce the same text through a StringSink as renderRsx', () => {
    const sink = new StringSink();
    renderToSink(greeting, sink);
    expect(sink.toString()).toBe(renderRsx(greeting));
  });

  it('should render large trees without losing buffered output', () => {
    const paths = Array.from({ length: 2000 }, (_, i) =>
      createElement('path', [['d', `M ${i} 0`]])
    );
    const out = renderRsx(createElement('g', [], paths), { indent: '' });

    expect(out.startsWith('g { path { d: "M 0 0", }, ')).toBe(true);
    expect(out.endsWith('path { d: "M 1999 0", }, }')).toBe(true);
    expect(out.split('path {').length - 1).toBe(2000);
  });
});

describe('renderRsx nesting depth (RSX)', () => {
  it('should render a chain deeper than the call stack', () => {
    const depth = 50_000;
    let node = createElement('g');
    for (let i = 1; i < depth; i++) node = createElement('g', [], [node]);

    expect(renderRsx(node, { indent: '' })).toBe(
      'g { '.repeat(depth - 1) + 'g {}' + ', }'.repeat(depth - 1)
    );
  });

  it('should keep siblings in source order when expanding children', () => {
    const root = createElement('g', [], [
      createText('a'),
      createElement('b', [], [createText('c'), createElement('d')]),
      createText('e'),
    ]);
    expect(renderRsx(root, { indent: '' })).toBe(
      'g { "a", b { "c", d {}, }, "e", }'
    );
  });
});
