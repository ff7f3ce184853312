/**
 * RSX rendering
 *
 * Walks a parsed tree depth-first and writes it as nested component calls:
 *
 *   text {
 *       x: "10",
 *       "Hello, ",
 *       tspan {
 *           font_weight: "bold",
 *           "Typst!",
 *       },
 *   }
 *
 * Attributes come first in source order, then children in source order.
 * Every entry ends with a comma. Elements without entries render as `tag {}`.
 */

import { invariant } from '../dev/invariant';
import type { XmlNode } from '../xml/types';
import { quoteRsxString } from './escape';
import { attributeKey, elementIdentifier } from './names';
import { StringSink, type RenderSink } from './sink';

export interface RenderOptions {
  /**
   * One level of indentation. An empty string puts the whole tree on one
   * line with single spaces between entries.
   */
  indent?: string;
  /** Wrap the output in `rsx! { ... }`. */
  wrap?: boolean;
}

export const DEFAULT_INDENT = '    ';

type Layout = {
  sink: RenderSink;
  indent: string;
};

function lineBreak(layout: Layout, depth: number): void {
  if (layout.indent === '') layout.sink.write(' ');
  else layout.sink.write('\n' + layout.indent.repeat(depth));
}

// Pending output. Elements are expanded onto an explicit stack so nesting
// depth is bounded by memory, not by the call stack.
type Task =
  | { kind: 'node'; node: XmlNode; depth: number }
  | { kind: 'break'; depth: number }
  | { kind: 'write'; text: string };

function renderNode(root: XmlNode, layout: Layout, rootDepth: number): void {
  const { sink } = layout;
  const tasks: Task[] = [{ kind: 'node', node: root, depth: rootDepth }];

  for (let task = tasks.pop(); task; task = tasks.pop()) {
    if (task.kind === 'write') {
      sink.write(task.text);
      continue;
    }
    if (task.kind === 'break') {
      lineBreak(layout, task.depth);
      continue;
    }

    const { node, depth } = task;
    if (node.kind === 'text') {
      sink.write(quoteRsxString(node.value));
      continue;
    }

    const ident = elementIdentifier(node.name);
    if (node.attributes.size === 0 && node.children.length === 0) {
      sink.write(`${ident} {}`);
      continue;
    }

    sink.write(`${ident} {`);
    for (const [name, value] of node.attributes) {
      lineBreak(layout, depth + 1);
      sink.write(`${attributeKey(name)}: ${quoteRsxString(value)},`);
    }

    // Pushed in reverse so children pop in source order.
    tasks.push({ kind: 'write', text: '}' }, { kind: 'break', depth });
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      invariant(child !== undefined, 'Child index out of range', { i });
      tasks.push(
        { kind: 'write', text: ',' },
        { kind: 'node', node: child, depth: depth + 1 },
        { kind: 'break', depth: depth + 1 }
      );
    }
  }
}

export function renderToSink(
  root: XmlNode,
  sink: RenderSink,
  options: RenderOptions = {}
): void {
  const layout: Layout = { sink, indent: options.indent ?? DEFAULT_INDENT };

  if (options.wrap) {
    sink.write('rsx! {');
    lineBreak(layout, 1);
    renderNode(root, layout, 1);
    lineBreak(layout, 0);
    sink.write('}');
  } else {
    renderNode(root, layout, 0);
  }
  sink.end();
}

export function renderRsx(root: XmlNode, options: RenderOptions = {}): string {
  const sink = new StringSink();
  renderToSink(root, sink, options);
  return sink.toString();
}
