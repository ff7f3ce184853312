/**
 * Vite plugin
 *
 * Lets an app import converted RSX as a string:
 *
 *   import logo from './logo.svg?rsx';
 *   import formula from './formula.typ?rsx';
 *
 * `.svg` files are read as they are; `.typ` files go through typst first.
 */

import type { Plugin } from 'vite';
import { formatError } from '../common/errors';
import { convertDocument, type ConvertDocumentOptions } from '../pipeline';

export type TypstRsxVitePluginOptions = Omit<ConvertDocumentOptions, 'signal'>;

const RSX_QUERY = '?rsx';
const SOURCE_RE = /\.(svg|typ)$/i;

/** File path behind an `?rsx` import id, or null for other modules. */
export function rsxSourcePath(id: string): string | null {
  if (!id.endsWith(RSX_QUERY)) return null;
  const path = id.slice(0, -RSX_QUERY.length);
  return SOURCE_RE.test(path) ? path : null;
}

export function typstRsxVitePlugin(
  opts: TypstRsxVitePluginOptions = {}
): Plugin {
  return {
    name: 'typst-rsx:vite',
    enforce: 'pre',

    async load(id) {
      const path = rsxSourcePath(id);
      if (path === null) return null;

      this.addWatchFile(path);
      const result = await convertDocument(path, opts);
      if (result.error !== null) {
        return this.error(`${path}: ${formatError(result.error)}`);
      }
      return `export default ${JSON.stringify(result.data)};\n`;
    },
  };
}

export default typstRsxVitePlugin;
