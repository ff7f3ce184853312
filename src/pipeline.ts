/**
 * Conversion entry points
 *
 * document --compile--> SVG --parse--> tree --render--> RSX text
 *
 * Both entry points report failures as a `{ data, error }` result instead
 * of throwing. Only `ConvertError`s are folded into the result; anything
 * else is a bug and propagates.
 */

import {
  FileSvgSource,
  TypstCompiler,
  type SvgCompiler,
} from './compile/typst';
import { isConvertError, type ConvertError } from './common/errors';
import { resolveConfig, type ConfigOverrides } from './config';
import { isDebugEnabled, logger } from './dev/logger';
import { renderRsx, type RenderOptions } from './rsx/render';
import { parseXml, type ParseOptions } from './xml/parse';
import { countElements } from './xml/types';

export type ConvertResult =
  | { data: string; error: null }
  | { data: null; error: ConvertError };

export interface ConvertOptions extends ParseOptions, RenderOptions {}

export interface ConvertDocumentOptions extends ConvertOptions, ConfigOverrides {
  signal?: AbortSignal;
  /** Use this instead of picking a compiler from the file extension. */
  compiler?: SvgCompiler;
}

function fail(error: unknown): ConvertResult {
  if (isConvertError(error)) {
    logger.debug(`${error.stage} failed:`, error.code, error.message);
    return { data: null, error };
  }
  throw error;
}

/** Parse SVG text and render it as RSX. Runs synchronously. */
export function convertSvg(
  svg: string | Uint8Array,
  options: ConvertOptions = {}
): ConvertResult {
  try {
    const root = parseXml(svg, options);
    if (isDebugEnabled()) {
      logger.debug(`parsed <${root.name}> with ${countElements(root)} elements`);
    }
    return { data: renderRsx(root, options), error: null };
  } catch (error) {
    return fail(error);
  }
}

/** Compiler for a path: `.svg` files are read as they are, the rest go to typst. */
export function compilerFor(
  inputPath: string,
  overrides: ConfigOverrides = {}
): SvgCompiler {
  if (inputPath.toLowerCase().endsWith('.svg')) return new FileSvgSource();
  return new TypstCompiler({ bin: resolveConfig(overrides).typstBin });
}

/**
 * Compile a typesetting document (or read an SVG file) and convert the
 * resulting SVG to RSX.
 */
export async function convertDocument(
  inputPath: string,
  options: ConvertDocumentOptions = {}
): Promise<ConvertResult> {
  const config = resolveConfig(options);
  const compiler = options.compiler ?? compilerFor(inputPath, config);

  let svg: string;
  try {
    svg = await compiler.compile(inputPath, {
      signal: options.signal,
      timeoutMs: config.timeoutMs,
    });
  } catch (error) {
    return fail(error);
  }
  logger.debug(`compiled ${inputPath} (${svg.length} chars of SVG)`);

  return convertSvg(svg, options);
}
