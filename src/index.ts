/**
 * typst-rsx: SVG (and typst documents) to RSX source text
 *
 * Entry points return `{ data, error }` results. The lower layers
 * (parser, renderer) are exported for callers that want the tree.
 */

// Pipeline
export { convertSvg, convertDocument, compilerFor } from './pipeline';
export type {
  ConvertResult,
  ConvertOptions,
  ConvertDocumentOptions,
} from './pipeline';

// Errors
export {
  ConvertError,
  ExternalCompileFailedError,
  MalformedXmlError,
  MismatchedTagError,
  UnclosedElementError,
  NoRootElementError,
  MultipleRootElementsError,
  InvalidEntityError,
  isConvertError,
  formatError,
} from './common/errors';
export type { ConvertErrorCode, ConvertStage } from './common/errors';

// XML tree
export { parseXml } from './xml/parse';
export type { ParseOptions } from './xml/parse';
export {
  createElement,
  createText,
  isElement,
  isText,
  countElements,
} from './xml/types';
export type {
  XmlNode,
  XmlElement,
  XmlText,
  Attributes,
  SourcePosition,
} from './xml/types';

// RSX output
export { renderRsx, renderToSink, DEFAULT_INDENT } from './rsx/render';
export type { RenderOptions } from './rsx/render';
export { StringSink } from './rsx/sink';
export type { RenderSink } from './rsx/sink';
export { escapeRsxString, quoteRsxString, parseRsxString } from './rsx/escape';
export {
  toRsxIdentifier,
  attributeKey,
  elementIdentifier,
} from './rsx/names';

// Styling views
export {
  pathStyle,
  svgDimensions,
  collectPaths,
  STYLE_ATTRIBUTES,
} from './svg/styles';
export type { PathStyle, SvgDimensions } from './svg/styles';

// External compiler
export { TypstCompiler, FileSvgSource } from './compile/typst';
export type {
  SvgCompiler,
  CompileOptions,
  TypstCompilerOptions,
} from './compile/typst';

// Configuration
export { resolveConfig, DEFAULT_TYPST_BIN } from './config';
export type { ConvertConfig, ConfigOverrides } from './config';
