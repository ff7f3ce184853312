/**
 * Conversion error taxonomy
 *
 * Every failure of a conversion is a `ConvertError`. The `code` field
 * discriminates the variant and `stage` tells which pipeline step raised it.
 */

import type { SourcePosition } from '../xml/types';

export type ConvertStage = 'compile' | 'parse' | 'render';

export type ConvertErrorCode =
  | 'EXTERNAL_COMPILE_FAILED'
  | 'MALFORMED_XML'
  | 'MISMATCHED_TAG'
  | 'UNCLOSED_ELEMENT'
  | 'NO_ROOT_ELEMENT'
  | 'MULTIPLE_ROOT_ELEMENTS'
  | 'INVALID_ENTITY';

export abstract class ConvertError extends Error {
  abstract readonly code: ConvertErrorCode;
  abstract readonly stage: ConvertStage;
  /** Where in the SVG input the failure was detected, when it has a place. */
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(message);
    this.position = position;
  }
}

export class ExternalCompileFailedError extends ConvertError {
  readonly code = 'EXTERNAL_COMPILE_FAILED';
  readonly stage = 'compile';
  constructor(
    message: string,
    /** Captured stderr of the compiler, trimmed. */
    readonly diagnostics: string = '',
    readonly exitCode: number | null = null
  ) {
    super(message);
    this.name = 'ExternalCompileFailedError';
    Object.setPrototypeOf(this, ExternalCompileFailedError.prototype);
  }
}

export class MalformedXmlError extends ConvertError {
  readonly code = 'MALFORMED_XML';
  readonly stage = 'parse';
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'MalformedXmlError';
    Object.setPrototypeOf(this, MalformedXmlError.prototype);
  }
}

export class MismatchedTagError extends ConvertError {
  readonly code = 'MISMATCHED_TAG';
  readonly stage = 'parse';
  constructor(
    /** Innermost open tag, or null when nothing was open. */
    readonly expected: string | null,
    readonly found: string,
    position: SourcePosition
  ) {
    super(
      expected === null
        ? `Closing tag </${found}> has no matching open tag`
        : `Expected </${expected}> but found </${found}>`,
      position
    );
    this.name = 'MismatchedTagError';
    Object.setPrototypeOf(this, MismatchedTagError.prototype);
  }
}

export class UnclosedElementError extends ConvertError {
  readonly code = 'UNCLOSED_ELEMENT';
  readonly stage = 'parse';
  constructor(
    readonly tag: string,
    position: SourcePosition
  ) {
    super(`Element <${tag}> is never closed`, position);
    this.name = 'UnclosedElementError';
    Object.setPrototypeOf(this, UnclosedElementError.prototype);
  }
}

export class NoRootElementError extends ConvertError {
  readonly code = 'NO_ROOT_ELEMENT';
  readonly stage = 'parse';
  constructor() {
    super('Document has no root element');
    this.name = 'NoRootElementError';
    Object.setPrototypeOf(this, NoRootElementError.prototype);
  }
}

export class MultipleRootElementsError extends ConvertError {
  readonly code = 'MULTIPLE_ROOT_ELEMENTS';
  readonly stage = 'parse';
  constructor(
    readonly tag: string,
    position: SourcePosition
  ) {
    super(
      `Document has more than one root element (second root <${tag}>)`,
      position
    );
    this.name = 'MultipleRootElementsError';
    Object.setPrototypeOf(this, MultipleRootElementsError.prototype);
  }
}

export class InvalidEntityError extends ConvertError {
  readonly code = 'INVALID_ENTITY';
  readonly stage = 'parse';
  constructor(
    /** The raw reference as written, e.g. `&nbsp;`. */
    readonly entity: string,
    position: SourcePosition
  ) {
    super(`Invalid entity reference ${entity}`, position);
    this.name = 'InvalidEntityError';
    Object.setPrototypeOf(this, InvalidEntityError.prototype);
  }
}

export function isConvertError(value: unknown): value is ConvertError {
  return value instanceof ConvertError;
}

/**
 * Diagnostic text for the error stream, e.g.
 * `MISMATCHED_TAG at 1:9: Expected </a> but found </b>`.
 * Compiler diagnostics, when captured, follow on the next lines.
 */
export function formatError(error: ConvertError): string {
  const where = error.position
    ? ` at ${error.position.line}:${error.position.column}`
    : '';
  let out = `${error.code}${where}: ${error.message}`;
  if (error instanceof ExternalCompileFailedError && error.diagnostics) {
    out += `\n${error.diagnostics}`;
  }
  return out;
}
