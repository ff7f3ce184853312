/**
 * Command-line front end
 *
 * Exit codes: 0 on success, 1 when the conversion fails, 2 on bad usage.
 */

import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { formatError } from '../common/errors';
import { convertDocument, type ConvertDocumentOptions } from '../pipeline';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  writeFile(path: string, text: string): Promise<void>;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  writeFile: (path, text) => writeFile(path, text, 'utf8'),
};

export const USAGE = `Usage: typst-rsx <input> [options]

Convert a typst document (or an .svg file) to RSX source.

Options:
  -o, --output <file>   write the RSX to <file> instead of stdout
      --wrap            wrap the output in rsx! { ... }
      --compact         drop whitespace-only text nodes
      --indent <n>      spaces per indentation level (0 = single line)
      --typst <bin>     typst executable (env TYPST_RSX_BIN)
      --timeout <ms>    kill typst after <ms> (env TYPST_RSX_TIMEOUT_MS)
      --debug           log pipeline stages to stderr
  -h, --help            show this help
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

function parseCount(raw: string, flag: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`${flag} expects an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

type Invocation =
  | { help: true }
  | {
      help: false;
      input: string;
      output: string | undefined;
      options: ConvertDocumentOptions;
    };

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        wrap: { type: 'boolean' },
        compact: { type: 'boolean' },
        indent: { type: 'string' },
        typst: { type: 'string' },
        timeout: { type: 'string' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseInvocation(argv: readonly string[]): Invocation {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { help: true };

  if (positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0
        ? 'Missing input document'
        : `Expected one input document, got ${positionals.length}`
    );
  }

  if (values.debug) process.env.TYPST_RSX_DEBUG = '1';

  const options: ConvertDocumentOptions = {
    wrap: values.wrap ?? false,
    preserveWhitespace: !values.compact,
  };
  if (values.indent !== undefined) {
    options.indent = ' '.repeat(parseCount(values.indent, '--indent', 0));
  }
  if (values.typst !== undefined) options.typstBin = values.typst;
  if (values.timeout !== undefined) {
    options.timeoutMs = parseCount(values.timeout, '--timeout', 1);
  }

  return {
    help: false,
    input: positionals[0] ?? '',
    output: values.output,
    options,
  };
}

export async function runCli(
  argv: readonly string[],
  io: CliIO = processIO
): Promise<number> {
  let invocation: Invocation;
  try {
    invocation = parseInvocation(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`typst-rsx: ${err.message}\n\n${USAGE}`);
    return 2;
  }

  if (invocation.help) {
    io.stdout(USAGE);
    return 0;
  }

  const result = await convertDocument(invocation.input, invocation.options);
  if (result.error !== null) {
    io.stderr(`typst-rsx: ${formatError(result.error)}\n`);
    return 1;
  }

  const text = result.data.endsWith('\n') ? result.data : result.data + '\n';
  if (invocation.output) await io.writeFile(invocation.output, text);
  else io.stdout(text);
  return 0;
}
