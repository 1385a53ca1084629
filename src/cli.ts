import { open } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { Command, InvalidArgumentError } from "commander";

import { DEFAULT_DELIMITER, TSV_DELIMITER, TableEncoder } from "./encoder";
import { readInput } from "./input";
import { applySelector, parseSelector } from "./selector";
import { parseTables, skipHeader } from "./tables";

export const NAME = "html2csv";
export const VERSION = "0.2.0";

export interface CliOptions {
  delimiter?: string;
  table?: string;
  header?: boolean;
  tsv?: boolean;
  output?: string;
  verbose?: boolean;
  logBuffer?: string[];
}

export interface CliStreams {
  stdin?: Readable;
  stdout?: Writable;
}

const logVerbose = (message: string, options: CliOptions): void => {
  if (!options.verbose) {
    return;
  }
  if (options.logBuffer) {
    options.logBuffer.push(message);
    return;
  }
  console.error(message);
};

function parseDelimiter(value: string): string {
  if ([...value].length !== 1) {
    throw new InvalidArgumentError("delimiter must be a single character");
  }
  return value;
}

export const versionLine = (): string =>
  `${NAME} v${VERSION} node ${process.version} ${process.platform}/${process.arch}`;

export async function run(
  file: string | undefined,
  options: CliOptions,
  streams: CliStreams = {}
): Promise<void> {
  // Validated before the input is read.
  const selector = parseSelector(options.table ?? "");
  const delimiter = options.tsv
    ? TSV_DELIMITER
    : (options.delimiter ?? DEFAULT_DELIMITER);
  const encoder = new TableEncoder(delimiter);

  logVerbose(`Reading ${file ?? "standard input"}`, options);
  const html = await readInput(file, streams.stdin);

  const { tables: found, fromDirectoryListing } = parseTables(html);
  if (fromDirectoryListing) {
    logVerbose("No <table> rows found, using directory listing", options);
  }
  logVerbose(`Found ${found.length} table(s)`, options);

  let tables = applySelector(found, selector);
  if (options.header === false) {
    tables = skipHeader(tables);
  }
  if (tables.length !== found.length) {
    logVerbose(`Writing ${tables.length} table(s)`, options);
  }

  if (options.output) {
    const handle = await open(options.output, "w");
    const out = handle.createWriteStream({ encoding: "utf8" });
    try {
      await encoder.encode(out, tables);
    } catch (error) {
      out.destroy();
      throw error;
    }
    out.end();
    await finished(out);
    logVerbose(`Saved to ${options.output}`, options);
    return;
  }

  await encoder.encode(streams.stdout ?? process.stdout, tables);
}

export function buildProgram() {
  const program = new Command()
    .name(NAME)
    .description("Extract the tables of an HTML document as CSV.")
    .argument("[file]", "HTML file to read (standard input if omitted)")
    .option(
      "-d, --delimiter <char>",
      "Field delimiter",
      parseDelimiter,
      DEFAULT_DELIMITER
    )
    .option(
      "-t, --table <selector>",
      "Select tables by index, id or name (comma-separated)"
    )
    .option("-H, --no-header", "Skip the first row of every table")
    .option("-T, --tsv", "Use tab as delimiter (overrides --delimiter)")
    .option("-o, --output <file>", "Write output to file instead of stdout")
    .option("-v, --verbose", "Show detailed progress information")
    .allowExcessArguments(false);

  program.version(versionLine(), "--version", "Print version and exit");
  return program;
}

export async function main(argv: string[] = process.argv) {
  const program = buildProgram();
  program.parse(argv);

  const [file] = program.args;
  const opts = program.opts<CliOptions>();
  try {
    await run(file, opts);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`ERROR: ${message}`);
    process.exitCode = 1;
  }
}
