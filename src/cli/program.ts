import { Command, CommanderError, Option } from "commander";

import { ConversionError, isConversionError, type FieldError } from "../core/errors.js";
import { CanonicalConverter, type ConversionInput } from "../core/impl/converter.js";
import { exportCanonicalIndex } from "../core/impl/exporter.js";
import { resolveConfig, type ConfigFlags } from "./config.js";
import { createLogger } from "./logger.js";
import { pushErr } from "./validation.js";

const NAME = "ciff-canonical";
const VERSION = "0.1.0";

const FORMATS = ["postings", "ciff"] as const;
type InputFormat = (typeof FORMATS)[number];

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

interface ConvertFlags extends ConfigFlags {
  postings: string;
  doclens?: string;
  output: string;
  format: InputFormat;
}

interface ExportFlags extends ConfigFlags {
  input: string;
  postings: string;
  doclens?: string;
  format: InputFormat;
  description?: string;
}

export const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
};

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command()
    .name(NAME)
    .description("Convert CIFF postings into a positional binary inverted index")
    .version(VERSION, "-v, --version", "Show version number")
    .configureOutput({
      writeOut: (s) => io.stdout(s.trimEnd()),
      writeErr: (s) => io.stderr(s.trimEnd()),
    })
    .exitOverride();

  withConfigOptions(
    program
      .command("convert")
      .description("Build <output>.docs, .freqs, .sizes and .lexicon.plain from a postings stream")
      .requiredOption("-p, --postings <path>", "postings stream (a full CIFF file with --format ciff)")
      .option("-d, --doclens <path>", "document lengths, one `docid length` pair per line")
      .requiredOption("-o, --output <basename>", "output basename")
      .addOption(new Option("-f, --format <format>", "input format").choices(FORMATS).default("postings")),
  ).action(async (flags: ConvertFlags) => {
    const config = resolveConfig(flags, io.env);
    const logger = createLogger("convert", { level: config.logLevel, write: io.stderr });
    const input = convertInput(flags);

    const converter = new CanonicalConverter({}, { logger, progressInterval: config.progressInterval });
    const summary = await converter.convert(input, flags.output);

    io.stdout(
      `converted ${summary.termCount} terms, ${summary.postingCount} postings, ${summary.docCount} documents`,
    );
    for (const path of summary.outputs) io.stdout(`wrote ${path}`);
  });

  withConfigOptions(
    program
      .command("export")
      .description("Turn a canonical index back into a postings stream (or a full CIFF file)")
      .requiredOption("-i, --input <basename>", "basename of the canonical index")
      .requiredOption("-p, --postings <path>", "postings stream (or CIFF file) to write")
      .option("-d, --doclens <path>", "document lengths file to write (postings format)")
      .addOption(new Option("-f, --format <format>", "output format").choices(FORMATS).default("postings"))
      .option("--description <text>", "CIFF header description"),
  ).action(async (flags: ExportFlags) => {
    const config = resolveConfig(flags, io.env);
    const logger = createLogger("export", { level: config.logLevel, write: io.stderr });

    const summary = await exportCanonicalIndex({
      input: flags.input,
      format: flags.format,
      postingsPath: flags.postings,
      docLengthsPath: flags.doclens,
      description: flags.description,
      logger,
    });

    io.stdout(`exported ${summary.termCount} terms, ${summary.docCount} documents`);
    for (const path of summary.outputs) io.stdout(`wrote ${path}`);
  });

  return program;
}

/** Parse `argv` (node-style, program path first) and run; resolves to the exit code. */
export async function run(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // help and version also exit through here, with code 0
      return e.exitCode;
    }
    io.stderr(formatError(e));
    return 1;
  }
}

export function formatError(e: unknown): string {
  if (isConversionError(e)) {
    const lines = [`ERROR: ${e.message}`];
    for (const fe of e.errors ?? []) lines.push(`  ${fe.path}: ${fe.message}`);
    return lines.join("\n");
  }
  return `ERROR: ${e instanceof Error ? e.message : String(e)}`;
}

function withConfigOptions(cmd: Command): Command {
  return cmd
    .option("--log-level <level>", "debug | info | warn | error | silent (env: LOG_LEVEL)")
    .option("--progress-interval <n>", "postings lists between progress lines (env: PROGRESS_INTERVAL)");
}

function convertInput(flags: ConvertFlags): ConversionInput {
  const errors: FieldError[] = [];
  if (flags.format === "postings") {
    if (!flags.doclens) {
      pushErr(errors, "$.doclens", "required for the postings format");
      throw invalidArguments(errors);
    }
    return { format: "postings", postings: { path: flags.postings }, docLengths: { path: flags.doclens } };
  }

  if (flags.doclens) {
    pushErr(errors, "$.doclens", "not allowed with --format ciff; lengths come from the CIFF doc records");
    throw invalidArguments(errors);
  }
  return { format: "ciff", ciff: { path: flags.postings } };
}

function invalidArguments(errors: FieldError[]): ConversionError {
  return new ConversionError({ code: "INVALID_ARGUMENT", detail: "invalid arguments", errors });
}
