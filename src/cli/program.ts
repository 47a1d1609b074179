import { readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { Command, CommanderError } from "commander";
import { IoFailureError, UnknownFormatError, toPolydocError } from "../errors.js";
import { detectFormat, parseFormat } from "../formats.js";
import { DirectoryImageLoader, DirectoryImageSink } from "../images.js";
import { Polydoc } from "../polydoc.js";
import { CollectingWarningSink } from "../warnings.js";

/** Where the CLI writes; stdout for help and version, stderr for everything else. */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const PROCESS_OUTPUT: CliOutput = {
  log: (line) => process.stdout.write(`${line}\n`),
  error: (line) => process.stderr.write(`${line}\n`),
};

interface CliOptions {
  inputFile: string;
  outputFile: string;
  inputFormat?: string;
  outputFormat: string;
  imageDir?: string;
  charset?: string;
}

function buildProgram(output: CliOutput): Command {
  return new Command()
    .name("polydoc")
    .description("Convert a document between formats through one document model")
    .version("0.1.0")
    .requiredOption("--input-file <path>", "document to read")
    .requiredOption("--output-file <path>", "file to write")
    .option("--input-format <format>", "format of the input; detected from the file when omitted")
    .requiredOption("--output-format <format>", "format to write")
    .option(
      "--image-dir <dir>",
      "directory images are read from and written to (default: beside the input and output files)",
    )
    .option("--charset <name>", "character set of text input")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => output.log(s.trimEnd()),
      writeErr: (s) => output.error(s.trimEnd()),
    });
}

async function convertFiles(options: CliOptions, output: CliOutput): Promise<void> {
  let input: Buffer;
  try {
    input = await readFile(options.inputFile);
  } catch (err) {
    throw new IoFailureError(`Failed to read ${options.inputFile}`, { cause: err });
  }

  const from = options.inputFormat
    ? (parseFormat(options.inputFormat) ?? options.inputFormat)
    : await detectFormat(input, options.inputFile);
  if (!from) {
    throw new UnknownFormatError(options.inputFile, `Cannot detect the format of ${options.inputFile}`);
  }
  const to = parseFormat(options.outputFormat) ?? options.outputFormat;

  const warnings = new CollectingWarningSink();
  const result = await new Polydoc().convert(input, from, to, {
    loader: new DirectoryImageLoader(options.imageDir ?? dirname(resolve(options.inputFile))),
    sink: new DirectoryImageSink(options.imageDir ?? dirname(resolve(options.outputFile))),
    warnings,
    charset: options.charset,
  });

  try {
    await writeFile(options.outputFile, result.bytes);
  } catch (err) {
    throw new IoFailureError(`Failed to write ${options.outputFile}`, { cause: err });
  }
  for (const warning of warnings.warnings) {
    output.error(`warning: ${warning.variant}: ${warning.reason}`);
  }
}

/** Runs the CLI over `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], output: CliOutput = PROCESS_OUTPUT): Promise<number> {
  const program = buildProgram(output);
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  try {
    await convertFiles(program.opts<CliOptions>(), output);
    return 0;
  } catch (err) {
    const error = toPolydocError(err);
    output.error(`${error.kind}: ${error.message}`);
    return 1;
  }
}
