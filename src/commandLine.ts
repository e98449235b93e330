import yargs from "yargs";
import { ConverterSettings, resolvePath, settingsFromEnv } from "./config";
import { convertEdcFile } from "./convert";
import { isConversionError } from "./errors";
import { OutputChannel } from "./log";

export const EXIT_OK = 0;
export const EXIT_CONVERSION_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliStreams {
  stdout: OutputChannel;
  stderr: OutputChannel;
}

/** Runs `edc2svd [options] <input.edc> <output.svd>` and returns the exit code. */
export function runCli(args: string[], env: NodeJS.ProcessEnv, streams: CliStreams, cwd = process.cwd()): number {
  let usageError: string | undefined;
  const parser = yargs(args)
    .scriptName("edc2svd")
    .usage("Usage: $0 [options] <input.edc> <output.svd>")
    .help(false)
    .version(false)
    .option("help", { alias: "h", type: "boolean", default: false, describe: "show this help message" })
    .option("verbose", { alias: "v", type: "boolean", default: false, describe: "activate verbose output" })
    .parserConfiguration({ "parse-positional-numbers": false })
    .strictOptions()
    .exitProcess(false)
    .fail((msg: string | undefined, err: Error | undefined) => {
      usageError = msg || err?.message || "invalid arguments";
    });

  const argv = parser.parseSync();
  const positionals = argv._.map(String);
  const showUsage = (channel: OutputChannel) => parser.showHelp((text: string) => channel.appendLine(text));

  if (argv.help && usageError === undefined) {
    showUsage(streams.stdout);
    return EXIT_OK;
  }
  if (usageError !== undefined || positionals.length !== 2) {
    streams.stderr.appendLine(usageError ?? "expected an input and an output file");
    showUsage(streams.stderr);
    return EXIT_USAGE;
  }

  let settings: ConverterSettings;
  try {
    settings = settingsFromEnv(env);
  } catch (err) {
    return reportFailure(err, streams.stderr);
  }
  if (argv.verbose) {
    settings.verbose = true;
  }
  const [inputPath, outputPath] = positionals.map((value) => resolvePath(value, cwd) ?? value);

  try {
    convertEdcFile(inputPath, outputPath, settings, streams.stdout);
  } catch (err) {
    return reportFailure(err, streams.stderr);
  }
  return EXIT_OK;
}

function reportFailure(err: unknown, stderr: OutputChannel): number {
  if (isConversionError(err)) {
    stderr.appendLine(`error: ${err.message}`);
    return EXIT_CONVERSION_FAILED;
  }
  throw err;
}
