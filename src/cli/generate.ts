import path from "node:path";

import type { Command } from "commander";

import { loadGeneratorConfig } from "../core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  renderErrorText,
  resolveColorEnabled,
} from "../core/error-format.js";
import { defaultHarnessFileName, generateHarness } from "../core/generator.js";
import { writeHarnessFile } from "../core/harness-writer.js";
import { JsonlLogger, logGeneratorEvent } from "../core/logger.js";
import { loadTopologyManifest } from "../core/topology-manifest.js";

export type GenerateCommandOptions = {
  output?: string;
  stdout?: boolean;
  strict?: boolean;
  config?: string;
  logFile?: string;
  debug?: boolean;
  cwd?: string;
};

export type GenerateIo = {
  out: (text: string) => void;
  log: (text: string) => void;
  err: (text: string) => void;
  errStream: { isTTY?: boolean };
};

const defaultIo: GenerateIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  log: (text) => console.log(text),
  err: (text) => console.error(text),
  errStream: process.stderr,
};

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate an integration-test harness from a realm topology manifest")
    .argument("<manifest>", "Path to the topology manifest (JSON)")
    .option("-o, --output <path>", "Output file for the generated harness")
    .option("--stdout", "Print the harness instead of writing a file", false)
    .option("--strict", "Check component references before emitting")
    .option("--no-strict", "Skip reference checks even when the config enables them")
    .option("--config <path>", "Path to testgen.config.json")
    .option("--log-file <path>", "Append JSONL generation events to this file")
    .option("--debug", "Show error codes, causes, and stack traces", false)
    .action(async (manifestPath: string, opts: GenerateCommandOptions) => {
      await generateCommand(manifestPath, opts);
    });
}

export async function generateCommand(
  manifestPath: string,
  opts: GenerateCommandOptions,
  io: GenerateIo = defaultIo,
): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  let logger: JsonlLogger | undefined;
  let useColor: boolean | undefined;

  try {
    const { config } = loadGeneratorConfig({ explicitPath: opts.config, cwd });
    useColor = config.color;

    const logFile = opts.logFile ? path.resolve(cwd, opts.logFile) : config.log_file;
    logger = logFile ? new JsonlLogger(logFile, { manifest: path.resolve(cwd, manifestPath) }) : undefined;
    logGeneratorEvent(logger, "generate.start");

    const manifest = await loadTopologyManifest(path.resolve(cwd, manifestPath));
    const strict = opts.strict ?? config.strict;
    const text = generateHarness(manifest, { strict });

    if (opts.stdout) {
      io.out(text);
      logGeneratorEvent(logger, "generate.complete", { output: "stdout", strict });
      return;
    }

    const outputPath = resolveOutputPath({
      cwd,
      explicit: opts.output,
      outputDir: config.output_dir,
      fileName: defaultHarnessFileName(manifest),
    });
    const result = await writeHarnessFile(outputPath, text);

    logGeneratorEvent(logger, "generate.complete", {
      output: result.outputPath,
      bytes: result.bytes,
      strict,
    });
    io.log(`Wrote test harness for ${manifest.component_under_test} to ${result.outputPath}`);
  } catch (err) {
    logGeneratorEvent(logger, "generate.failed", { error: formatErrorMessage(err) });

    const format = createAnsiFormatter(resolveColorEnabled({ stream: io.errStream, useColor }));
    const lines = formatErrorLines(err, { mode: opts.debug ? "debug" : "short" });
    io.err(renderErrorText(lines, format));
    process.exitCode = 1;
  }
}

function resolveOutputPath(args: {
  cwd: string;
  explicit?: string;
  outputDir?: string;
  fileName: string;
}): string {
  if (args.explicit) return path.resolve(args.cwd, args.explicit);
  return path.join(args.outputDir ?? args.cwd, args.fileName);
}
