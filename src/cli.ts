#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point: convert decoded CORSIKA records to a GrIsu photon list
 *
 * Usage:
 *   npm run convert -- --input=run.json
 *   npm run convert -- --input=run.json --output=run.grisu --atmosphere=1 --more-info
 *
 * Options:
 *   --input=FILE      Decoded records (JSON), required
 *   --output=PATH     Output file, or "stdout" (default: stdout)
 *   --atmosphere=ID   Atmosphere model id, negative for none (default: -1)
 *   --more-info       Add a "C" line (first interaction depth) after each shower
 *   --qeff=N          Value for the "R" line (default: 1)
 *   --label=TEXT      Banner text in the header
 */

import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import { GrisuWriterError, OutputOpenError } from "@/errors";
import { parseRecordDocument } from "@/input/RecordDocument";
import { debugLog, logError } from "@/logging/log";
import type { WriterOptions } from "@/types";
import { GrisuWriter } from "@/writer/GrisuWriter";
import { writeDocument } from "@/writer/writeDocument";

export interface CliArguments {
  readonly input: string;
  readonly printMoreInfo: boolean;
  readonly options: Partial<WriterOptions>;
}

/** Invalid command line */
export class UsageError extends GrisuWriterError {}

function option(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

function numberOption(args: readonly string[], name: string): number | undefined {
  const value = option(args, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new UsageError(`--${name} expects a number, got "${value}"`);
  }
  return n;
}

function integerOption(args: readonly string[], name: string): number | undefined {
  const n = numberOption(args, name);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new UsageError(`--${name} expects an integer, got "${option(args, name) ?? ""}"`);
  }
  return n;
}

/**
 * Parse command line arguments (without node and script path)
 * @throws UsageError on missing or malformed options
 */
export function parseArguments(args: readonly string[]): CliArguments {
  const input = option(args, "input");
  if (input === undefined || input === "") {
    throw new UsageError("--input=FILE is required");
  }

  const options: { -readonly [K in keyof WriterOptions]?: WriterOptions[K] } = {};
  const output = option(args, "output");
  if (output !== undefined) options.destination = output;
  const atmosphereId = integerOption(args, "atmosphere");
  if (atmosphereId !== undefined) options.atmosphereId = atmosphereId;
  const qeff = numberOption(args, "qeff");
  if (qeff !== undefined) options.quantumEfficiency = qeff;
  const label = option(args, "label");
  if (label !== undefined) options.versionLabel = label;

  const printMoreInfo = args.includes("--more-info");
  if (printMoreInfo && (options.atmosphereId ?? -1) < 0) {
    throw new UsageError("--more-info needs an atmosphere model (--atmosphere=ID with ID >= 0)");
  }

  return { input, printMoreInfo, options };
}

/**
 * Run the conversion; returns the process exit code
 */
export function main(args: readonly string[]): number {
  let parsed: CliArguments;
  try {
    parsed = parseArguments(args);
  } catch (error) {
    if (error instanceof UsageError) {
      logError(error.message);
      return 2;
    }
    throw error;
  }

  try {
    const document = parseRecordDocument(JSON.parse(fs.readFileSync(parsed.input, "utf8")));
    const writer = GrisuWriter.open(parsed.options);
    try {
      const summary = writeDocument(writer, document, parsed.printMoreInfo);
      debugLog(`Wrote ${summary.events} showers, ${summary.photons} photon bunches`);
    } finally {
      writer.close();
    }
    return 0;
  } catch (error) {
    if (error instanceof OutputOpenError) {
      logError(`error opening outputfile: ${error.path}`);
    } else if (error instanceof Error) {
      logError(error.message);
    } else {
      logError(error);
    }
    return 1;
  }
}

const entry = process.argv[1];
if (
  entry !== undefined &&
  fs.existsSync(entry) &&
  import.meta.url === pathToFileURL(fs.realpathSync(entry)).href
) {
  process.exitCode = main(process.argv.slice(2));
}
