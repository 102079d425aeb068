#!/usr/bin/env node
import {
  type CanScopeOptions,
  resolveCanScopeOptions,
  resolveConfigFilePath,
} from "./application/config/resolveCanScopeOptions.js";
import { renderBreakdown, renderJsonSummary } from "./application/report/renderReport.js";
import { CandumpAnalysisService } from "./application/services/CandumpAnalysisService.js";

import { ConfigurationError, type MalformedLogLineError } from "./errors.js";

import {
  decodeIdentifier,
  describeIdentifier,
  MAX_EXTENDED_ID,
} from "./infrastructure/parsing/j1939.js";
import { CandumpReader } from "./infrastructure/reading/CandumpReader.js";

import type { OutputFormat, ReadReport } from "./interfaces/index.js";

import { createPgnFilterSet } from "./usecases/pgnFilter.js";

type ParsedArgs = {
  _: string[];
  [key: string]: string | undefined | string[];
};

const BOOLEAN_FLAGS = new Set(["strict", "frame-only"]);

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { _: [] };

  for (let i = 0; i < argv.length; i++) {
    const current = argv[i];
    if (!current.startsWith("--")) {
      parsed._.push(current);
      continue;
    }

    const key = current.slice(2);
    const next = argv[i + 1];
    if (BOOLEAN_FLAGS.has(key) || !next || next.startsWith("--")) {
      parsed[key] = "true";
      continue;
    }

    parsed[key] = next;
    i++;
  }

  return parsed;
}

function getOptionalArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function getOptionalBooleanArg(args: ParsedArgs, key: string): boolean | undefined {
  const value = args[key];
  if (typeof value !== "string" || value.length === 0) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

function parseFormatArg(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  if (value === "text" || value === "json") return value;
  throw new ConfigurationError(`Invalid --format "${value}". Use text or json.`);
}

function printHelp(): void {
  process.stdout.write(
    [
      "canscope: J1939 candump log breakdown and PGN filtering",
      "",
      "Commands:",
      "  breakdown [path] [pgn...]  Count messages by src address, dest address and PGN",
      "  filter [path] [pgn...]     Print only the lines whose PGN is listed",
      "  decode <hex-id>...         Show the J1939 fields of CAN identifiers",
      "",
      "A path of - reads candump lines from stdin (e.g. `candump -L can0 | canscope filter - 61444`).",
      "",
      "Flags:",
      "  --config     JSON configuration file path (default: ./canscope.config.json when present)",
      "  --format     text|json for `breakdown` (default: text)",
      "  --frame-only Print <id>#<data> instead of the full line for `filter`",
      "  --strict     Stop at the first malformed line instead of skipping it",
      "",
      'Config file: { "path": "path/to/candump.log", "pgns": [61444, 65265] }',
      "",
    ].join("\n"),
  );
}

function resolveCommandOptions(args: ParsedArgs): CanScopeOptions {
  const [, path, ...pgns] = args._;
  const configFilePath = resolveConfigFilePath(process.argv.slice(2), process.env);

  return resolveCanScopeOptions({
    configFilePath,
    env: process.env,
    overrides: {
      format: parseFormatArg(getOptionalArg(args, "format")),
      frameOnly: getOptionalBooleanArg(args, "frame-only"),
      path,
      pgns: pgns.length > 0 ? pgns : undefined,
      strict: getOptionalBooleanArg(args, "strict"),
    },
  });
}

function requirePath(options: CanScopeOptions): string {
  if (!options.path) {
    throw new ConfigurationError(
      'Missing candump log path. Pass it as an argument or set "path" in the config file.',
    );
  }
  return options.path;
}

function createService(options: CanScopeOptions): CandumpAnalysisService {
  const reader = new CandumpReader({
    haltOnMalformed: options.strict,
    onMalformed: (error: MalformedLogLineError) => {
      process.stderr.write(
        `[canscope] skipped line ${error.lineNumber}: ${error.reason}: ${error.line}\n`,
      );
    },
  });
  return new CandumpAnalysisService(reader);
}

function writeReadSummary(report: ReadReport): void {
  if (report.parseErrors === 0 && report.standardFrames === 0) return;
  process.stderr.write(
    `[canscope] ${report.source}: ${report.linesScanned} lines, ${report.framesParsed} frames, ${report.standardFrames} 11-bit frames ignored, ${report.parseErrors} skipped\n`,
  );
}

async function runBreakdown(args: ParsedArgs): Promise<void> {
  const options = resolveCommandOptions(args);
  const path = requirePath(options);
  const interest = createPgnFilterSet(options.pgns);

  const summary = await createService(options).breakdown(path, interest);

  if (options.format === "json") {
    process.stdout.write(`${JSON.stringify(renderJsonSummary(summary), null, 2)}\n`);
  } else {
    process.stdout.write(renderBreakdown(summary));
  }
  writeReadSummary(summary.report);
}

async function runFilter(args: ParsedArgs): Promise<void> {
  const options = resolveCommandOptions(args);
  const path = requirePath(options);
  const interest = createPgnFilterSet(options.pgns);

  const summary = await createService(options).filter(
    path,
    interest,
    (line) => process.stdout.write(`${line}\n`),
    { frameOnly: options.frameOnly },
  );
  writeReadSummary(summary.report);
}

function runDecode(args: ParsedArgs): void {
  const ids = args._.slice(1);
  if (ids.length === 0) {
    throw new ConfigurationError("decode needs at least one hexadecimal CAN identifier.");
  }

  for (const text of ids) {
    const normalized = text.replace(/^0x/i, "");
    const id = Number.parseInt(normalized, 16);
    if (!/^[0-9a-f]{1,8}$/i.test(normalized) || id > MAX_EXTENDED_ID) {
      throw new ConfigurationError(`"${text}" is not a 29-bit hexadecimal CAN identifier.`);
    }
    process.stdout.write(`${describeIdentifier(id)}\n`);
    process.stdout.write(`${JSON.stringify(decodeIdentifier(id))}\n`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args._[0];

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "breakdown") {
    await runBreakdown(args);
    return;
  }

  if (command === "filter") {
    await runFilter(args);
    return;
  }

  if (command === "decode") {
    runDecode(args);
    return;
  }

  printHelp();
  process.exitCode = 1;
}

main().catch((error) => {
  process.stderr.write(
    `[canscope] fatal: ${error instanceof Error ? error.stack || error.message : String(error)}\n`,
  );
  process.exit(1);
});
