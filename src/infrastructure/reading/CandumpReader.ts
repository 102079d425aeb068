import { type FileHandle, open } from "node:fs/promises";
import readline from "node:readline";

import { LogSourceUnavailableError, MalformedLogLineError } from "../../errors.js";

import type { CandumpEntry, ReadReport } from "../../interfaces/index.js";

import { parseCandumpLine } from "../parsing/candump.js";

export const STDIN_SOURCE = "-";

export type CandumpReaderOptions = {
  /** Rethrow the first malformed line instead of skipping it. */
  haltOnMalformed?: boolean;
  /** Called for each malformed line that is skipped. Not called when halting. */
  onMalformed?: (error: MalformedLogLineError) => void;
};

export type CandumpVisitor = (entry: CandumpEntry) => void;

function createReport(source: string): ReadReport {
  return {
    source,
    linesScanned: 0,
    blankLines: 0,
    framesParsed: 0,
    standardFrames: 0,
    parseErrors: 0,
    startedAt: new Date().toISOString(),
    finishedAt: "",
  };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function describeFsError(error: unknown): string {
  const code = errorCode(error);
  if (code === "ENOENT") return "file not found";
  if (code === "EACCES" || code === "EPERM") return "permission denied";
  return error instanceof Error ? error.message : String(error);
}

export class CandumpReader {
  constructor(private readonly options: CandumpReaderOptions = {}) {}

  /**
   * Streams a candump file line by line. A path of `-` reads standard input,
   * which is how a live capture piped from `candump -L` is consumed.
   */
  async readFile(path: string, visitor: CandumpVisitor): Promise<ReadReport> {
    if (path === STDIN_SOURCE) return this.readStream(process.stdin, visitor, "stdin");

    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (error) {
      throw new LogSourceUnavailableError(path, describeFsError(error));
    }

    try {
      const info = await handle.stat();
      if (!info.isFile()) throw new LogSourceUnavailableError(path, "not a regular file");

      const stream = handle.createReadStream({ encoding: "utf8", autoClose: false });
      try {
        return await this.readStream(stream, visitor, path);
      } finally {
        stream.destroy();
      }
    } finally {
      await handle.close();
    }
  }

  async readStream(
    input: NodeJS.ReadableStream,
    visitor: CandumpVisitor,
    source = "stream",
  ): Promise<ReadReport> {
    const reader = readline.createInterface({ input, crlfDelay: Infinity });
    try {
      return await this.readLines(reader, visitor, source);
    } finally {
      reader.close();
    }
  }

  async readLines(
    lines: AsyncIterable<string> | Iterable<string>,
    visitor: CandumpVisitor,
    source = "lines",
  ): Promise<ReadReport> {
    const report = createReport(source);
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      report.linesScanned++;
      this.processLine({ line, lineNumber, report, visitor });
    }

    report.finishedAt = new Date().toISOString();
    return report;
  }

  private processLine(input: {
    line: string;
    lineNumber: number;
    report: ReadReport;
    visitor: CandumpVisitor;
  }): void {
    const trimmed = input.line.trim();
    if (!trimmed) {
      input.report.blankLines++;
      return;
    }

    let entry: CandumpEntry;
    try {
      entry = {
        frame: parseCandumpLine(trimmed, input.lineNumber),
        line: trimmed,
        lineNumber: input.lineNumber,
      };
    } catch (error) {
      if (!(error instanceof MalformedLogLineError)) throw error;
      input.report.parseErrors++;
      if (this.options.haltOnMalformed) throw error;
      this.options.onMalformed?.(error);
      return;
    }

    // 11-bit identifiers have no PGN or destination address.
    if (!entry.frame.extended) {
      input.report.standardFrames++;
      return;
    }

    input.report.framesParsed++;
    input.visitor(entry);
  }
}
