export class MalformedLogLineError extends Error {
  readonly lineNumber: number;
  readonly line: string;
  readonly reason: string;

  constructor(lineNumber: number, line: string, reason: string) {
    super(`Malformed candump line ${lineNumber}: ${reason}`);
    this.name = "MalformedLogLineError";
    this.lineNumber = lineNumber;
    this.line = line;
    this.reason = reason;
  }
}

export class IdentifierOutOfRangeError extends MalformedLogLineError {
  readonly identifier: string;

  constructor(lineNumber: number, line: string, identifier: string) {
    super(lineNumber, line, `identifier ${identifier} does not fit in 29 bits`);
    this.name = "IdentifierOutOfRangeError";
    this.identifier = identifier;
  }
}

export class LogSourceUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Cannot read candump log "${path}": ${detail}`);
    this.name = "LogSourceUnavailableError";
    this.path = path;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
