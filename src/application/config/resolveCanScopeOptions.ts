import { MikroConf } from "mikroconf";

import { ConfigurationError } from "../../errors.js";

import type { OutputFormat } from "../../interfaces/index.js";

export type CanScopeOptions = {
  path?: string;
  pgns: Array<number | string>;
  strict: boolean;
  format: OutputFormat;
  frameOnly: boolean;
};

export type ResolveCanScopeOptionsInput = {
  configFilePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<CanScopeOptions>;
};

export const DEFAULT_CANSCOPE_CONFIG_FILE_PATH = "canscope.config.json";

const DEFAULT_OPTIONS: CanScopeOptions = {
  format: "text",
  frameOnly: false,
  pgns: [],
  strict: false,
};

function asTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
    return undefined;
  }
  if (typeof value !== "string") return undefined;

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function asFormat(value: unknown): OutputFormat | undefined {
  if (value === undefined) return undefined;
  const normalized = asTrimmedString(value)?.toLowerCase();
  if (normalized === "text" || normalized === "json") return normalized;
  throw new ConfigurationError(
    `Invalid output format ${JSON.stringify(value)}. Use "text" or "json".`,
  );
}

function asPgnList(value: unknown): Array<number | string> | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") {
    return value.split(/[\s,]+/).filter((entry) => entry.length > 0);
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => {
      if (typeof entry === "number" || typeof entry === "string") return entry;
      throw new ConfigurationError(`Invalid PGN entry ${JSON.stringify(entry)} in "pgns".`);
    });
  }
  throw new ConfigurationError('"pgns" must be a list of PGN values.');
}

function withoutUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

function normalizeOptions(value: Record<string, unknown>): CanScopeOptions {
  return {
    format: asFormat(value.format) ?? DEFAULT_OPTIONS.format,
    frameOnly: asBoolean(value.frameOnly) ?? DEFAULT_OPTIONS.frameOnly,
    path: asTrimmedString(value.path),
    pgns: asPgnList(value.pgns) ?? DEFAULT_OPTIONS.pgns,
    strict: asBoolean(value.strict) ?? DEFAULT_OPTIONS.strict,
  };
}

function readEnvOptions(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return withoutUndefined({
    format: asFormat(env.CANSCOPE_FORMAT),
    frameOnly: asBoolean(env.CANSCOPE_FRAME_ONLY),
    path: asTrimmedString(env.CANSCOPE_PATH),
    pgns: asPgnList(asTrimmedString(env.CANSCOPE_PGNS)),
    strict: asBoolean(env.CANSCOPE_STRICT),
  });
}

function defaultsAsConfigOptions() {
  return Object.entries(DEFAULT_OPTIONS).map(([path, defaultValue]) => ({
    defaultValue,
    path,
  }));
}

export function resolveConfigFilePath(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  for (let index = 0; index < args.length; index++) {
    if (args[index] !== "--config") continue;
    const candidate = args[index + 1];
    if (candidate && !candidate.startsWith("-")) {
      return candidate;
    }
  }

  return asTrimmedString(env.CANSCOPE_CONFIG_PATH) ?? DEFAULT_CANSCOPE_CONFIG_FILE_PATH;
}

/**
 * Resolves options with precedence defaults < config file < environment < overrides.
 * The config file uses the `{ "path": "...", "pgns": [...] }` layout.
 */
export function resolveCanScopeOptions(input: ResolveCanScopeOptionsInput = {}): CanScopeOptions {
  const env = input.env ?? process.env;
  const configFilePath =
    input.configFilePath ??
    asTrimmedString(env.CANSCOPE_CONFIG_PATH) ??
    DEFAULT_CANSCOPE_CONFIG_FILE_PATH;

  const config = new MikroConf({
    config: {
      ...readEnvOptions(env),
      ...withoutUndefined(input.overrides ?? {}),
    },
    configFilePath,
    options: defaultsAsConfigOptions(),
  });

  return normalizeOptions(config.get<Record<string, unknown>>());
}
