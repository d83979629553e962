/**
 * Bridge configuration
 *
 * Sources, lowest precedence first:
 * 1. Built-in defaults
 * 2. Config file (~/.taskdeck/config.json, or --config=<path>)
 * 3. Environment (TASKDECK_CATALOG, TASKDECK_DEBUG, TASKDECK_OVERRIDE_VALIDATION),
 *    after loading a .env file from the working directory
 * 4. Command-line flags
 *
 * An unreadable or invalid config file is reported and ignored.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { BusyIndicatorModeSchema } from "@taskdeck/catalog-protocol";
import { config as loadDotenv } from "dotenv";
import { Context, Data, Effect, Either, Layer, Ref } from "effect";
import { z } from "zod";

const CONFIG_DIR = path.join(os.homedir(), ".taskdeck");
export const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, "config.json");
export const DEFAULT_LOG_FILE = path.join(CONFIG_DIR, "bridge.log");

// apps/bridge, one level above src/
const BRIDGE_ROOT = fileURLToPath(new URL("..", import.meta.url));
export const DEFAULT_CATALOG_PATH = path.join(
  BRIDGE_ROOT,
  "catalog",
  "catalog.json",
);

export const AppConfigSchema = z.object({
  /** Catalog document served by the bridge */
  catalogPath: z.string().min(1),
  /** When true the catalog is served unfiltered (validate = false) */
  overrideValidation: z.boolean(),
  /** Passed through to front-ends; the bridge never asks for confirmation */
  skipConfirmation: z.boolean(),
  busyIndicator: BusyIndicatorModeSchema,
  debug: z.boolean(),
  logFile: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Any subset of the config; unknown keys are dropped */
export const AppConfigPatchSchema = AppConfigSchema.partial();

export type AppConfigPatch = z.infer<typeof AppConfigPatchSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  catalogPath: DEFAULT_CATALOG_PATH,
  overrideValidation: true,
  skipConfirmation: false,
  busyIndicator: "pending",
  debug: false,
  logFile: DEFAULT_LOG_FILE,
};

export class ConfigError extends Data.TaggedError("ConfigError")<{
  message: string;
  path: string;
  cause?: unknown;
}> {}

/**
 * Load a .env file from the working directory into process.env
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, ".env") });
}

/**
 * Read a config file. A missing file is an empty patch.
 */
export function readConfigFile(
  filePath: string,
): Either.Either<AppConfigPatch, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Either.right({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    return Either.left(
      new ConfigError({
        message: `Could not read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        path: filePath,
        cause: error,
      }),
    );
  }

  const parsed = AppConfigPatchSchema.safeParse(raw);
  if (!parsed.success) {
    return Either.left(
      new ConfigError({
        message: `Invalid config file ${filePath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
        path: filePath,
        cause: parsed.error,
      }),
    );
  }
  return Either.right(parsed.data);
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv): AppConfigPatch {
  const patch: AppConfigPatch = {};

  if (env.TASKDECK_CATALOG) {
    patch.catalogPath = path.resolve(env.TASKDECK_CATALOG);
  }
  const debug = parseBooleanEnv(env.TASKDECK_DEBUG);
  if (debug !== undefined) {
    patch.debug = debug;
  }
  const overrideValidation = parseBooleanEnv(env.TASKDECK_OVERRIDE_VALIDATION);
  if (overrideValidation !== undefined) {
    patch.overrideValidation = overrideValidation;
  }

  return patch;
}

export interface CliOptions {
  /** --config=<path> */
  configPath?: string;
  overrides: AppConfigPatch;
  /** Arguments that were not recognised */
  unknown: string[];
}

/**
 * Parse bridge flags. Value flags take `--flag=value` or `--flag value`.
 */
export function parseArgs(argv: ReadonlyArray<string>): CliOptions {
  const options: CliOptions = { overrides: {}, unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    const [flag, inlineValue] = arg.startsWith("--")
      ? splitFlag(arg)
      : [arg, undefined];
    const takeValue = (): string | undefined => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) return undefined;
      i++;
      return next;
    };

    switch (flag) {
      case "--catalog": {
        const value = takeValue();
        if (value) options.overrides.catalogPath = path.resolve(value);
        break;
      }
      case "--config": {
        const value = takeValue();
        if (value) options.configPath = path.resolve(value);
        break;
      }
      case "-u":
      case "--override-validation":
        options.overrides.overrideValidation = true;
        break;
      case "--validate":
        options.overrides.overrideValidation = false;
        break;
      case "-y":
      case "--skip-confirmation":
        options.overrides.skipConfirmation = true;
        break;
      case "-d":
      case "--debug":
        options.overrides.debug = true;
        break;
      default:
        options.unknown.push(arg);
    }
  }

  return options;
}

function splitFlag(arg: string): [string, string | undefined] {
  const index = arg.indexOf("=");
  return index === -1 ? [arg, undefined] : [arg.slice(0, index), arg.slice(index + 1)];
}

export interface ResolvedConfig {
  config: AppConfig;
  /** File that config.update writes to */
  configPath: string;
  /** Problems that were ignored while resolving */
  problems: ConfigError[];
  unknownArgs: string[];
}

export function resolveConfig(input: {
  argv: ReadonlyArray<string>;
  env: NodeJS.ProcessEnv;
  defaults?: AppConfig;
}): ResolvedConfig {
  const cli = parseArgs(input.argv);
  const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH;
  const problems: ConfigError[] = [];

  const fromFile = Either.match(readConfigFile(configPath), {
    onLeft: (error): AppConfigPatch => {
      problems.push(error);
      return {};
    },
    onRight: (patch) => patch,
  });

  const config: AppConfig = {
    ...(input.defaults ?? DEFAULT_CONFIG),
    ...fromFile,
    ...configFromEnv(input.env),
    ...cli.overrides,
  };

  return { config, configPath, problems, unknownArgs: cli.unknown };
}

/**
 * Merge a patch into the config file, keeping keys it does not mention
 */
export const saveConfigFile = (filePath: string, patch: AppConfigPatch) =>
  Effect.try({
    try: () => {
      let existing: Record<string, unknown> = {};
      if (fs.existsSync(filePath)) {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
        existing = z.record(z.unknown()).catch({}).parse(raw);
      }
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(
        filePath,
        `${JSON.stringify({ ...existing, ...patch }, null, 2)}\n`,
        "utf-8",
      );
    },
    catch: (error) =>
      new ConfigError({
        message: `Failed to save config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        path: filePath,
        cause: error,
      }),
  });

/**
 * Effective configuration of the running bridge
 */
export class ConfigService extends Context.Tag("ConfigService")<
  ConfigService,
  {
    readonly get: Effect.Effect<AppConfig>;
    /** Persists the patch and applies it to the in-memory config */
    readonly update: (
      patch: AppConfigPatch,
    ) => Effect.Effect<AppConfig, ConfigError>;
    readonly path: string;
  }
>() {}

export const makeConfigServiceLive = (initial: AppConfig, configPath: string) =>
  Layer.effect(
    ConfigService,
    Effect.gen(function* () {
      const current = yield* Ref.make(initial);

      const update = (patch: AppConfigPatch) =>
        Effect.gen(function* () {
          yield* saveConfigFile(configPath, patch);
          const next = yield* Ref.updateAndGet(current, (config) => ({
            ...config,
            ...patch,
          }));
          yield* Effect.logInfo(
            `[Config] Saved ${Object.keys(patch).join(", ") || "nothing"} to ${configPath}`,
          );
          return next;
        });

      return { get: Ref.get(current), update, path: configPath };
    }),
  );
