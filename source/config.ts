import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { formatIssues } from "./parsing.ts";

/** Environment variable consulted by "auto" version resolution. */
export const OVERRIDE_ENV_KEY = "UNICODE_VERSION";

export const defaultConfig = {
  logs: {
    level: "warn",
  },
  cache: {
    widthSize: 1000,
    resolveSize: 8,
  },
} as const;

const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const CacheSizeSchema = z.coerce.number().int().nonnegative();

const ConfigSchema = z.object({
  logs: z
    .object({
      level: LogLevelSchema.default(defaultConfig.logs.level),
      path: z.string().min(1).optional(),
    })
    .default({}),
  cache: z
    .object({
      widthSize: CacheSizeSchema.default(defaultConfig.cache.widthSize),
      resolveSize: CacheSizeSchema.default(defaultConfig.cache.resolveSize),
    })
    .default({}),
  tablesPath: z.string().min(1).optional(),
});

export type CellwidthConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

function envValue(
  env: NodeJS.ProcessEnv,
  key: string,
): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Reads cellwidth settings from environment variables.
 * Throws ConfigError listing every invalid field.
 */
export function readConfig(
  env: NodeJS.ProcessEnv = process.env,
): CellwidthConfig {
  const tablesPath = envValue(env, "CELLWIDTH_TABLES");
  const result = ConfigSchema.safeParse({
    logs: {
      level: envValue(env, "CELLWIDTH_LOG_LEVEL")?.toLowerCase(),
      path: envValue(env, "CELLWIDTH_LOG_FILE"),
    },
    cache: {
      widthSize: envValue(env, "CELLWIDTH_WIDTH_CACHE_SIZE"),
      resolveSize: envValue(env, "CELLWIDTH_RESOLVE_CACHE_SIZE"),
    },
    tablesPath: tablesPath ? path.resolve(tablesPath) : undefined,
  });

  if (!result.success) {
    throw new ConfigError(
      `Invalid cellwidth configuration: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}
