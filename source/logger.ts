import pino from "pino";
import { type CellwidthConfig, defaultConfig, readConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

export type LogSettings = CellwidthConfig["logs"];

let loggerInstance: pino.Logger | null = null;

export function createLogger(logs: LogSettings): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "cellwidth",
    level: logs.level,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (logs.path) {
    return pino(
      options,
      pino.transport({
        target: "pino-roll",
        options: {
          file: logs.path,
          size: "10m",
          limit: {
            count: 3,
          },
          mkdir: true,
        },
      }),
    );
  }
  // stderr: stdout belongs to the host program
  return pino(options, pino.destination({ dest: 2, sync: true }));
}

/**
 * Log settings from the environment. An invalid configuration yields the
 * defaults together with the error, so logging itself never throws it.
 */
export function readLogSettings(env: NodeJS.ProcessEnv = process.env): {
  logs: LogSettings;
  error?: ConfigError;
} {
  try {
    return { logs: readConfig(env).logs };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { logs: defaultConfig.logs, error };
    }
    throw error;
  }
}

// Created on first use; reads CELLWIDTH_LOG_* at that point
export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const { logs, error } = readLogSettings();
    loggerInstance = createLogger(logs);
    if (error) {
      loggerInstance.warn(
        { err: error },
        "Ignoring invalid cellwidth configuration for logging",
      );
    }
  }
  return loggerInstance;
}
