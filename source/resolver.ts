import { OVERRIDE_ENV_KEY } from "./config.ts";
import { TableDataError } from "./errors.ts";
import { getLogger } from "./logger.ts";
import type { TableStore } from "./tables/store.ts";
import { compareValues, parseVersion } from "./version.ts";

export const LATEST = "latest";
export const AUTO = "auto";

/** Where "auto" looks for a requested version. */
export interface OverrideSource {
  read(): string | undefined;
}

export interface VersionWarning {
  requested: string;
  resolved: string;
  reason: "nearest-lower" | "below-range";
}

export type WarningHandler = (warning: VersionWarning) => void;

export interface Resolver {
  resolve(token: string): string;
}

export interface VersionResolverOptions {
  overrideSource?: OverrideSource;
  onWarning?: WarningHandler;
}

/** Reads `key` from an environment record on every call. */
export function envOverrideSource(
  env: NodeJS.ProcessEnv = process.env,
  key: string = OVERRIDE_ENV_KEY,
): OverrideSource {
  return {
    read() {
      const value = env[key]?.trim();
      return value ? value : undefined;
    },
  };
}

export const noOverride: OverrideSource = {
  read: () => undefined,
};

export function logVersionWarning(warning: VersionWarning): void {
  getLogger().warn(
    warning,
    `Unicode version ${warning.requested} not found, using ${warning.resolved}`,
  );
}

/**
 * Maps "latest", "auto" or a dotted version to the nearest supported table
 * generation at or below it.
 */
export class VersionResolver implements Resolver {
  private readonly store: TableStore;
  private readonly overrideSource: OverrideSource;
  private readonly onWarning: WarningHandler;

  constructor(store: TableStore, options: VersionResolverOptions = {}) {
    this.store = store;
    this.overrideSource = options.overrideSource ?? noOverride;
    this.onWarning = options.onWarning ?? logVersionWarning;
  }

  /** The token with "auto" replaced by the override, or "latest". */
  effectiveToken(token: string): string {
    if (token !== AUTO) {
      return token;
    }
    return this.overrideSource.read() ?? LATEST;
  }

  resolve(token: string): string {
    return this.resolveEffective(this.effectiveToken(token));
  }

  resolveEffective(token: string): string {
    const supported = this.store.supportedVersions();
    const earliest = supported[0];
    const latest = supported[supported.length - 1];
    if (earliest === undefined || latest === undefined) {
      throw new TableDataError("Table store has no versions");
    }

    if (token === LATEST) {
      return latest;
    }

    const requested = parseVersion(token);
    for (let i = supported.length - 1; i >= 0; i--) {
      const version = supported[i];
      if (
        version !== undefined &&
        compareValues(parseVersion(version), requested) <= 0
      ) {
        if (version !== token) {
          this.onWarning({
            requested: token,
            resolved: version,
            reason: "nearest-lower",
          });
        }
        return version;
      }
    }

    this.onWarning({
      requested: token,
      resolved: earliest,
      reason: "below-range",
    });
    return earliest;
  }
}
