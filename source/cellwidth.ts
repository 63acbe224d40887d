import { CachedVersionResolver, CachedWidthClassifier } from "./cache.ts";
import type {
  CellWidth,
  CodePointInput,
  StringWidthOptions,
} from "./classifier.ts";
import { readConfig } from "./config.ts";
import {
  envOverrideSource,
  type OverrideSource,
  VersionResolver,
  type WarningHandler,
} from "./resolver.ts";
import {
  getDefaultTableStore,
  loadTableStore,
  type TableStore,
} from "./tables/store.ts";

export interface CellwidthOptions {
  store?: TableStore;
  overrideSource?: OverrideSource;
  onWarning?: WarningHandler;
  cache?: {
    widthSize?: number;
    resolveSize?: number;
  };
}

export interface Cellwidth {
  widthOf(input: CodePointInput, version?: string): CellWidth;
  stringWidth(
    text: Iterable<CodePointInput>,
    options?: StringWidthOptions,
  ): number;
  resolve(token: string): string;
  supportedVersions(): readonly string[];
}

/**
 * Wires a store, a resolver and a classifier together with bounded caches
 * in front of resolution and per-code-point classification.
 */
export function createCellwidth(options: CellwidthOptions = {}): Cellwidth {
  const store = options.store ?? getDefaultTableStore();
  const resolver = new CachedVersionResolver(
    new VersionResolver(store, {
      overrideSource: options.overrideSource,
      onWarning: options.onWarning,
    }),
    options.cache?.resolveSize,
  );
  const classifier = new CachedWidthClassifier(
    store,
    resolver,
    options.cache?.widthSize,
  );

  return {
    widthOf: (input, version) => classifier.widthOf(input, version),
    stringWidth: (text, stringOptions) =>
      classifier.stringWidth(text, stringOptions),
    resolve: (token) => resolver.resolve(token),
    supportedVersions: () => store.supportedVersions(),
  };
}

let defaultInstance: Cellwidth | null = null;

function getDefault(): Cellwidth {
  if (!defaultInstance) {
    const config = readConfig();
    defaultInstance = createCellwidth({
      store: config.tablesPath
        ? loadTableStore(config.tablesPath)
        : getDefaultTableStore(),
      overrideSource: envOverrideSource(process.env),
      cache: config.cache,
    });
  }
  return defaultInstance;
}

/**
 * Cells occupied by one code point: -1 for control characters, 0 for
 * combining and zero-width characters, 2 for wide East Asian characters,
 * 1 otherwise.
 *
 * `version` may be "auto" (the UNICODE_VERSION environment variable, else
 * latest), "latest", or a dotted version; the nearest supported version at
 * or below it is used.
 */
export function widthOf(input: CodePointInput, version = "auto"): CellWidth {
  return getDefault().widthOf(input, version);
}

/**
 * Cells occupied by a string, or -1 if it holds any control character.
 */
export function stringWidth(
  text: Iterable<CodePointInput>,
  options: StringWidthOptions = {},
): number {
  return getDefault().stringWidth(text, options);
}

export function resolve(token: string): string {
  return getDefault().resolve(token);
}

export function supportedVersions(): readonly string[] {
  return getDefault().supportedVersions();
}
