import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ZodIssueCode, z } from "zod";
import { TableDataError, UnknownVersionError } from "../errors.ts";
import { getLogger } from "../logger.ts";
import { formatIssues, jsonParser } from "../parsing.ts";
import {
  compareValues,
  isVersionString,
  parseVersion,
  sortVersions,
} from "../version.ts";
import type { IntervalTable, WidthCategory } from "./interval.ts";

export const MAX_CODE_POINT = 0x10ffff;

const DEFAULT_TABLES_URL = new URL("./data/unicode-widths.json", import.meta.url);

const CodePointSchema = z.number().int().min(0).max(MAX_CODE_POINT);

const IntervalSchema = z
  .tuple([CodePointSchema, CodePointSchema])
  .refine(([start, end]) => start <= end, {
    message: "Interval start exceeds its end",
  });

const IntervalTableSchema = z
  .array(IntervalSchema)
  .superRefine((table, ctx) => {
    for (let i = 1; i < table.length; i++) {
      const previous = table[i - 1];
      const current = table[i];
      if (previous && current && current[0] <= previous[1]) {
        ctx.addIssue({
          code: ZodIssueCode.custom,
          path: [i],
          message: "Intervals must be sorted and non-overlapping",
        });
      }
    }
  });

const VersionTablesSchema = z.object({
  zeroWidth: IntervalTableSchema,
  wideEastAsian: IntervalTableSchema,
});

const TableAssetSchema = z.object({
  versions: z
    .record(VersionTablesSchema)
    .superRefine((versions, ctx) => {
      const keys = Object.keys(versions);
      if (keys.length === 0) {
        ctx.addIssue({
          code: ZodIssueCode.custom,
          message: "At least one Unicode version is required",
        });
      }
      for (const key of keys) {
        if (!isVersionString(key)) {
          ctx.addIssue({
            code: ZodIssueCode.custom,
            path: [key],
            message: "Version keys must be dotted decimal numbers",
          });
        }
      }

      // "8.0" and "8.0.0" would shadow each other during resolution
      const sorted = sortVersions(keys.filter(isVersionString));
      for (let i = 1; i < sorted.length; i++) {
        const previous = sorted[i - 1];
        const current = sorted[i];
        if (
          previous !== undefined &&
          current !== undefined &&
          compareValues(parseVersion(previous), parseVersion(current)) === 0
        ) {
          ctx.addIssue({
            code: ZodIssueCode.custom,
            path: [current],
            message: `Version ${current} duplicates ${previous}`,
          });
        }
      }
    }),
  vs16NarrowToWide: z.array(CodePointSchema),
});

export type TableAsset = z.infer<typeof TableAssetSchema>;

export interface VersionTables {
  readonly zeroWidth: IntervalTable;
  readonly wideEastAsian: IntervalTable;
}

/**
 * Width tables for every supported Unicode version. Built once, then only
 * read.
 */
export class TableStore {
  private readonly tables: ReadonlyMap<string, VersionTables>;
  private readonly versions: readonly string[];
  private readonly narrowToWide: ReadonlySet<number>;

  constructor(
    tables: ReadonlyMap<string, VersionTables>,
    narrowToWide: Iterable<number>,
  ) {
    if (tables.size === 0) {
      throw new TableDataError("A table store needs at least one version");
    }
    this.tables = tables;
    this.versions = Object.freeze(sortVersions(tables.keys()));
    this.narrowToWide = new Set(narrowToWide);
  }

  /** Validates a parsed asset, or its JSON text, and builds a store from it. */
  static fromAsset(input: unknown): TableStore {
    const result = jsonParser(TableAssetSchema).safeParse(input);
    if (!result.success) {
      throw new TableDataError(
        `Invalid width table asset: ${formatIssues(result.error)}`,
        { cause: result.error },
      );
    }
    const asset: TableAsset = result.data;
    return new TableStore(
      new Map(Object.entries(asset.versions)),
      asset.vs16NarrowToWide,
    );
  }

  /** Ascending by version ordering; never empty. */
  supportedVersions(): readonly string[] {
    return this.versions;
  }

  hasVersion(version: string): boolean {
    return this.tables.has(version);
  }

  versionTables(version: string): VersionTables {
    const tables = this.tables.get(version);
    if (!tables) {
      throw new UnknownVersionError(version);
    }
    return tables;
  }

  tablesFor(version: string, category: WidthCategory): IntervalTable {
    return this.versionTables(version)[category];
  }

  /** Narrow bases that turn wide when followed by U+FE0F. */
  isNarrowToWide(codePoint: number): boolean {
    return this.narrowToWide.has(codePoint);
  }
}

export function loadTableStore(file: string | URL = DEFAULT_TABLES_URL): TableStore {
  const location = typeof file === "string" ? file : fileURLToPath(file);
  let text: string;
  try {
    text = readFileSync(location, "utf8");
  } catch (error) {
    throw new TableDataError(`Cannot read width tables from ${location}`, {
      cause: error,
    });
  }

  const store = TableStore.fromAsset(text);
  getLogger().debug(
    { file: location, versions: store.supportedVersions().length },
    "Loaded width tables",
  );
  return store;
}

let defaultStore: TableStore | null = null;

/** The bundled tables, loaded on first call and shared afterwards. */
export function getDefaultTableStore(): TableStore {
  if (!defaultStore) {
    defaultStore = loadTableStore();
  }
  return defaultStore;
}
