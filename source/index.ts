export { CachedVersionResolver, CachedWidthClassifier, LruCache } from "./cache.ts";
export {
  createCellwidth,
  resolve,
  stringWidth,
  supportedVersions,
  widthOf,
} from "./cellwidth.ts";
export type { Cellwidth, CellwidthOptions } from "./cellwidth.ts";
export { isControl, toCodePoint, WidthClassifier } from "./classifier.ts";
export type {
  CellWidth,
  CodePointInput,
  StringWidthOptions,
} from "./classifier.ts";
export { OVERRIDE_ENV_KEY, readConfig } from "./config.ts";
export type { CellwidthConfig, LogLevel } from "./config.ts";
export {
  CellwidthError,
  ConfigError,
  isCellwidthError,
  isVersionFormatError,
  TableDataError,
  UnknownVersionError,
  VersionFormatError,
} from "./errors.ts";
export {
  AUTO,
  envOverrideSource,
  LATEST,
  noOverride,
  VersionResolver,
} from "./resolver.ts";
export type {
  OverrideSource,
  Resolver,
  VersionResolverOptions,
  VersionWarning,
  WarningHandler,
} from "./resolver.ts";
export { bisearch, WIDTH_CATEGORIES } from "./tables/interval.ts";
export type {
  Interval,
  IntervalTable,
  WidthCategory,
} from "./tables/interval.ts";
export {
  getDefaultTableStore,
  loadTableStore,
  MAX_CODE_POINT,
  TableStore,
} from "./tables/store.ts";
export type { TableAsset, VersionTables } from "./tables/store.ts";
export { compareVersions, parseVersion, sortVersions } from "./version.ts";
export type { VersionValue } from "./version.ts";
