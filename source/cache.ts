import { type CellWidth, WidthClassifier } from "./classifier.ts";
import type { Resolver, VersionResolver } from "./resolver.ts";
import type { TableStore } from "./tables/store.ts";

/**
 * Map-backed least-recently-used cache. A `maxSize` of 0 stores nothing.
 */
export class LruCache<K, V> {
  private readonly maxSize: number;
  private readonly cache = new Map<K, V>();

  constructor(maxSize: number) {
    if (!(Number.isSafeInteger(maxSize) && maxSize >= 0)) {
      throw new RangeError(
        `Expected maxSize to be a non-negative integer, got \`${maxSize}\`.`,
      );
    }
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.cache.size;
  }

  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      return undefined;
    }
    const value = this.cache.get(key);
    // Re-insert to mark as most recently used
    this.cache.delete(key);
    if (value !== undefined) {
      this.cache.set(key, value);
    }
    return value;
  }

  set(key: K, value: V): void {
    if (this.maxSize === 0) {
      return;
    }
    this.cache.delete(key);
    this.cache.set(key, value);
    if (this.cache.size > this.maxSize) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
      }
    }
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
  }
}

/**
 * Caches resolutions keyed on the token after "auto" substitution, so a
 * changed override is never answered from a stale entry. A cached answer
 * does not repeat its warning.
 */
export class CachedVersionResolver implements Resolver {
  private readonly inner: VersionResolver;
  private readonly cache: LruCache<string, string>;

  constructor(inner: VersionResolver, maxSize = 8) {
    this.inner = inner;
    this.cache = new LruCache(maxSize);
  }

  resolve(token: string): string {
    const effective = this.inner.effectiveToken(token);
    const cached = this.cache.get(effective);
    if (cached !== undefined) {
      return cached;
    }
    const resolved = this.inner.resolveEffective(effective);
    this.cache.set(effective, resolved);
    return resolved;
  }

  clear(): void {
    this.cache.clear();
  }
}

export class CachedWidthClassifier extends WidthClassifier {
  private readonly cache: LruCache<string, CellWidth>;

  constructor(store: TableStore, resolver: Resolver, maxSize = 1000) {
    super(store, resolver);
    this.cache = new LruCache(maxSize);
  }

  override widthAt(codePoint: number, version: string): CellWidth {
    const key = `${version}:${codePoint}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const width = super.widthAt(codePoint, version);
    this.cache.set(key, width);
    return width;
  }

  clear(): void {
    this.cache.clear();
  }
}
