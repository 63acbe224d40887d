import { AUTO, type Resolver } from "./resolver.ts";
import { bisearch } from "./tables/interval.ts";
import { MAX_CODE_POINT, type TableStore } from "./tables/store.ts";

/** Terminal cells a code point occupies; -1 when it has no printable width. */
export type CellWidth = -1 | 0 | 1 | 2;

/** A code point number, or a string holding exactly one code point. */
export type CodePointInput = number | string;

export interface StringWidthOptions {
  /** Measure only the first `limit` code points. */
  limit?: number;
  version?: string;
}

const VARIATION_SELECTOR_START = 0xfe00;
const VARIATION_SELECTOR_END = 0xfe0f;

export function toCodePoint(input: CodePointInput): number {
  if (typeof input === "number") {
    if (!Number.isInteger(input)) {
      throw new TypeError(`Expected an integer code point, got \`${input}\`.`);
    }
    return input;
  }
  const codePoint = input.codePointAt(0);
  if (
    codePoint === undefined ||
    String.fromCodePoint(codePoint).length !== input.length
  ) {
    throw new TypeError(
      `Expected a single character, got a string of length ${input.length}.`,
    );
  }
  return codePoint;
}

function validateLimit(limit: number | undefined): void {
  if (limit !== undefined && !(Number.isSafeInteger(limit) && limit >= 0)) {
    throw new RangeError(
      `Expected limit to be a non-negative integer, got \`${limit}\`.`,
    );
  }
}

export function isControl(codePoint: number): boolean {
  return codePoint < 32 || (codePoint >= 0x7f && codePoint < 0xa0);
}

export class WidthClassifier {
  protected readonly store: TableStore;
  protected readonly resolver: Resolver;

  constructor(store: TableStore, resolver: Resolver) {
    this.store = store;
    this.resolver = resolver;
  }

  widthOf(input: CodePointInput, version: string = AUTO): CellWidth {
    const codePoint = toCodePoint(input);
    return this.widthAt(codePoint, this.resolver.resolve(version));
  }

  /**
   * Width of an integer code point under an already resolved version.
   * Values outside the Unicode range are unprintable.
   */
  widthAt(codePoint: number, version: string): CellWidth {
    if (codePoint < 0 || codePoint > MAX_CODE_POINT || isControl(codePoint)) {
      return -1;
    }

    const tables = this.store.versionTables(version);
    if (bisearch(codePoint, tables.zeroWidth)) {
      return 0;
    }
    if (bisearch(codePoint, tables.wideEastAsian)) {
      return 2;
    }

    if (
      codePoint >= VARIATION_SELECTOR_START &&
      codePoint <= VARIATION_SELECTOR_END
    ) {
      return 0;
    }
    if (this.store.isNarrowToWide(codePoint)) {
      return 2;
    }

    // East Asian ambiguous falls through here too
    return 1;
  }

  /**
   * Sum of cell widths, or -1 as soon as an unprintable code point is met.
   * The version is resolved once for the whole sequence.
   */
  stringWidth(
    text: Iterable<CodePointInput>,
    options: StringWidthOptions = {},
  ): number {
    const { limit, version = AUTO } = options;
    validateLimit(limit);
    const resolved = this.resolver.resolve(version);

    let width = 0;
    let count = 0;
    for (const item of text) {
      if (limit !== undefined && count >= limit) {
        break;
      }
      count++;

      const charWidth = this.widthAt(toCodePoint(item), resolved);
      if (charWidth < 0) {
        return -1;
      }
      width += charWidth;
    }
    return width;
  }
}
