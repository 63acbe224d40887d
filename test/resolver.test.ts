import { deepStrictEqual, strictEqual, throws } from "node:assert";
import { after, before, describe, it, mock } from "node:test";
import { VersionFormatError } from "../source/errors.ts";
import {
  envOverrideSource,
  noOverride,
  VersionResolver,
} from "../source/resolver.ts";
import { fixtureResolver, fixtureStore } from "./utils/test-fixtures.ts";

describe("VersionResolver", () => {
  it("should resolve latest to the highest supported version", () => {
    const { store, resolver, onWarning } = fixtureResolver();
    const versions = store.supportedVersions();
    strictEqual(resolver.resolve("latest"), versions[versions.length - 1]);
    strictEqual(resolver.resolve("latest"), "10.0.0");
    strictEqual(onWarning.mock.callCount(), 0);
  });

  it("should return exact matches without a warning", () => {
    const { resolver, onWarning } = fixtureResolver();
    strictEqual(resolver.resolve("9.0.0"), "9.0.0");
    strictEqual(resolver.resolve("4.1.0"), "4.1.0");
    strictEqual(onWarning.mock.callCount(), 0);
  });

  it("should pick the nearest lower version and warn", () => {
    const { resolver, onWarning } = fixtureResolver();
    strictEqual(resolver.resolve("4.9.9"), "4.1.0");
    strictEqual(onWarning.mock.callCount(), 1);
    deepStrictEqual(onWarning.mock.calls[0]?.arguments[0], {
      requested: "4.9.9",
      resolved: "4.1.0",
      reason: "nearest-lower",
    });
  });

  it("should match a partial version numerically", () => {
    const { resolver, onWarning } = fixtureResolver();
    strictEqual(resolver.resolve("8.0"), "8.0.0");
    strictEqual(resolver.resolve("9"), "9.0.0");
    // Same value, different spelling: still reported
    strictEqual(onWarning.mock.callCount(), 2);
  });

  it("should compare numerically when picking", () => {
    const { resolver } = fixtureResolver();
    strictEqual(resolver.resolve("9.5"), "9.0.0");
    strictEqual(resolver.resolve("10.1"), "10.0.0");
    strictEqual(resolver.resolve("99"), "10.0.0");
  });

  it("should fall back to the earliest version below the range", () => {
    const { resolver, onWarning } = fixtureResolver();
    strictEqual(resolver.resolve("1"), "4.1.0");
    strictEqual(resolver.resolve("4.0.9"), "4.1.0");
    deepStrictEqual(onWarning.mock.calls[0]?.arguments[0], {
      requested: "1",
      resolved: "4.1.0",
      reason: "below-range",
    });
  });

  it("should be idempotent", () => {
    const { resolver } = fixtureResolver();
    for (const token of ["latest", "auto", "4.9.9", "8.0", "1", "12"]) {
      const once = resolver.resolve(token);
      strictEqual(resolver.resolve(once), once, token);
    }
  });

  it("should throw on a malformed token", () => {
    const { resolver } = fixtureResolver();
    throws(() => resolver.resolve("nine"), VersionFormatError);
    throws(() => resolver.resolve("8.0.x"), VersionFormatError);
    throws(() => resolver.resolve("LATEST"), VersionFormatError);
  });
});

describe("auto resolution", () => {
  it("should behave as latest without an override", () => {
    const resolver = new VersionResolver(fixtureStore());
    strictEqual(resolver.resolve("auto"), "10.0.0");
    strictEqual(resolver.effectiveToken("auto"), "latest");
  });

  it("should follow the override source", () => {
    const { resolver, onWarning } = fixtureResolver(fixtureStore(), "5.0.0");
    strictEqual(resolver.resolve("auto"), "5.0.0");
    strictEqual(resolver.effectiveToken("auto"), "5.0.0");
    strictEqual(onWarning.mock.callCount(), 0);
  });

  it("should resolve an approximate override like any token", () => {
    const { resolver, onWarning } = fixtureResolver(fixtureStore(), "8.5");
    strictEqual(resolver.resolve("auto"), "8.0.0");
    strictEqual(onWarning.mock.callCount(), 1);
  });

  it("should accept latest as an override", () => {
    const { resolver } = fixtureResolver(fixtureStore(), "latest");
    strictEqual(resolver.resolve("auto"), "10.0.0");
  });

  it("should throw on a malformed override", () => {
    const { resolver } = fixtureResolver(fixtureStore(), "nine");
    throws(() => resolver.resolve("auto"), VersionFormatError);
  });

  it("should read the override once per call", () => {
    const read = mock.fn(() => "9.0.0");
    const resolver = new VersionResolver(fixtureStore(), {
      overrideSource: { read },
    });
    resolver.resolve("auto");
    strictEqual(read.mock.callCount(), 1);
    resolver.resolve("auto");
    strictEqual(read.mock.callCount(), 2);
  });

  it("should not consult the override for explicit tokens", () => {
    const read = mock.fn(() => "9.0.0");
    const resolver = new VersionResolver(fixtureStore(), {
      overrideSource: { read },
    });
    strictEqual(resolver.resolve("5.0.0"), "5.0.0");
    strictEqual(resolver.resolve("latest"), "10.0.0");
    strictEqual(read.mock.callCount(), 0);
  });
});

describe("envOverrideSource", () => {
  it("should read UNICODE_VERSION from the given environment", () => {
    strictEqual(envOverrideSource({ UNICODE_VERSION: "8.0.0" }).read(), "8.0.0");
    strictEqual(envOverrideSource({ UNICODE_VERSION: " 9.0 " }).read(), "9.0");
  });

  it("should treat unset and blank values as absent", () => {
    strictEqual(envOverrideSource({}).read(), undefined);
    strictEqual(envOverrideSource({ UNICODE_VERSION: "   " }).read(), undefined);
  });

  it("should see later changes to the environment", () => {
    const env: NodeJS.ProcessEnv = {};
    const source = envOverrideSource(env);
    strictEqual(source.read(), undefined);
    env["UNICODE_VERSION"] = "5.0.0";
    strictEqual(source.read(), "5.0.0");
  });

  it("should honour a custom key", () => {
    strictEqual(envOverrideSource({ MY_UNICODE: "6.0.0" }, "MY_UNICODE").read(), "6.0.0");
  });

  it("should drive a resolver", () => {
    const resolver = new VersionResolver(fixtureStore(), {
      overrideSource: envOverrideSource({ UNICODE_VERSION: "9.0.0" }),
    });
    strictEqual(resolver.resolve("auto"), "9.0.0");
  });

  it("noOverride should never supply a version", () => {
    strictEqual(noOverride.read(), undefined);
  });
});

describe("default warning handler", () => {
  const savedLevel = process.env["CELLWIDTH_LOG_LEVEL"];

  before(() => {
    process.env["CELLWIDTH_LOG_LEVEL"] = "verbose";
  });

  after(() => {
    if (savedLevel === undefined) {
      delete process.env["CELLWIDTH_LOG_LEVEL"];
    } else {
      process.env["CELLWIDTH_LOG_LEVEL"] = savedLevel;
    }
  });

  it("should still resolve when the logging configuration is invalid", () => {
    const resolver = new VersionResolver(fixtureStore());
    strictEqual(resolver.resolve("4.9.9"), "4.1.0");
    strictEqual(resolver.resolve("1"), "4.1.0");
  });
});
