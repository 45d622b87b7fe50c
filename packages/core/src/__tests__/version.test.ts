import { describe, it, expect } from "vitest";
import {
  parseVersion,
  compareVersions,
  supportedMajorVersions,
  isVersionSupported,
  assertVersionSupported,
  selectHighestSupportedVersion,
  selectResponseVersion,
  usesV1Layout,
  parseVersionOrThrow,
  type VersionConfig,
} from "../version.js";
import { UmaErrorCode, UnsupportedVersionError } from "../types/errors.js";
import { captureError } from "./helpers.js";

describe("parseVersion", () => {
  it("parses major.minor", () => {
    expect(parseVersion("1.0")).toEqual({ ok: true, value: { major: 1, minor: 0 } });
    expect(parseVersion("0.3")).toEqual({ ok: true, value: { major: 0, minor: 3 } });
  });

  it.each(["1", "1.0.0", "a.b", "1.x", "", ".1", "1."])("rejects %j as INVALID_INPUT", (raw) => {
    const parsed = parseVersion(raw);
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) expect(parsed.error.code).toBe(UmaErrorCode.INVALID_INPUT);
  });
});

describe("compareVersions", () => {
  const v = parseVersionOrThrow;

  it("orders by major, then minor", () => {
    expect(compareVersions(v("0.9"), v("1.0"))).toBeLessThan(0);
    expect(compareVersions(v("1.2"), v("1.10"))).toBeLessThan(0);
    expect(compareVersions(v("2.0"), v("1.9"))).toBeGreaterThan(0);
    expect(compareVersions(v("1.1"), v("1.1"))).toBe(0);
  });
});

describe("Supported versions", () => {
  it("covers the current major and the back-compat majors", () => {
    expect([...supportedMajorVersions()].sort()).toEqual([0, 1]);
  });

  it("checks the major only", () => {
    expect(isVersionSupported("1.7")).toBe(true);
    expect(isVersionSupported("0.1")).toBe(true);
    expect(isVersionSupported("2.0")).toBe(false);
    expect(isVersionSupported("garbage")).toBe(false);
  });

  it("throws UnsupportedVersionError carrying the supported majors", () => {
    const err = captureError(() => assertVersionSupported("2.0"));
    expect(err).toBeInstanceOf(UnsupportedVersionError);
    expect(err).toMatchObject({
      code: UmaErrorCode.UNSUPPORTED_UMA_VERSION,
      httpStatus: 412,
      unsupportedVersion: "2.0",
      supportedMajorVersions: [0, 1],
    });
  });
});

describe("selectHighestSupportedVersion", () => {
  it("picks the current version when the peer speaks both majors", () => {
    expect(selectHighestSupportedVersion([0, 1])).toBe("1.0");
  });

  it("picks the back-compat version for an older peer", () => {
    expect(selectHighestSupportedVersion([0])).toBe("0.3");
  });

  it("returns undefined when nothing is shared", () => {
    expect(selectHighestSupportedVersion([2])).toBeUndefined();
    expect(selectHighestSupportedVersion([])).toBeUndefined();
  });

  it("honours a custom configuration", () => {
    const config: VersionConfig = { current: "2.1", backCompat: ["1.4"] };
    expect(selectHighestSupportedVersion([1, 2, 3], config)).toBe("2.1");
    expect(selectHighestSupportedVersion([0, 1], config)).toBe("1.4");
  });
});

describe("selectResponseVersion", () => {
  it("answers with the requested version when it is not newer", () => {
    expect(selectResponseVersion("0.3")).toBe("0.3");
    expect(selectResponseVersion("1.0")).toBe("1.0");
  });

  it("caps at the current version", () => {
    expect(selectResponseVersion("1.5")).toBe("1.0");
  });

  it("compares pairs rather than minimising each component", () => {
    const config: VersionConfig = { current: "1.2", backCompat: [] };
    expect(selectResponseVersion("0.9", config)).toBe("0.9");
    expect(selectResponseVersion("1.1", config)).toBe("1.1");
  });
});

describe("usesV1Layout", () => {
  it("is true from major 1", () => {
    expect(usesV1Layout("1.0")).toBe(true);
    expect(usesV1Layout("0.3")).toBe(false);
  });
});
