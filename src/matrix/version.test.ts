import { describe, expect, it } from "vitest";

import { InvalidVersionFormatError } from "../core/errors.js";

import {
  compareSecondaryLabels,
  compareVersions,
  isPseudoVersion,
  normalizeVersion,
  parseVersion,
  sortVersions,
} from "./version.js";

describe("parseVersion", () => {
  it("parses major.minor versions", () => {
    expect(parseVersion("3.10")).toEqual({ major: 3, minor: 10 });
    expect(parseVersion(" 2.9 ")).toEqual({ major: 2, minor: 9 });
  });

  it.each(["3", "3.10.1", "devel", "3.x", "", "v3.9"])("rejects %j", (value) => {
    expect(() => parseVersion(value)).toThrow(InvalidVersionFormatError);
  });

  it("rejects components too large to compare exactly", () => {
    expect(() => parseVersion("2.99999999999999999999")).toThrow(InvalidVersionFormatError);
    expect(() => parseVersion("9007199254740992.1")).toThrow(InvalidVersionFormatError);
    expect(parseVersion("9007199254740991.0")).toEqual({ major: 9007199254740991, minor: 0 });
  });

  it("names the accepted format in the error", () => {
    expect(() => parseVersion("3.10.1")).toThrow('Invalid version "3.10.1": expected <major>.<minor>.');
  });
});

describe("normalizeVersion", () => {
  it("drops leading zeros and whitespace", () => {
    expect(normalizeVersion(" 3.09")).toBe("3.9");
  });
});

describe("compareVersions", () => {
  it("compares numerically rather than lexically", () => {
    expect(compareVersions("3.9", "3.10")).toBeLessThan(0);
    expect(compareVersions("3.10", "2.20")).toBeGreaterThan(0);
    expect(compareVersions("3.9", "3.09")).toBe(0);
  });
});

describe("sortVersions", () => {
  it("sorts ascending and removes duplicates", () => {
    expect(sortVersions(["3.10", "2.7", "3.9", "3.09"])).toEqual(["2.7", "3.9", "3.10"]);
  });
});

describe("secondary labels", () => {
  it("recognizes the pseudo versions", () => {
    expect(isPseudoVersion("devel")).toBe(true);
    expect(isPseudoVersion("milestone")).toBe(true);
    expect(isPseudoVersion("2.19")).toBe(false);
  });

  it("orders releases, then milestone, devel and branch labels", () => {
    const labels = ["devel", "stable-2.19", "2.10", "milestone", "2.9", "feature-x"];
    expect([...labels].sort(compareSecondaryLabels)).toEqual([
      "2.9",
      "2.10",
      "milestone",
      "devel",
      "feature-x",
      "stable-2.19",
    ]);
  });
});
