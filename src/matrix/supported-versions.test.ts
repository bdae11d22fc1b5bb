import { describe, expect, it } from "vitest";

import { InvalidVersionFormatError } from "../core/errors.js";

import { selectSupportedVersions } from "./supported-versions.js";

const VERSIONS = ["2.14", "2.15", "2.16", "2.17", "2.18"];

describe("selectSupportedVersions", () => {
  it("returns everything without bounds", () => {
    expect(selectSupportedVersions(VERSIONS, {})).toEqual(VERSIONS);
  });

  it("applies inclusive bounds and exceptions", () => {
    expect(
      selectSupportedVersions(VERSIONS, {
        minVersion: "2.15",
        maxVersion: "2.17",
        exceptVersions: ["2.16"],
      }),
    ).toEqual(["2.15", "2.17"]);
  });

  it("rejects malformed bounds", () => {
    expect(() => selectSupportedVersions(VERSIONS, { minVersion: "latest" })).toThrow(
      InvalidVersionFormatError,
    );
  });
});
