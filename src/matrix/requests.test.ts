import { describe, expect, it } from "vitest";

import { SessionsConfigSchema } from "../core/config.js";
import { ConfigError } from "../core/errors.js";

import { buildMatrixRequests } from "./requests.js";

const ENVIRONMENT = { localVersions: ["2.18"], availablePrimaryVersions: ["3.11"], inCi: false };

describe("buildMatrixRequests", () => {
  it("builds requests for configured kinds in sanity, units, integration order", () => {
    const sessions = SessionsConfigSchema.parse({
      integration: { min_version: "2.15" },
      units: { primary: ["3.11"], except_versions: ["2.16"] },
    });

    const requests = buildMatrixRequests(sessions, {}, ENVIRONMENT);

    expect(requests).toEqual([
      {
        testKind: "units",
        primaryVersions: ["3.11"],
        secondaryVersions: "all",
        localVersions: ["2.18"],
        minSecondaryVersion: null,
        maxSecondaryVersion: null,
        exceptSecondaryVersions: ["2.16"],
        availablePrimaryVersions: ["3.11"],
        localOnly: false,
        inCi: false,
        includeDevel: false,
        includeMilestone: false,
        develLikeBranches: [],
        controllerVersionsOnly: false,
      },
      {
        testKind: "integration",
        primaryVersions: "all",
        secondaryVersions: "all",
        localVersions: ["2.18"],
        minSecondaryVersion: "2.15",
        maxSecondaryVersion: null,
        exceptSecondaryVersions: [],
        availablePrimaryVersions: ["3.11"],
        localOnly: false,
        inCi: false,
        includeDevel: false,
        includeMilestone: false,
        develLikeBranches: [],
        controllerVersionsOnly: false,
      },
    ]);
  });

  it("lets command-line values override the config", () => {
    const sessions = SessionsConfigSchema.parse({
      units: { primary: ["3.11"], min_version: "2.14", local_only: false },
    });

    const [request] = buildMatrixRequests(
      sessions,
      {
        kinds: ["units"],
        primaryVersions: ["all"],
        secondaryVersions: ["2.17"],
        minVersion: "2.16",
        localOnly: true,
      },
      { ...ENVIRONMENT, inCi: true },
    );

    expect(request).toMatchObject({
      primaryVersions: "all",
      secondaryVersions: ["2.17"],
      minSecondaryVersion: "2.16",
      localOnly: true,
      inCi: true,
    });
  });

  it("carries pseudo versions, development branches and their release targets", () => {
    const sessions = SessionsConfigSchema.parse({
      integration: {
        include_devel: true,
        include_milestone: true,
        except_versions: ["milestone", "2.16"],
        add_devel_like_branches: [{ branch: "stable/next" }],
        controller_versions_only: true,
      },
    });
    const targets = { devel: "2.20", milestone: "2.19" };

    const [request] = buildMatrixRequests(sessions, {}, { ...ENVIRONMENT, pseudoVersionTargets: targets });

    expect(request).toMatchObject({
      testKind: "integration",
      includeDevel: true,
      includeMilestone: true,
      exceptSecondaryVersions: ["milestone", "2.16"],
      develLikeBranches: [{ repository: null, branch: "stable/next" }],
      pseudoVersionTargets: { devel: "2.20", milestone: "2.19" },
      controllerVersionsOnly: true,
    });
  });

  it("uses defaults for an explicit kind without config", () => {
    const requests = buildMatrixRequests(SessionsConfigSchema.parse({}), { kinds: ["sanity"] }, ENVIRONMENT);

    expect(requests.map((request) => request.testKind)).toEqual(["sanity"]);
    expect(requests[0]?.primaryVersions).toBe("all");
  });

  it("rejects unknown test kinds", () => {
    expect(() =>
      buildMatrixRequests(SessionsConfigSchema.parse({}), { kinds: ["smoke"] }, ENVIRONMENT),
    ).toThrow(ConfigError);
  });
});
