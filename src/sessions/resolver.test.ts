import { describe, expect, it } from "vitest";

import { ConfigError, SessionCycleError, UnknownSessionError } from "../core/errors.js";

import { createSessionGraph, resolveSessionNames } from "./resolver.js";
import type { Session } from "./types.js";

// =============================================================================
// HELPERS
// =============================================================================

function session(name: string, dependsOn: string[] = [], isDefault = false): Session {
  return { name, dependsOn, isDefault, group: "custom" };
}

const LINT_REGISTRY: Session[] = [
  session("formatters"),
  session("codeqa"),
  session("typing"),
  session("lint", ["formatters", "codeqa", "typing"], true),
  session("docs-check"),
];

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveSessionNames", () => {
  it("expands default sessions dependencies-first", () => {
    expect(resolveSessionNames(LINT_REGISTRY, [])).toEqual([
      "formatters",
      "codeqa",
      "typing",
      "lint",
    ]);
  });

  it("keeps request order and skips sessions already placed", () => {
    expect(resolveSessionNames(LINT_REGISTRY, ["docs-check", "typing", "lint", "typing"])).toEqual([
      "docs-check",
      "typing",
      "formatters",
      "codeqa",
      "lint",
    ]);
  });

  it("is idempotent when fed its own output", () => {
    const registry: Session[] = [
      session("a", ["c"]),
      session("b", ["a", "c"], true),
      session("c"),
      session("d", ["b"], true),
    ];

    const first = resolveSessionNames(registry, []);
    expect(first).toEqual(["c", "a", "b", "d"]);
    expect(resolveSessionNames(registry, first)).toEqual(first);
  });

  it("follows shared dependencies only once", () => {
    const registry: Session[] = [
      session("base"),
      session("left", ["base"]),
      session("right", ["base"]),
      session("top", ["left", "right"]),
    ];

    expect(resolveSessionNames(registry, ["top"])).toEqual(["base", "left", "right", "top"]);
  });

  it.each(["a", "b"])("raises SessionCycle when %s is requested in a two-session cycle", (name) => {
    const registry: Session[] = [session("a", ["b"]), session("b", ["a"])];

    const error = catchError(() => resolveSessionNames(registry, [name]));

    expect(error).toBeInstanceOf(SessionCycleError);
    const other = name === "a" ? "b" : "a";
    expect((error as SessionCycleError).cycle).toEqual([name, other, name]);
  });

  it("reports self-dependencies as cycles", () => {
    const error = catchError(() => resolveSessionNames([session("loop", ["loop"])], ["loop"]));

    expect((error as SessionCycleError).cycle).toEqual(["loop", "loop"]);
  });

  it("rejects unknown requested sessions before expanding anything", () => {
    const registry: Session[] = [session("a", ["b"]), session("b", ["a"])];

    const error = catchError(() => resolveSessionNames(registry, ["a", "missing"]));

    expect(error).toBeInstanceOf(UnknownSessionError);
    expect((error as UnknownSessionError).session).toBe("missing");
  });

  it("returns an empty list when nothing is default", () => {
    expect(resolveSessionNames([session("a")], [])).toEqual([]);
  });
});

describe("createSessionGraph", () => {
  it("addresses dependencies by index", () => {
    const graph = createSessionGraph(LINT_REGISTRY);

    expect(graph.indexByName.get("lint")).toBe(3);
    expect(graph.edges[3]).toEqual([0, 1, 2]);
  });

  it("rejects duplicate session names", () => {
    expect(() => createSessionGraph([session("a"), session("a")])).toThrow(ConfigError);
  });

  it("rejects dependencies on unknown sessions", () => {
    const error = catchError(() => createSessionGraph([session("lint", ["format"])]));

    expect(error).toBeInstanceOf(UnknownSessionError);
    expect((error as UnknownSessionError).requiredBy).toBe("lint");
  });
});
