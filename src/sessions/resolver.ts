/*
Purpose: turn a requested session list into a dependency-ordered execution list.
Assumptions: pure; the registry is validated into an index-addressed graph before traversal.
Usage: resolveSessions(registry, []) for defaults; resolveSessions(registry, ["lint", "docs-check"]).
*/

import { ConfigError, SessionCycleError, UnknownSessionError } from "../core/errors.js";

import type { Session, SessionGraph } from "./types.js";

type VisitState = "unvisited" | "active" | "done";

type Frame = {
  node: number;
  next: number;
};

// =============================================================================
// GRAPH
// =============================================================================

export function createSessionGraph(registry: readonly Session[]): SessionGraph {
  const indexByName = new Map<string, number>();
  registry.forEach((session, index) => {
    if (indexByName.has(session.name)) {
      throw new ConfigError(`Session "${session.name}" is declared more than once.`);
    }
    indexByName.set(session.name, index);
  });

  const edges = registry.map((session) =>
    session.dependsOn.map((dependency) => {
      const index = indexByName.get(dependency);
      if (index === undefined) {
        throw new UnknownSessionError(dependency, session.name);
      }
      return index;
    }),
  );

  return { sessions: registry, indexByName, edges };
}

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveSessions(
  registry: readonly Session[],
  requestedNames: readonly string[],
): Session[] {
  const graph = createSessionGraph(registry);
  const roots = resolveRoots(graph, requestedNames);
  const state: VisitState[] = graph.sessions.map(() => "unvisited");
  const order: number[] = [];

  for (const root of roots) {
    if (state[root] !== "unvisited") continue;

    const stack: Frame[] = [{ node: root, next: 0 }];
    state[root] = "active";

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const dependencies = graph.edges[frame.node];

      if (frame.next >= dependencies.length) {
        stack.pop();
        state[frame.node] = "done";
        order.push(frame.node);
        continue;
      }

      const dependency = dependencies[frame.next];
      frame.next += 1;

      if (state[dependency] === "done") continue;
      if (state[dependency] === "active") {
        throw new SessionCycleError(describeCycle(graph, stack, dependency));
      }

      state[dependency] = "active";
      stack.push({ node: dependency, next: 0 });
    }
  }

  return order.map((index) => graph.sessions[index]);
}

export function resolveSessionNames(
  registry: readonly Session[],
  requestedNames: readonly string[],
): string[] {
  return resolveSessions(registry, requestedNames).map((session) => session.name);
}

// =============================================================================
// INTERNALS
// =============================================================================

// Unknown names are rejected before any traversal starts.
function resolveRoots(graph: SessionGraph, requestedNames: readonly string[]): number[] {
  if (requestedNames.length === 0) {
    return graph.sessions.flatMap((session, index) => (session.isDefault ? [index] : []));
  }

  const roots: number[] = [];
  for (const name of requestedNames) {
    const index = graph.indexByName.get(name);
    if (index === undefined) {
      throw new UnknownSessionError(name);
    }
    if (!roots.includes(index)) {
      roots.push(index);
    }
  }
  return roots;
}

function describeCycle(graph: SessionGraph, stack: readonly Frame[], target: number): string[] {
  const start = stack.findIndex((frame) => frame.node === target);
  return [...stack.slice(start), { node: target, next: 0 }].map(
    (frame) => graph.sessions[frame.node].name,
  );
}
