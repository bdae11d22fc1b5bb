import type { SESSION_GROUPS } from "../core/config.js";

export type SessionGroup = (typeof SESSION_GROUPS)[number];

export type Session = {
  name: string;
  dependsOn: string[];
  isDefault: boolean;
  group: SessionGroup;
  description?: string;
};

/**
 * Arena form of a registry: sessions in declaration order, addressed by index.
 * `edges[i]` holds the indices of the sessions that `sessions[i]` depends on.
 */
export type SessionGraph = {
  sessions: readonly Session[];
  indexByName: ReadonlyMap<string, number>;
  edges: readonly (readonly number[])[];
};
