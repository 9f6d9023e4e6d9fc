/**
 * Test helper: AgentRecord factory.
 */

import type { AgentRecord } from "../../src/types.js";

export function makeRecord(overrides: Partial<AgentRecord> & { id: string }): AgentRecord {
  return {
    name: overrides.id,
    capabilities: [],
    interfaces: {},
    endpoints: {},
    protocols: [],
    ...overrides,
  };
}

/** Record reachable on loopback at `port`. */
export function loopbackRecord(id: string, port: number, overrides: Partial<AgentRecord> = {}): AgentRecord {
  return makeRecord({ id, host: "127.0.0.1", port, ...overrides });
}
