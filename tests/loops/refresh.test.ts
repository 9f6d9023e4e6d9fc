/**
 * Tests for RefreshLoop: directory listing, capability discovery and
 * placeholder resolution into the peer table.
 */

import { describe, it, expect } from "vitest";
import { RefreshLoop } from "../../src/loops/refresh.js";
import { DiscoveryCache } from "../../src/discovery/cache.js";
import { placeholderRecord } from "../../src/discovery/record.js";
import { PeerTable } from "../../src/peers/table.js";
import { DirectoryError } from "../../src/errors.js";
import { createRecordingLogger } from "../helpers/logger.js";
import { fakeRegistry, yieldSleep } from "../helpers/fake-registry.js";
import { makeRecord } from "../helpers/records.js";

function setup(registry = fakeRegistry()) {
  const logger = createRecordingLogger();
  const now = () => 3_000_000;
  const discovery = new DiscoveryCache({ registry, dns: null, logger, now });
  const table = new PeerTable({ selfId: "self", logger, now });
  const refresh = new RefreshLoop({ discovery, table, capabilities: ["chat"], logger, sleep: yieldSleep });
  return { refresh, table, registry, logger };
}

describe("RefreshLoop.refresh", () => {
  it("lists, searches by capability and resolves placeholders", async () => {
    const registry = fakeRegistry({
      listed: [
        makeRecord({ id: "self", capabilities: ["chat"] }),
        makeRecord({ id: "a", capabilities: ["chat"] }),
        makeRecord({ id: "b", capabilities: ["summarization"] }),
      ],
      unlisted: [makeRecord({ id: "p1", host: "p1-host" })],
    });
    const { refresh, table, logger } = setup(registry);
    table.upsert("p1", placeholderRecord("p1", "a"));

    const result = await refresh.refresh();

    expect(result).toEqual({ added: ["a", "b"], resolved: ["p1"], total: 3 });
    expect(registry.list).toHaveBeenCalledWith({ capability: "chat" });
    expect(table.has("self")).toBe(false);
    expect(table.get("p1")?.record.needsResolution).toBeUndefined();
    expect(table.get("p1")?.address).toEqual({ host: "p1-host", port: 8000 });
    expect(logger.lines()).toEqual(expect.arrayContaining([
      "info: [peerweave:refresh] Resolved 1 gossip placeholder(s)",
      "info: [peerweave:refresh] Discovered 2 new peer(s): a, b",
      "info: [peerweave:refresh] Refreshed peers, now tracking 3 peer(s)",
    ]));
  });

  it("keeps a placeholder that still cannot be resolved", async () => {
    const { refresh, table } = setup();
    table.upsert("ghost", placeholderRecord("ghost"));

    const result = await refresh.refresh();

    expect(result).toEqual({ added: [], resolved: [], total: 1 });
    expect(table.get("ghost")?.record.needsResolution).toBe(true);
  });

  it("survives a failing directory", async () => {
    const registry = fakeRegistry();
    registry.list.mockRejectedValue(new DirectoryError("network", "connect ECONNREFUSED"));
    const { refresh, logger } = setup(registry);

    expect(await refresh.refresh()).toEqual({ added: [], resolved: [], total: 0 });
    expect(logger.lines()).toContain("warn: [peerweave:discovery] Directory listing failed: connect ECONNREFUSED");
  });
});

describe("RefreshLoop background loop", () => {
  it("starts and stops once each", async () => {
    const { refresh } = setup();

    expect(refresh.start()).toBe(true);
    expect(refresh.start()).toBe(false);
    expect(refresh.running).toBe(true);

    expect(await refresh.stop()).toBe(true);
    expect(await refresh.stop()).toBe(false);
    expect(refresh.running).toBe(false);
  });

  it("defaults to a five-minute interval", () => {
    const { refresh } = setup();
    expect(refresh.intervalMs).toBe(300_000);
  });
});
