/**
 * Tests for the peer routes, served over a real in-process HTTP server.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import { createPeerRoutes, criteriaFromWire } from "../src/routes.js";
import { listeningPort, startMeshHttpServer, stopMeshHttpServer } from "../src/server.js";
import { DiscoveryCache } from "../src/discovery/cache.js";
import { GossipEngine } from "../src/gossip/engine.js";
import { PeerTable } from "../src/peers/table.js";
import type { PeerLink } from "../src/peers/link.js";
import type { AgentRecord } from "../src/types.js";
import { createRecordingLogger } from "./helpers/logger.js";
import { fakeRegistry, yieldSleep } from "./helpers/fake-registry.js";
import { makeRecord } from "./helpers/records.js";
import { request } from "./helpers/http.js";

const self: AgentRecord = makeRecord({
  id: "self.agents.local",
  name: "Self",
  capabilities: ["chat"],
  host: "self",
  port: 8000,
  protocols: ["rest-json"],
  lastUpdate: 1_700_000_000_000,
});

const idleLink: PeerLink = {
  fetchPeerIds: async () => [],
  sendPeerIds: async () => ({ status: "success", addedPeers: [], totalPeers: 0 }),
  checkHealth: async () => true,
};

describe("peer routes", () => {
  let server: Server;
  let port: number;
  let table: PeerTable;
  let gossip: GossipEngine;
  let registry: ReturnType<typeof fakeRegistry>;

  beforeEach(async () => {
    const logger = createRecordingLogger();
    registry = fakeRegistry({
      listed: [
        makeRecord({ id: "chat1.agents.local", capabilities: ["chat"], protocols: ["rest-json"] }),
        makeRecord({ id: "sum1.agents.local", capabilities: ["summarization"] }),
      ],
    });
    const discovery = new DiscoveryCache({ registry, dns: null, logger });
    table = new PeerTable({ selfId: self.id, logger });
    gossip = new GossipEngine({
      selfId: self.id,
      table,
      resolver: discovery,
      peerLink: idleLink,
      logger,
      sleep: yieldSleep,
    });
    server = await startMeshHttpServer(
      createPeerRoutes({ describeSelf: () => self, table, gossip, discovery, logger }),
      { port: 0, logger },
    );
    port = listeningPort(server);
  });

  afterEach(async () => {
    await gossip.stop();
    await stopMeshHttpServer(server);
  });

  // --- /peers ---

  it("GET /peers lists known ids", async () => {
    table.upsert("a.agents.local", makeRecord({ id: "a.agents.local" }));
    table.upsert("b.agents.local", makeRecord({ id: "b.agents.local" }));

    const res = await request(port, "/peers");
    expect(res).toEqual({ status: 200, body: { peers: ["a.agents.local", "b.agents.local"] } });
  });

  it("tolerates a trailing slash", async () => {
    const res = await request(port, "/peers/");
    expect(res).toEqual({ status: 200, body: { peers: [] } });
  });

  it("POST /peers absorbs new ids and reports them", async () => {
    table.upsert("a.agents.local", makeRecord({ id: "a.agents.local" }));

    const res = await request(port, "/peers", {
      method: "POST",
      body: { peers: ["a.agents.local", "chat1.agents.local", self.id] },
    });

    expect(res).toEqual({
      status: 200,
      body: { status: "success", added_peers: ["chat1.agents.local"], total_peers: 2 },
    });
    expect(table.get("chat1.agents.local")?.record.provenance).toBe("registry");
    expect(gossip.stats.messagesReceived).toBe(1);
  });

  it("POST /peers rejects a body without a peers array", async () => {
    const res = await request(port, "/peers", { method: "POST", body: { peers: "a,b" } });
    expect(res).toEqual({ status: 400, body: { error: "Invalid peer data" } });
  });

  it("POST /peers rejects invalid JSON", async () => {
    const res = await request(port, "/peers", { method: "POST", rawBody: "{oops" });
    expect(res).toEqual({ status: 400, body: { error: "Invalid JSON body" } });
  });

  // --- /health, /metadata ---

  it("GET /health answers ok", async () => {
    expect(await request(port, "/health")).toEqual({ status: 200, body: { status: "ok" } });
  });

  it("GET /metadata returns this node's record in wire form", async () => {
    const res = await request(port, "/metadata");
    expect(res).toEqual({
      status: 200,
      body: {
        id: "self.agents.local",
        name: "Self",
        capabilities: ["chat"],
        interfaces: {},
        endpoints: {},
        host: "self",
        port: 8000,
        protocols: ["rest-json"],
        last_update: 1_700_000_000,
      },
    });
  });

  // --- /gossip ---

  it("GET /gossip/stats reports counters and the running flag", async () => {
    const res = await request(port, "/gossip/stats");
    expect(res).toEqual({
      status: 200,
      body: {
        rounds: 0,
        messagesSent: 0,
        messagesReceived: 0,
        peersSent: 0,
        peersReceived: 0,
        newPeersDiscovered: 0,
        stalePeersRemoved: 0,
        errors: 0,
        lastRoundAt: null,
        lastRoundDurationMs: null,
        running: false,
      },
    });
  });

  it("POST /gossip/start and /gossip/stop toggle the loop", async () => {
    expect((await request(port, "/gossip/start", { method: "POST" })).body).toEqual({ status: "started" });
    expect((await request(port, "/gossip/start", { method: "POST" })).body).toEqual({ status: "already running" });
    expect(gossip.running).toBe(true);

    expect((await request(port, "/gossip/stop", { method: "POST" })).body).toEqual({ status: "stopped" });
    expect((await request(port, "/gossip/stop", { method: "POST" })).body).toEqual({ status: "not running" });
    expect(gossip.running).toBe(false);
  });

  // --- discovery ---

  it("GET /discover requires a capability", async () => {
    expect(await request(port, "/discover")).toEqual({ status: 400, body: { error: "Missing capability parameter" } });
  });

  it("GET /discover lists agents with the capability", async () => {
    const res = await request(port, "/discover?capability=chat");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      agents: [{
        id: "chat1.agents.local",
        name: "chat1.agents.local",
        capabilities: ["chat"],
        interfaces: {},
        endpoints: {},
        protocols: ["rest-json"],
      }],
    });
  });

  it("POST /search passes criteria to the directory", async () => {
    const res = await request(port, "/search", { method: "POST", body: { capability: "chat", limit: 5 } });
    expect(res.status).toBe(200);
    expect(registry.search).toHaveBeenCalledWith({ capabilities: ["chat"], limit: 5 });
  });

  it("POST /search without a criteria object answers 400", async () => {
    expect(await request(port, "/search", { method: "POST" })).toEqual({
      status: 400,
      body: { error: "Missing search criteria" },
    });
  });

  it("GET /resolve/{id} returns the record or 404", async () => {
    const found = await request(port, "/resolve/sum1.agents.local");
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({ id: "sum1.agents.local", capabilities: ["summarization"] });

    const missing = await request(port, "/resolve/ghost.agents.local");
    expect(missing).toEqual({ status: 404, body: { error: "Agent ghost.agents.local not found" } });
  });

  it("GET /resolve/{id} answers 400 for a malformed escape", async () => {
    expect(await request(port, "/resolve/%E0%A4%A")).toEqual({
      status: 400,
      body: { error: "Malformed agent id" },
    });
    expect(registry.get).not.toHaveBeenCalled();
  });

  it("answers 404 for anything else", async () => {
    expect(await request(port, "/peers", { method: "DELETE" })).toEqual({ status: 404, body: { error: "not found" } });
  });
});

describe("criteriaFromWire", () => {
  it("merges capability into capabilities, first", () => {
    expect(criteriaFromWire({ capability: "chat", capabilities: ["translation"] })).toEqual({
      capabilities: ["chat", "translation"],
    });
  });

  it("keeps valid paging and drops invalid values", () => {
    expect(criteriaFromWire({ query: "summ", limit: 0, offset: 2, protocol: 7 })).toEqual({ query: "summ", offset: 2 });
  });

  it("returns null for a non-object", () => {
    expect(criteriaFromWire(["chat"])).toBeNull();
    expect(criteriaFromWire(undefined)).toBeNull();
  });
});
