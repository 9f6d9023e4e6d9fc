/**
 * Peer routes.
 *
 * The HTTP surface every node exposes to its peers and operators:
 *
 *   GET  /peers              → { peers: [id, ...] }
 *   POST /peers              { peers: [...] } → { status, added_peers, total_peers }
 *   GET  /health             → { status: "ok" }
 *   GET  /metadata           → this node's record
 *   GET  /gossip/stats       → gossip counters + running
 *   POST /gossip/start       → { status: "started" | "already running" }
 *   POST /gossip/stop        → { status: "stopped" | "not running" }
 *   GET  /discover?capability=x → { agents: [...] }
 *   POST /search             criteria → { agents: [...] }
 *   GET  /resolve/{id}       → record, or 404
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { AgentRecord, Logger, SearchCriteria } from "./types.js";
import type { DiscoveryCache } from "./discovery/cache.js";
import { recordToWire } from "./discovery/record.js";
import type { GossipEngine } from "./gossip/engine.js";
import type { PeerTable } from "./peers/table.js";
import { InvalidJsonBodyError, readJsonBody, sendJson, type MeshHttpHandler } from "./server.js";
import { isRecord, isStringArray, toStringArray } from "./utils/guards.js";

export interface PeerRoutesDeps {
  /** This node's current record. */
  describeSelf: () => AgentRecord;
  table: PeerTable;
  gossip: GossipEngine;
  discovery: DiscoveryCache;
  logger: Logger;
}

/** Coerce a POST /search body into search criteria. Null if it is not an object. */
export function criteriaFromWire(body: unknown): SearchCriteria | null {
  if (!isRecord(body)) return null;

  const criteria: SearchCriteria = {};
  const capabilities = toStringArray(body.capabilities);
  if (typeof body.capability === "string") capabilities.unshift(body.capability);
  if (capabilities.length > 0) criteria.capabilities = capabilities;
  if (typeof body.query === "string") criteria.query = body.query;
  if (typeof body.protocol === "string") criteria.protocol = body.protocol;
  if (typeof body.provider === "string") criteria.provider = body.provider;
  if (typeof body.limit === "number" && Number.isInteger(body.limit) && body.limit > 0) {
    criteria.limit = body.limit;
  }
  if (typeof body.offset === "number" && Number.isInteger(body.offset) && body.offset >= 0) {
    criteria.offset = body.offset;
  }
  return criteria;
}

/** Parse the body, answering 400 on invalid JSON. Undefined means "already answered". */
async function bodyOrBadRequest(req: IncomingMessage, res: ServerResponse): Promise<{ body: unknown } | undefined> {
  try {
    return { body: await readJsonBody(req) };
  } catch (err) {
    if (err instanceof InvalidJsonBodyError) {
      sendJson(res, 400, { error: err.message });
      return undefined;
    }
    throw err;
  }
}

export function createPeerRoutes(deps: PeerRoutesDeps): MeshHttpHandler {
  const { table, gossip, discovery, logger } = deps;

  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const pathname = url.pathname.replace(/\/+$/, "") || "/";

    if (pathname === "/peers" && method === "GET") {
      sendJson(res, 200, { peers: table.ids() });
      return true;
    }

    if (pathname === "/peers" && method === "POST") {
      const parsed = await bodyOrBadRequest(req, res);
      if (!parsed) return true;
      const peers = isRecord(parsed.body) ? parsed.body.peers : undefined;
      if (!isStringArray(peers)) {
        sendJson(res, 400, { error: "Invalid peer data" });
        return true;
      }
      const result = await gossip.handleIncomingPeers(peers);
      sendJson(res, 200, {
        status: result.status,
        added_peers: result.addedPeers,
        total_peers: result.totalPeers,
      });
      return true;
    }

    if (pathname === "/health" && method === "GET") {
      sendJson(res, 200, { status: "ok" });
      return true;
    }

    if (pathname === "/metadata" && method === "GET") {
      sendJson(res, 200, recordToWire(deps.describeSelf()));
      return true;
    }

    if (pathname === "/gossip/stats" && method === "GET") {
      sendJson(res, 200, { ...gossip.stats, running: gossip.running });
      return true;
    }

    if (pathname === "/gossip/start" && method === "POST") {
      const started = gossip.start();
      sendJson(res, 200, { status: started ? "started" : "already running" });
      return true;
    }

    if (pathname === "/gossip/stop" && method === "POST") {
      const stopped = await gossip.stop();
      sendJson(res, 200, { status: stopped ? "stopped" : "not running" });
      return true;
    }

    if (pathname === "/discover" && method === "GET") {
      const capability = url.searchParams.get("capability");
      if (!capability) {
        sendJson(res, 400, { error: "Missing capability parameter" });
        return true;
      }
      const agents = await discovery.resolveByCapability(capability);
      sendJson(res, 200, { agents: agents.map(recordToWire) });
      return true;
    }

    if (pathname === "/search" && method === "POST") {
      const parsed = await bodyOrBadRequest(req, res);
      if (!parsed) return true;
      const criteria = criteriaFromWire(parsed.body);
      if (!criteria) {
        sendJson(res, 400, { error: "Missing search criteria" });
        return true;
      }
      const agents = await discovery.resolveByCriteria(criteria);
      sendJson(res, 200, { agents: agents.map(recordToWire) });
      return true;
    }

    const resolveMatch = /^\/resolve\/([^/]+)$/.exec(pathname);
    if (resolveMatch && method === "GET") {
      let id: string;
      try {
        id = decodeURIComponent(resolveMatch[1]);
      } catch {
        sendJson(res, 400, { error: "Malformed agent id" });
        return true;
      }
      const record = await discovery.resolve(id);
      if (!record) {
        sendJson(res, 404, { error: `Agent ${id} not found` });
        return true;
      }
      logger.debug?.(`[peerweave:routes] Resolved ${id} (${record.provenance ?? "unknown source"})`);
      sendJson(res, 200, recordToWire(record));
      return true;
    }

    return false;
  };
}
