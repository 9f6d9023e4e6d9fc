/**
 * Peer-to-peer HTTP client.
 *
 * Every node exposes:
 *   GET  /peers   → { peers: [id, ...] }
 *   POST /peers   { peers: [...] } → { status, added_peers, total_peers }
 *   GET  /health  → { status: "ok" }
 *
 * Records may advertise other paths under `endpoints.peers` and
 * `endpoints.ping` / `endpoints.health`; those win over the defaults.
 */

import type { Logger } from "../types.js";
import { PeerRequestError } from "../errors.js";
import { errorMessage, isStringArray, toRecord, toStringArray } from "../utils/guards.js";
import { endpointUrl, type PeerAddress } from "./address.js";

/** Enough to contact a peer. */
export interface PeerTarget {
  id: string;
  address: PeerAddress;
  endpoints: Record<string, string>;
}

/** Answer to a POST /peers. */
export interface PeerPushResult {
  status: string;
  addedPeers: string[];
  totalPeers: number;
}

export interface PeerLink {
  /** Ids the target knows. Throws PeerRequestError. */
  fetchPeerIds(target: PeerTarget): Promise<string[]>;
  /** Tell the target about ids. Throws PeerRequestError. */
  sendPeerIds(target: PeerTarget, ids: string[]): Promise<PeerPushResult>;
  /** True on 2xx, false on any other status. Throws PeerRequestError on transport failure. */
  checkHealth(target: PeerTarget): Promise<boolean>;
}

export interface HttpPeerLinkOptions {
  logger: Logger;
  /** Timeout for peer list exchanges (ms). Default: 5_000. */
  exchangeTimeoutMs?: number;
  /** Timeout for health probes (ms). Default: 2_000. */
  healthTimeoutMs?: number;
}

export function peersUrl(target: PeerTarget): string {
  return endpointUrl(target.address, target.endpoints, ["peers"], "/peers");
}

export function healthUrl(target: PeerTarget): string {
  return endpointUrl(target.address, target.endpoints, ["ping", "health"], "/health");
}

export function createHttpPeerLink(opts: HttpPeerLinkOptions): PeerLink {
  const { logger, exchangeTimeoutMs = 5_000, healthTimeoutMs = 2_000 } = opts;

  async function call(
    url: string,
    init: { method: string; body?: unknown; timeoutMs: number },
  ): Promise<Response> {
    try {
      return await fetch(url, {
        method: init.method,
        headers: init.body !== undefined
          ? { "Content-Type": "application/json", Accept: "application/json" }
          : { Accept: "application/json" },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(init.timeoutMs),
      });
    } catch (err) {
      throw new PeerRequestError("network", `${init.method} ${url} failed: ${errorMessage(err)}`);
    }
  }

  async function readBody(res: Response, url: string): Promise<Record<string, unknown>> {
    if (!res.ok) {
      throw new PeerRequestError("http_status", `${url} answered HTTP ${res.status}`, res.status);
    }
    try {
      return toRecord(await res.json());
    } catch (err) {
      throw new PeerRequestError("bad_response", `${url}: invalid JSON (${errorMessage(err)})`, res.status);
    }
  }

  async function fetchPeerIds(target: PeerTarget): Promise<string[]> {
    const url = peersUrl(target);
    logger.debug?.(`[peerweave:peer-link] GET ${url}`);
    const body = await readBody(await call(url, { method: "GET", timeoutMs: exchangeTimeoutMs }), url);
    if (!isStringArray(body.peers)) {
      throw new PeerRequestError("bad_response", `${url}: expected { peers: string[] }`);
    }
    return body.peers;
  }

  async function sendPeerIds(target: PeerTarget, ids: string[]): Promise<PeerPushResult> {
    const url = peersUrl(target);
    logger.debug?.(`[peerweave:peer-link] POST ${url} (${ids.length} id(s))`);
    const res = await call(url, { method: "POST", body: { peers: ids }, timeoutMs: exchangeTimeoutMs });
    const body = await readBody(res, url);
    return {
      status: typeof body.status === "string" ? body.status : "success",
      addedPeers: toStringArray(body.added_peers),
      totalPeers: typeof body.total_peers === "number" ? body.total_peers : 0,
    };
  }

  async function checkHealth(target: PeerTarget): Promise<boolean> {
    const url = healthUrl(target);
    const res = await call(url, { method: "GET", timeoutMs: healthTimeoutMs });
    // Drain the body so the socket is released.
    await res.arrayBuffer().catch(() => undefined);
    return res.ok;
  }

  return { fetchPeerIds, sendPeerIds, checkHealth };
}
