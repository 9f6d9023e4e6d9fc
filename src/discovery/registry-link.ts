/**
 * Directory client.
 *
 * Thin request/response wrapper over the central directory's HTTP API.
 * Methods throw DirectoryError on transport or status failures, except
 * where a status carries meaning (404 on get/heartbeat/unregister).
 * Callers decide how to degrade.
 */

import type { AgentRecord, Logger, SearchCriteria } from "../types.js";
import { DirectoryError } from "../errors.js";
import { errorMessage, toRecord } from "../utils/guards.js";
import { recordFromWire, recordsFromWire, recordToWire } from "./record.js";

/** Listing filters, sent as query parameters of `GET /agents`. */
export interface AgentListFilters {
  capability?: string;
  query?: string;
  protocol?: string;
  provider?: string;
  limit?: number;
  offset?: number;
}

/** Outcome of a heartbeat. Never thrown. */
export type HeartbeatStatus = "ok" | "not_found" | "error";

export interface HeartbeatResult {
  status: HeartbeatStatus;
  message?: string;
}

export interface RegisterResult {
  status: string;
  /** The record as the directory stored it. */
  record: AgentRecord | null;
}

/** Contract the core needs from the directory. */
export interface RegistryLink {
  register(record: AgentRecord): Promise<RegisterResult>;
  list(filters?: AgentListFilters): Promise<AgentRecord[]>;
  /** Criteria search; `capabilities` beyond the first are AND-matched on the returned page. */
  search(criteria: SearchCriteria): Promise<AgentRecord[]>;
  /** Resolves null when the directory answers 404. */
  get(id: string): Promise<AgentRecord | null>;
  heartbeat(id: string): Promise<HeartbeatResult>;
  /** Resolves false when the directory does not know the id. */
  unregister(id: string): Promise<boolean>;
}

export interface HttpRegistryLinkOptions {
  /** Directory base URL (e.g. "http://registry:5000"). */
  baseUrl: string;
  logger: Logger;
  /** Timeout for directory calls (ms). Default: 10_000. */
  timeoutMs?: number;
  /** Timeout for heartbeats (ms). Default: 5_000. */
  heartbeatTimeoutMs?: number;
}

/** Turn listing filters into URL search params, skipping unset values. */
export function toSearchParams(filters: AgentListFilters): URLSearchParams {
  const params = new URLSearchParams();
  if (filters.capability) params.set("capability", filters.capability);
  if (filters.query) params.set("query", filters.query);
  if (filters.protocol) params.set("protocol", filters.protocol);
  if (filters.provider) params.set("provider", filters.provider);
  if (filters.limit !== undefined) params.set("limit", String(filters.limit));
  if (filters.offset !== undefined) params.set("offset", String(filters.offset));
  return params;
}

/**
 * Create a RegistryLink backed by fetch.
 *
 * @param opts - Base URL, logger and timeouts
 */
export function createHttpRegistryLink(opts: HttpRegistryLinkOptions): RegistryLink {
  const { logger, timeoutMs = 10_000, heartbeatTimeoutMs = 5_000 } = opts;
  const baseUrl = opts.baseUrl.replace(/\/+$/, "");

  async function request(
    method: string,
    path: string,
    init: { body?: unknown; timeout?: number } = {},
  ): Promise<Response> {
    const url = `${baseUrl}${path}`;
    try {
      return await fetch(url, {
        method,
        headers: init.body !== undefined
          ? { "Content-Type": "application/json", Accept: "application/json" }
          : { Accept: "application/json" },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(init.timeout ?? timeoutMs),
      });
    } catch (err) {
      throw new DirectoryError("network", `${method} ${url} failed: ${errorMessage(err)}`);
    }
  }

  async function readJson(res: Response, what: string): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new DirectoryError("bad_response", `${what}: invalid JSON (${errorMessage(err)})`, res.status);
    }
  }

  async function expectOk(res: Response, what: string): Promise<void> {
    if (res.ok) return;
    const text = await res.text().catch(() => "");
    throw new DirectoryError("http_status", `${what}: HTTP ${res.status} ${text.slice(0, 200)}`.trim(), res.status);
  }

  async function register(record: AgentRecord): Promise<RegisterResult> {
    logger.info(`[peerweave:registry] Registering ${record.id}`);
    const res = await request("POST", "/registerAgent", { body: recordToWire(record) });
    await expectOk(res, `register ${record.id}`);
    const body = toRecord(await readJson(res, `register ${record.id}`));
    return {
      status: typeof body.status === "string" ? body.status : "success",
      record: recordFromWire(body.agent),
    };
  }

  async function list(filters: AgentListFilters = {}): Promise<AgentRecord[]> {
    const qs = toSearchParams(filters).toString();
    const res = await request("GET", qs ? `/agents?${qs}` : "/agents");
    await expectOk(res, "list agents");
    const body = await readJson(res, "list agents");
    if (!Array.isArray(toRecord(body).agents)) {
      throw new DirectoryError("bad_response", "list agents: no agents array", res.status);
    }
    return recordsFromWire(body);
  }

  async function search(criteria: SearchCriteria): Promise<AgentRecord[]> {
    const required = criteria.capabilities ?? [];
    const page = await list({
      capability: required[0],
      query: criteria.query,
      protocol: criteria.protocol,
      provider: criteria.provider,
      limit: criteria.limit,
      offset: criteria.offset,
    });
    // The directory filters on one capability; enforce the rest here.
    if (required.length <= 1) return page;
    return page.filter((r) => required.every((cap) => r.capabilities.includes(cap)));
  }

  async function get(id: string): Promise<AgentRecord | null> {
    const res = await request("GET", `/agents/${encodeURIComponent(id)}`);
    if (res.status === 404) return null;
    await expectOk(res, `get ${id}`);
    const record = recordFromWire(await readJson(res, `get ${id}`));
    if (!record) {
      throw new DirectoryError("bad_response", `get ${id}: response is not an agent record`, res.status);
    }
    return record;
  }

  async function heartbeat(id: string): Promise<HeartbeatResult> {
    try {
      const res = await request("PUT", `/agents/${encodeURIComponent(id)}/heartbeat`, {
        timeout: heartbeatTimeoutMs,
      });
      if (res.status === 404) {
        logger.warn(`[peerweave:registry] ${id} not found in directory`);
        return { status: "not_found", message: "Agent not found in registry" };
      }
      await expectOk(res, `heartbeat ${id}`);
      return { status: "ok" };
    } catch (err) {
      const message = errorMessage(err);
      logger.warn(`[peerweave:registry] Heartbeat for ${id} failed: ${message}`);
      return { status: "error", message };
    }
  }

  async function unregister(id: string): Promise<boolean> {
    logger.info(`[peerweave:registry] Unregistering ${id}`);
    const res = await request("DELETE", `/agents/${encodeURIComponent(id)}`);
    if (res.status === 404) return false;
    await expectOk(res, `unregister ${id}`);
    return true;
  }

  return { register, list, search, get, heartbeat, unregister };
}
