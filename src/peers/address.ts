/**
 * Peer address resolution.
 *
 * Records arrive with loosely structured location data. The chain below
 * is applied once, when a record enters the PeerTable, and its result is
 * what every later probe and exchange uses:
 *
 *   1. explicit `port` (integer, else warn and skip) and explicit `host`
 *   2. host, and port if still missing, from the `rest` interface URL
 *   3. host = leading label of the id ("agent1.agents.local" → "agent1")
 *   4. port 8000
 *
 * No host after step 3 means the peer cannot be contacted.
 */

import type { AgentRecord, Logger } from "../types.js";

/** Port assumed when nothing else names one. */
export const DEFAULT_PEER_PORT = 8000;

/** Where a peer can be reached. */
export interface PeerAddress {
  host: string;
  port: number;
}

/** Parse a port value; null unless it is a positive integer. */
export function parsePort(v: unknown): number | null {
  if (typeof v === "number") {
    return Number.isInteger(v) && v > 0 ? v : null;
  }
  if (typeof v === "string" && /^\s*\d+\s*$/.test(v)) {
    const n = Number.parseInt(v, 10);
    return n > 0 ? n : null;
  }
  return null;
}

/** Host and port from the netloc of a URL, or nulls. */
function fromInterfaceUrl(url: string): { host: string | null; port: number | null } {
  const match = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]+)/i.exec(url);
  if (!match) return { host: null, port: null };
  const netloc = match[1].replace(/^.*@/, "");

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(netloc);
  if (bracketed) {
    return { host: bracketed[1], port: bracketed[2] ? parsePort(bracketed[2]) : null };
  }

  const [host, portRaw] = netloc.split(":");
  return {
    host: host.length > 0 ? host : null,
    port: portRaw ? parsePort(portRaw) : null,
  };
}

/**
 * Derive where a peer can be reached.
 *
 * @param id - The peer's id (used for the leading-label fallback)
 * @param record - The peer's record
 * @param logger - Receives a warning for an unparseable port
 */
export function resolvePeerAddress(
  id: string,
  record: AgentRecord,
  logger?: Logger,
): PeerAddress | null {
  let host: string | null = record.host && record.host.length > 0 ? record.host : null;
  let port: number | null = null;

  if (record.port !== undefined) {
    port = parsePort(record.port);
    if (port === null) {
      logger?.warn(`[peerweave:peers] Invalid port in peer info for ${id}: ${String(record.port)}`);
    }
  }

  const rest = record.interfaces.rest;
  if (!host && rest) {
    const fromUrl = fromInterfaceUrl(rest);
    host = fromUrl.host;
    if (port === null) port = fromUrl.port;
  }

  if (!host && id.includes(".")) {
    const label = id.split(".")[0];
    if (label.length > 0) host = label;
  }

  if (!host) return null;
  return { host, port: port ?? DEFAULT_PEER_PORT };
}

/** Base URL for an address ("http://agent1:8000"). */
export function baseUrl(address: PeerAddress): string {
  const host = address.host.includes(":") ? `[${address.host}]` : address.host;
  return `http://${host}:${address.port}`;
}

/**
 * URL of one of a peer's advertised endpoints.
 * Absolute URLs in the record win; paths are joined to the address.
 */
export function endpointUrl(
  address: PeerAddress,
  endpoints: Record<string, string>,
  names: readonly string[],
  fallbackPath: string,
): string {
  for (const name of names) {
    const value = endpoints[name];
    if (!value) continue;
    if (/^https?:\/\//.test(value)) return value;
    return `${baseUrl(address)}${value.startsWith("/") ? value : `/${value}`}`;
  }
  return `${baseUrl(address)}${fallbackPath}`;
}
