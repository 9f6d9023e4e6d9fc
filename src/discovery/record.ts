/**
 * AgentRecord codec.
 *
 * Directory and peer payloads are snake_case JSON (`last_update` in epoch
 * seconds, `model_info`). Everything entering the process goes through
 * `recordFromWire`, everything leaving through `recordToWire`.
 */

import type { AgentRecord, ModelInfo, Provenance } from "../types.js";
import { isRecord, toRecord, toStringArray, toStringMap } from "../utils/guards.js";

function isProvenance(v: unknown): v is Provenance {
  return v === "registry" || v === "dns" || v === "gossip";
}

function optionalString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function toModelInfo(v: unknown): ModelInfo | undefined {
  if (!isRecord(v)) return undefined;
  return {
    type: optionalString(v.type),
    provider: optionalString(v.provider),
  };
}

/**
 * Validate an unknown wire value into an AgentRecord.
 * Returns null unless `id` is a non-empty string. Missing `name` falls
 * back to the id; unknown keys are dropped.
 */
export function recordFromWire(v: unknown): AgentRecord | null {
  if (!isRecord(v)) return null;
  if (typeof v.id !== "string" || v.id.length === 0) return null;

  const port = typeof v.port === "number" || typeof v.port === "string" ? v.port : undefined;
  const lastUpdate = typeof v.last_update === "number" ? Math.round(v.last_update * 1000) : undefined;
  // Placeholders carry `source`; directory copies of our own records carry `_source`.
  const provenanceRaw = v.provenance ?? v.source ?? v._source;

  const record: AgentRecord = {
    id: v.id,
    name: typeof v.name === "string" ? v.name : v.id,
    description: optionalString(v.description),
    capabilities: toStringArray(v.capabilities),
    interfaces: toStringMap(v.interfaces),
    endpoints: toStringMap(v.endpoints),
    host: optionalString(v.host),
    port,
    version: optionalString(v.version),
    protocols: toStringArray(v.protocols),
    modelInfo: toModelInfo(v.model_info),
    owner: optionalString(v.owner),
    lastUpdate,
    provenance: isProvenance(provenanceRaw) ? provenanceRaw : undefined,
    needsResolution: v.needs_resolution === true ? true : undefined,
    discoveredVia: optionalString(v.discovered_via),
  };

  return stripUndefined(record);
}

/** Parse the `agents` array of a directory listing; invalid entries are skipped. */
export function recordsFromWire(body: unknown): AgentRecord[] {
  const agents = toRecord(body).agents;
  if (!Array.isArray(agents)) return [];
  const out: AgentRecord[] = [];
  for (const entry of agents) {
    const record = recordFromWire(entry);
    if (record) out.push(record);
  }
  return out;
}

/** Serialize a record into the directory's snake_case JSON shape. */
export function recordToWire(record: AgentRecord): Record<string, unknown> {
  const wire: Record<string, unknown> = {
    id: record.id,
    name: record.name,
    description: record.description,
    capabilities: [...record.capabilities],
    interfaces: { ...record.interfaces },
    endpoints: { ...record.endpoints },
    host: record.host,
    port: record.port,
    version: record.version,
    protocols: [...record.protocols],
    model_info: record.modelInfo ? { ...record.modelInfo } : undefined,
    owner: record.owner,
    last_update: record.lastUpdate !== undefined ? record.lastUpdate / 1000 : undefined,
  };
  for (const key of Object.keys(wire)) {
    if (wire[key] === undefined) delete wire[key];
  }
  return wire;
}

/** Minimal record for an id learned through gossip but not yet resolved. */
export function placeholderRecord(id: string, discoveredVia?: string): AgentRecord {
  return stripUndefined({
    id,
    name: id,
    capabilities: [],
    interfaces: {},
    endpoints: {},
    protocols: [],
    provenance: "gossip",
    needsResolution: true,
    discoveredVia,
  });
}

/** Drop undefined-valued optional keys so records compare cleanly. */
function stripUndefined(record: AgentRecord): AgentRecord {
  const out: AgentRecord = { ...record };
  for (const [key, value] of Object.entries(out)) {
    if (value === undefined) Reflect.deleteProperty(out, key);
  }
  return out;
}
