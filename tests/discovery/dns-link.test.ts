import { describe, it, expect, vi } from "vitest";
import { createDnsLink, parseAgentTxt, type DnsResolverLike } from "../../src/discovery/dns-link.js";
import { silentLogger } from "../../src/logger.js";

function dnsError(code: string): Error {
  return Object.assign(new Error(`query failed: ${code}`), { code });
}

function fakeResolver(overrides: Partial<DnsResolverLike> = {}): DnsResolverLike {
  return {
    resolveSrv: vi.fn(async () => [{ name: "agent1.", port: 8001, priority: 0, weight: 0 }]),
    resolveTxt: vi.fn(async () => [["caps=chat, summarization"], ["desc=Summarizes ", "documents"], ["ver=2.3"]]),
    ...overrides,
  };
}

describe("createDnsLink", () => {
  it("builds a record from SRV and TXT", async () => {
    const resolver = fakeResolver();
    const link = createDnsLink({ logger: silentLogger, resolver });

    const record = await link.lookup("agent1.agents.local");

    expect(resolver.resolveSrv).toHaveBeenCalledWith("_llm-agent._tcp.agent1.agents.local");
    expect(record).toEqual({
      id: "agent1.agents.local",
      name: "agent1.agents.local",
      description: "Summarizes documents",
      capabilities: ["chat", "summarization"],
      interfaces: {},
      endpoints: {},
      host: "agent1",
      port: 8001,
      version: "2.3",
      protocols: [],
    });
  });

  it("returns null when no SRV record exists", async () => {
    const link = createDnsLink({
      logger: silentLogger,
      resolver: fakeResolver({ resolveSrv: vi.fn(async () => Promise.reject(dnsError("ENOTFOUND"))) }),
    });
    expect(await link.lookup("ghost.agents.local")).toBeNull();
  });

  it("returns null for an empty SRV answer", async () => {
    const link = createDnsLink({ logger: silentLogger, resolver: fakeResolver({ resolveSrv: vi.fn(async () => []) }) });
    expect(await link.lookup("ghost.agents.local")).toBeNull();
  });

  it("throws when the lookup itself fails", async () => {
    const link = createDnsLink({
      logger: silentLogger,
      resolver: fakeResolver({ resolveSrv: vi.fn(async () => Promise.reject(dnsError("ETIMEOUT"))) }),
    });
    await expect(link.lookup("agent1.agents.local")).rejects.toThrow("query failed: ETIMEOUT");
  });

  it("still resolves when TXT is missing", async () => {
    const link = createDnsLink({
      logger: silentLogger,
      resolver: fakeResolver({ resolveTxt: vi.fn(async () => Promise.reject(dnsError("ENODATA"))) }),
    });
    const record = await link.lookup("agent1.agents.local");
    expect(record?.host).toBe("agent1");
    expect(record?.capabilities).toEqual([]);
    expect(record?.version).toBe("1.0");
  });
});

describe("parseAgentTxt", () => {
  it("defaults when nothing is published", () => {
    expect(parseAgentTxt([])).toEqual({ capabilities: [], description: "", version: "1.0" });
  });

  it("ignores unknown keys and empty capability items", () => {
    expect(parseAgentTxt([["owner=ops"], ["caps=a,,b,"]])).toEqual({
      capabilities: ["a", "b"],
      description: "",
      version: "1.0",
    });
  });
});
