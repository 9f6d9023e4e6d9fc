import { describe, it, expect } from "vitest";
import { healthyOnlyPolicy, recentlySeenPolicy, RECENTLY_SEEN_MS } from "../../src/peers/policy.js";

describe("recentlySeenPolicy", () => {
  const now = 10_000_000;
  const usable = recentlySeenPolicy();

  it("admits healthy peers however old", () => {
    expect(usable({ health: "healthy", lastSeen: 0 }, now)).toBe(true);
  });

  it("admits peers never checked", () => {
    expect(usable({ health: null, lastSeen: 0 }, now)).toBe(true);
  });

  it("admits unknown peers only inside the window", () => {
    expect(usable({ health: "unknown", lastSeen: now - RECENTLY_SEEN_MS + 1 }, now)).toBe(true);
    expect(usable({ health: "unknown", lastSeen: now - RECENTLY_SEEN_MS }, now)).toBe(false);
  });

  it("rejects unhealthy peers even when just seen", () => {
    expect(usable({ health: "unhealthy", lastSeen: now }, now)).toBe(false);
  });

  it("takes a custom window", () => {
    const narrow = recentlySeenPolicy(1_000);
    expect(narrow({ health: "unknown", lastSeen: now - 999 }, now)).toBe(true);
    expect(narrow({ health: "unknown", lastSeen: now - 1_000 }, now)).toBe(false);
  });
});

describe("healthyOnlyPolicy", () => {
  it("admits nothing but healthy", () => {
    expect(healthyOnlyPolicy({ health: "healthy", lastSeen: 0 }, 0)).toBe(true);
    expect(healthyOnlyPolicy({ health: "unknown", lastSeen: 0 }, 0)).toBe(false);
    expect(healthyOnlyPolicy({ health: null, lastSeen: 0 }, 0)).toBe(false);
  });
});
