/**
 * Tests for RegistrationLoop: the register / heartbeat state machine,
 * driven one tick at a time against an injected clock.
 */

import { describe, it, expect, vi } from "vitest";
import { RegistrationLoop } from "../../src/loops/registration.js";
import { DirectoryError } from "../../src/errors.js";
import { createRecordingLogger } from "../helpers/logger.js";
import { fakeRegistry, yieldSleep } from "../helpers/fake-registry.js";
import { makeRecord } from "../helpers/records.js";

const T0 = 2_000_000;

function setup(registry = fakeRegistry()) {
  const clock = { now: T0 };
  const logger = createRecordingLogger();
  const self = makeRecord({ id: "me.agents.local", capabilities: ["chat"] });
  const loop = new RegistrationLoop({
    registry,
    describeSelf: () => self,
    logger,
    now: () => clock.now,
    sleep: yieldSleep,
  });
  return { loop, registry, logger, clock, self };
}

describe("RegistrationLoop", () => {
  it("registers immediately with registerNow", async () => {
    const { loop, registry, self } = setup();

    expect(await loop.registerNow()).toBe(true);

    expect(registry.register).toHaveBeenCalledWith(self);
    expect(loop.state).toEqual({ registered: true, attempts: 0, heartbeatErrors: 0, nextAttemptAt: 0 });
  });

  it("heartbeats while registered", async () => {
    const { loop, registry } = setup();
    await loop.registerNow();

    await loop.tick();

    expect(registry.heartbeat).toHaveBeenCalledWith("me.agents.local");
    expect(registry.register).toHaveBeenCalledTimes(1);
  });

  it("re-registers only after the cooldown once the directory forgets the node", async () => {
    const registry = fakeRegistry();
    registry.heartbeat.mockResolvedValueOnce({ status: "not_found", message: "Agent not found in registry" });
    const { loop, logger, clock } = setup(registry);
    await loop.registerNow();

    await loop.tick();
    expect(loop.state).toMatchObject({ registered: false, nextAttemptAt: T0 + 10_000 });
    expect(logger.lines()).toContain(
      "warn: [peerweave:registration] Agent not found in registry, will re-register soon",
    );

    clock.now = T0 + 9_999;
    await loop.tick();
    expect(registry.register).toHaveBeenCalledTimes(1);

    clock.now = T0 + 10_000;
    await loop.tick();
    expect(registry.register).toHaveBeenCalledTimes(2);
    expect(loop.state.registered).toBe(true);
  });

  it("backs off after five consecutive failures", async () => {
    const registry = fakeRegistry();
    registry.register.mockRejectedValue(new DirectoryError("network", "connect ECONNREFUSED"));
    const { loop, logger, clock } = setup(registry);

    expect(await loop.registerNow()).toBe(false);
    expect(loop.state).toEqual({ registered: false, attempts: 1, heartbeatErrors: 0, nextAttemptAt: T0 + 10_000 });

    for (let i = 1; i <= 4; i++) {
      clock.now = T0 + i * 10_000;
      await loop.tick();
    }

    expect(registry.register).toHaveBeenCalledTimes(5);
    expect(loop.state).toEqual({ registered: false, attempts: 0, heartbeatErrors: 0, nextAttemptAt: T0 + 100_000 });
    expect(logger.lines()).toContain(
      "info: [peerweave:registration] Not registered yet, attempting to register (attempt 2/5)",
    );
    expect(logger.lines()).toContain(
      "error: [peerweave:registration] Failed to register after 5 attempts. Will retry in 60s",
    );

    clock.now = T0 + 99_999;
    await loop.tick();
    expect(registry.register).toHaveBeenCalledTimes(5);

    clock.now = T0 + 100_000;
    await loop.tick();
    expect(registry.register).toHaveBeenCalledTimes(6);
    expect(loop.state.attempts).toBe(1);
  });

  it("falls back to registering after five heartbeat errors", async () => {
    const registry = fakeRegistry();
    registry.heartbeat.mockResolvedValue({ status: "error", message: "timeout" });
    const { loop, logger } = setup(registry);
    await loop.registerNow();

    for (let i = 0; i < 4; i++) await loop.tick();
    expect(loop.state).toMatchObject({ registered: true, heartbeatErrors: 4 });

    await loop.tick();
    expect(loop.state).toEqual({ registered: false, attempts: 0, heartbeatErrors: 0, nextAttemptAt: T0 });
    expect(logger.lines()).toContain("error: [peerweave:registration] Failed to send heartbeat: timeout");
    expect(logger.lines()).toContain(
      "warn: [peerweave:registration] Too many heartbeat failures, will try to re-register",
    );

    await loop.tick();
    expect(registry.register).toHaveBeenCalledTimes(2);
  });

  it("a good heartbeat clears the error count", async () => {
    const registry = fakeRegistry();
    registry.heartbeat
      .mockResolvedValueOnce({ status: "error", message: "timeout" })
      .mockResolvedValueOnce({ status: "error", message: "timeout" });
    const { loop } = setup(registry);
    await loop.registerNow();

    await loop.tick();
    await loop.tick();
    expect(loop.state.heartbeatErrors).toBe(2);

    await loop.tick();
    expect(loop.state.heartbeatErrors).toBe(0);
  });

  it("runs in the background until stopped", async () => {
    const { loop, registry } = setup();

    expect(loop.start()).toBe(true);
    expect(loop.start()).toBe(false);
    await vi.waitFor(() => expect(registry.register).toHaveBeenCalled());

    expect(await loop.stop()).toBe(true);
    expect(await loop.stop()).toBe(false);
    expect(loop.running).toBe(false);
  });
});
