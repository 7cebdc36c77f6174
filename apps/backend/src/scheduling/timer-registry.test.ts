import { describe, it, expect, beforeEach } from "vitest";
import { RegistryGuard, TimerRegistry } from "./timer-registry.js";
import type { TimerTicket } from "./timer-registry.js";
import { createManualClock, flush, T0 } from "../test-helpers.js";
import type { ManualClock } from "../test-helpers.js";

describe("RegistryGuard", () => {
  it("allows nested holds and reports when held", () => {
    const guard = new RegistryGuard();
    expect(guard.held).toBe(false);
    const inner = guard.hold(() => guard.hold(() => guard.held));
    expect(inner).toBe(true);
    expect(guard.held).toBe(false);
  });

  it("refuses a callback that returns a promise", () => {
    const guard = new RegistryGuard();
    expect(() => guard.hold(() => Promise.resolve(1))).toThrow(
      "RegistryGuard cannot be held across an await",
    );
    expect(guard.held).toBe(false);
  });
});

describe("scheduling/timer-registry", () => {
  let clock: ManualClock;
  let fired: TimerTicket[];
  let registry: TimerRegistry;

  beforeEach(() => {
    clock = createManualClock();
    fired = [];
    registry = new TimerRegistry((t) => {
      fired.push(t);
    }, clock);
  });

  it("keeps one entry per id with the requested fire time", () => {
    registry.upsert("a", new Date(T0 + 1000));
    expect(registry.get("a")?.toISOString()).toBe("2030-01-01T00:00:01.000Z");
    expect(registry.size).toBe(1);
  });

  it("replaces the previous timer on re-upsert so only the new one fires", async () => {
    registry.upsert("a", new Date(T0 + 1000));
    registry.upsert("a", new Date(T0 + 5000));
    expect(registry.size).toBe(1);
    expect(clock.pending()).toBe(1);

    clock.advance(1000);
    await flush();
    expect(fired).toHaveLength(0);

    clock.advance(4000);
    await flush();
    expect(fired.map((t) => t.fireAt.getTime())).toEqual([T0 + 5000]);
  });

  it("fires past instants on a later tick, not inside upsert", async () => {
    const ticket = registry.upsert("late", new Date(T0 - 60_000));
    expect(fired).toHaveLength(0);
    clock.advance(0);
    await flush();
    expect(fired).toEqual([ticket]);
  });

  it("keeps the entry after firing until the ticket is released", async () => {
    const ticket = registry.upsert("a", new Date(T0 + 10));
    clock.advance(10);
    await flush();
    expect(registry.get("a")).toBeDefined();
    expect(registry.release(ticket)).toBe(true);
    expect(registry.get("a")).toBeUndefined();
  });

  it("does not let a stale ticket release a newer arming", () => {
    const first = registry.upsert("a", new Date(T0 + 10));
    const second = registry.upsert("a", new Date(T0 + 20));
    expect(registry.isCurrent(first)).toBe(false);
    expect(registry.release(first)).toBe(false);
    expect(registry.isCurrent(second)).toBe(true);
    expect(registry.get("a")?.getTime()).toBe(T0 + 20);
  });

  it("cancel removes the timer and reports absence without error", async () => {
    registry.upsert("a", new Date(T0 + 10));
    expect(registry.cancel("a")).toBe(true);
    expect(registry.cancel("a")).toBe(false);
    expect(registry.cancel("never")).toBe(false);
    clock.advance(10);
    await flush();
    expect(fired).toHaveLength(0);
  });

  it("returns snapshots sorted by fire time that later mutations do not touch", () => {
    registry.upsert("b", new Date(T0 + 2000));
    registry.upsert("a", new Date(T0 + 1000));
    const snapshot = registry.listSnapshot();
    registry.cancel("a");
    snapshot[1].fireAt.setTime(0);

    expect(snapshot.map((e) => e.id)).toEqual(["a", "b"]);
    expect(registry.listSnapshot()).toEqual([
      { id: "b", fireAt: new Date(T0 + 2000) },
    ]);
  });

  it("stop cancels everything and refuses further upserts", async () => {
    registry.upsert("a", new Date(T0 + 10));
    registry.upsert("b", new Date(T0 + 20));
    registry.stop();
    expect(registry.size).toBe(0);
    expect(clock.pending()).toBe(0);
    expect(() => registry.upsert("c", new Date(T0))).toThrow(
      "Timer registry is stopped",
    );
    clock.advance(100);
    await flush();
    expect(fired).toHaveLength(0);
  });

  it("accepts a fire handler that resolves to a value", async () => {
    const seen: string[] = [];
    const valued = new TimerRegistry(async (t) => {
      seen.push(t.id);
      return { id: t.id, status: "delivered" };
    }, clock);
    valued.upsert("a", new Date(T0));
    clock.advance(0);
    await flush();
    expect(seen).toEqual(["a"]);
  });

  it("survives a fire handler that rejects", async () => {
    const failing = new TimerRegistry(async () => {
      throw new Error("handler down");
    }, clock);
    failing.upsert("a", new Date(T0));
    clock.advance(0);
    await flush();
    expect(failing.get("a")).toBeDefined();
  });
});
