/**
 * In-memory registry of pending fire times: one cancellable timer per message id.
 *
 * Every read and write of the map goes through a single RegistryGuard. The
 * guard is a synchronous critical section; it cannot span an await, so the
 * fire handler (store reads, webhook I/O) always runs after it is released.
 */
import createDebug from "debug";
import { nodeScheduleClock } from "./timer-clock.js";
import type { ArmedTimer, TimerClock } from "./timer-clock.js";
import type { TimerSnapshotEntry } from "./types.js";

const debug = createDebug("hook-scheduler:registry");

/** Handed to the fire handler; identifies one arming of one id. */
export interface TimerTicket {
  readonly id: string;
  readonly fireAt: Date;
  readonly generation: number;
}

/** Whatever it returns (a promise included) is awaited off the guard and then dropped. */
export type FireHandler = (ticket: TimerTicket) => unknown;

interface TimerEntry {
  fireAt: Date;
  generation: number;
  timer: ArmedTimer;
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/** Reentrant guard over the registry map. Nested hold() calls from the same stack are allowed. */
export class RegistryGuard {
  private depth = 0;

  get held(): boolean {
    return this.depth > 0;
  }

  hold<T>(fn: () => T): T {
    this.depth++;
    try {
      const result = fn();
      if (isThenable(result)) {
        throw new Error("RegistryGuard cannot be held across an await");
      }
      return result;
    } finally {
      this.depth--;
    }
  }
}

export class TimerRegistry {
  private readonly entries = new Map<string, TimerEntry>();
  private readonly guard = new RegistryGuard();
  private readonly onFire: FireHandler;
  private readonly clock: TimerClock;
  private generation = 0;
  private stopped = false;

  constructor(onFire: FireHandler, clock: TimerClock = nodeScheduleClock) {
    this.onFire = onFire;
    this.clock = clock;
  }

  /** Arm a timer for id, replacing any previous one. Past instants fire on the next tick. */
  upsert(id: string, fireAt: Date): TimerTicket {
    return this.guard.hold(() => {
      if (this.stopped) throw new Error("Timer registry is stopped");
      this.cancel(id);
      const ticket: TimerTicket = {
        id,
        fireAt: new Date(fireAt.getTime()),
        generation: ++this.generation,
      };
      const timer = this.clock.arm(ticket.fireAt, () => this.fire(ticket));
      this.entries.set(id, {
        fireAt: ticket.fireAt,
        generation: ticket.generation,
        timer,
      });
      debug(
        "armed %s for %s (in %dms)",
        id,
        ticket.fireAt.toISOString(),
        ticket.fireAt.getTime() - this.clock.now(),
      );
      return ticket;
    });
  }

  /** Cancel and forget id. Returns false when nothing was armed. */
  cancel(id: string): boolean {
    return this.guard.hold(() => {
      const entry = this.entries.get(id);
      if (!entry) return false;
      entry.timer.cancel();
      this.entries.delete(id);
      return true;
    });
  }

  get(id: string): Date | undefined {
    return this.guard.hold(() => {
      const entry = this.entries.get(id);
      return entry ? new Date(entry.fireAt.getTime()) : undefined;
    });
  }

  /** Point-in-time copy, earliest first. */
  listSnapshot(): TimerSnapshotEntry[] {
    return this.guard.hold(() =>
      [...this.entries]
        .map(([id, e]) => ({ id, fireAt: new Date(e.fireAt.getTime()) }))
        .sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime()),
    );
  }

  /** True while ticket is still the live arming for its id. */
  isCurrent(ticket: TimerTicket): boolean {
    return this.guard.hold(
      () => this.entries.get(ticket.id)?.generation === ticket.generation,
    );
  }

  /**
   * Remove the entry for ticket.id if it is still this ticket's arming.
   * A newer upsert for the same id is left alone.
   */
  release(ticket: TimerTicket): boolean {
    return this.guard.hold(() => {
      if (!this.isCurrent(ticket)) return false;
      this.entries.delete(ticket.id);
      return true;
    });
  }

  get size(): number {
    return this.guard.hold(() => this.entries.size);
  }

  /** Cancel every timer and refuse further upserts. */
  stop(): void {
    this.guard.hold(() => {
      for (const entry of this.entries.values()) entry.timer.cancel();
      debug("stopped; cancelled %d timer(s)", this.entries.size);
      this.entries.clear();
      this.stopped = true;
    });
  }

  private fire(ticket: TimerTicket): void {
    // A cancel can race with a timer that was already queued
    if (!this.isCurrent(ticket)) return;
    debug("fired %s (generation %d)", ticket.id, ticket.generation);
    void Promise.resolve()
      .then(() => this.onFire(ticket))
      .catch((err: unknown) => {
        debug("fire handler for %s failed: %o", ticket.id, err);
      });
  }
}
