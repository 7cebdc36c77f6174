/**
 * Test doubles shared by the scheduler tests: a clock that only moves when
 * told to, and a webhook client that records calls instead of sending them.
 */
import type { ArmedTimer, TimerClock } from "./scheduling/timer-clock.js";
import type { WebhookClient } from "./webhook-client.js";
import { DeliveryFailedError } from "./scheduling/errors.js";

export const T0 = Date.parse("2030-01-01T00:00:00.000Z");

export interface ManualClock extends TimerClock {
  /** Move time forward and fire every timer that came due, earliest first. */
  advance(ms: number): void;
  pending(): number;
}

export function createManualClock(start = T0): ManualClock {
  let now = start;
  let seq = 0;
  const timers = new Map<number, { at: number; fire: () => void }>();

  function nextDue(): number | undefined {
    let best: number | undefined;
    for (const [id, t] of timers) {
      if (t.at > now) continue;
      const current = best === undefined ? undefined : timers.get(best);
      if (!current || t.at < current.at) best = id;
    }
    return best;
  }

  return {
    now: () => now,
    arm(at: Date, fire: () => void): ArmedTimer {
      const id = ++seq;
      timers.set(id, { at: at.getTime(), fire });
      return { cancel: () => void timers.delete(id) };
    },
    advance(ms: number): void {
      now += ms;
      for (let id = nextDue(); id !== undefined; id = nextDue()) {
        const t = timers.get(id);
        timers.delete(id);
        t?.fire();
      }
    },
    pending: () => timers.size,
  };
}

/** Let queued promise callbacks (fire handler, dispatch) run to completion. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}

export interface WebhookCall {
  url: string;
  payload: Record<string, unknown>;
}

export interface RecordingWebhook extends WebhookClient {
  calls: WebhookCall[];
  /** Next deliveries reject with DeliveryFailedError while true. */
  failing: boolean;
}

export function createRecordingWebhook(): RecordingWebhook {
  const hook: RecordingWebhook = {
    calls: [],
    failing: false,
    async deliver(url: string, payload: Record<string, unknown>) {
      hook.calls.push({ url, payload });
      if (hook.failing) throw new DeliveryFailedError(url, "500 boom", 500);
    },
  };
  return hook;
}

export function isoAt(offsetMs: number, base = T0): string {
  return new Date(base + offsetMs).toISOString();
}
