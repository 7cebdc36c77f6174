import schedule from "node-schedule";

export interface ArmedTimer {
  cancel(): void;
}

/** Source of "now" and of one-shot timers. The registry never touches wall-clock time directly. */
export interface TimerClock {
  now(): number;
  /** Call fire once at `at`. Instants at or before now fire on a later turn of the event loop, never synchronously. */
  arm(at: Date, fire: () => void): ArmedTimer;
}

/**
 * Default clock: node-schedule for future instants. node-schedule refuses
 * dates in the past, so those go through a zero-delay timeout.
 */
export const nodeScheduleClock: TimerClock = {
  now: () => Date.now(),

  arm(at: Date, fire: () => void): ArmedTimer {
    if (at.getTime() > Date.now()) {
      const job = schedule.scheduleJob(at, fire);
      if (job) return { cancel: () => void job.cancel() };
      // Date slipped into the past between the check and scheduleJob
    }
    const handle = setTimeout(fire, 0);
    return { cancel: () => clearTimeout(handle) };
  },
};
