import { z } from "zod";
import { CorruptRecordError, InvalidArgumentError } from "./errors.js";
import type { ScheduledMessage } from "./types.js";

// date and time with no Z or offset after it
const NAIVE_TIME = /T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

/**
 * UTC toISOString() form of an ISO timestamp, or null when it cannot be read.
 * Timestamps without an offset are taken as UTC.
 */
export function normalizeInstant(value: string): string | null {
  const ms = Date.parse(NAIVE_TIME.test(value) ? `${value}Z` : value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

function toUtc(value: string, ctx: z.RefinementCtx): string {
  const normalized = normalizeInstant(value);
  if (normalized === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "unparseable timestamp" });
    return z.NEVER;
  }
  return normalized;
}

/** ISO 8601 date and time, with or without an offset. */
const instant = z
  .string()
  .datetime({ offset: true, local: true, message: "must be an ISO timestamp" })
  .transform(toUtc);

export const scheduleInputSchema = z.object({
  id: z.string().min(1),
  scheduleTo: instant,
  payload: z.record(z.unknown()),
  webhookUrl: z.string().url(),
});

export type ScheduleInput = z.infer<typeof scheduleInputSchema>;

/**
 * Shape of a persisted value. Looser than the input schema on scheduleTo so
 * records written by older producers still restore, normalized the same way.
 */
const storedMessageSchema = z.object({
  id: z.string().min(1),
  scheduleTo: z.string().transform(toUtc),
  payload: z.record(z.unknown()),
  webhookUrl: z.string().min(1),
});

export function parseScheduleInput(input: unknown): ScheduledMessage {
  const result = scheduleInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new InvalidArgumentError(
      `Invalid message: ${issues.map((i) => `${i.path || "body"} ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

/** Fixed field order so equal messages encode to equal bytes. */
export function encodeMessage(message: ScheduledMessage): string {
  return JSON.stringify({
    id: message.id,
    scheduleTo: message.scheduleTo,
    payload: message.payload,
    webhookUrl: message.webhookUrl,
  });
}

export function decodeMessage(id: string, raw: string): ScheduledMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CorruptRecordError(id, "not JSON");
  }
  const result = storedMessageSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new CorruptRecordError(
      id,
      first ? `${first.path.join(".") || "value"} ${first.message}` : "invalid",
    );
  }
  if (result.data.id !== id) {
    throw new CorruptRecordError(id, `id field is '${result.data.id}'`);
  }
  return result.data;
}

export function fireAtOf(message: ScheduledMessage): Date {
  return new Date(message.scheduleTo);
}
