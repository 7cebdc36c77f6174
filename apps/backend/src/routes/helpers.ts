import type { Request, Response } from "express";
import createDebug from "debug";
import type { ScheduleService } from "../scheduling/types.js";
import {
  InvalidArgumentError,
  NotFoundError,
  StoreUnavailableError,
  errorMessage,
} from "../scheduling/errors.js";

const debug = createDebug("hook-scheduler:routes");

export interface AppContext {
  scheduler: ScheduleService;
}

export function getParam(req: Request, key: string): string {
  const v = req.params[key];
  return (Array.isArray(v) ? v[0] : v) ?? "";
}

/** First string value of a query parameter, or undefined. */
export function getQuery(req: Request, key: string): string | undefined {
  const v = req.query[key];
  const first = Array.isArray(v) ? v[0] : v;
  return typeof first === "string" ? first : undefined;
}

/** Map a scheduler error to a status code and `{ error, message }` body. */
export function sendError(res: Response, err: unknown, operation: string): void {
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: "Not Found", message: err.message });
    return;
  }
  if (err instanceof InvalidArgumentError) {
    res.status(400).json({
      error: "Bad Request",
      message: err.message,
      ...(err.issues.length > 0 ? { issues: err.issues } : {}),
    });
    return;
  }
  debug("Error in %s: %o", operation, err);
  if (err instanceof StoreUnavailableError) {
    res.status(503).json({ error: "Service Unavailable", message: err.message });
    return;
  }
  res.status(500).json({
    error: "Internal Server Error",
    message: `Failed to ${operation}: ${errorMessage(err)}`,
  });
}
