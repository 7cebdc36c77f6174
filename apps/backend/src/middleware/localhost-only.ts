import type { Request, Response, NextFunction } from "express";

const LOOPBACK = new Set(["127.0.0.1", "::1", "::ffff:127.0.0.1"]);

/** Without an API token the API serves loopback clients only. /health stays open. */
export function localhostOnly(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (req.path === "/health" || LOOPBACK.has(req.socket.remoteAddress ?? "")) {
    next();
    return;
  }
  res.status(403).json({
    error: "Forbidden",
    message: "API_TOKEN is not set; only local requests are accepted.",
  });
}
