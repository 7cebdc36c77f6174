import type { Request, Response, NextFunction } from "express";
import { createHash, timingSafeEqual } from "crypto";

/** Paths that skip the bearer check (any method). */
const PUBLIC_PATHS = new Set(["/health"]);

function getBearerToken(req: Request): string | null {
  const auth = req.headers.authorization;
  if (!auth || typeof auth !== "string") return null;
  const [scheme, token] = auth.trim().split(/\s+/);
  return scheme === "Bearer" && token ? token : null;
}

/** Constant-time compare; hashing first makes the lengths equal. */
export function tokenMatches(given: string, expected: string): boolean {
  const a = createHash("sha256").update(given).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Requires `Authorization: Bearer <apiToken>` on every request except PUBLIC_PATHS.
 * Only mount this middleware when API_TOKEN is set.
 */
export function authToken(apiToken: string) {
  const expected = apiToken.trim();
  return (req: Request, res: Response, next: NextFunction): void => {
    if (PUBLIC_PATHS.has(req.path)) {
      next();
      return;
    }
    const token = getBearerToken(req);
    if (!token) {
      res.status(401).json({
        error: "Unauthorized",
        message: "Authorization header required.",
      });
      return;
    }
    if (!tokenMatches(token, expected)) {
      res
        .status(401)
        .json({ error: "Unauthorized", message: "Invalid token." });
      return;
    }
    next();
  };
}
