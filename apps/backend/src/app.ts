import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import { authToken } from "./middleware/auth-token.js";
import { localhostOnly } from "./middleware/localhost-only.js";
import { registerRoutes } from "./routes/index.js";
import type { AppContext } from "./routes/index.js";
import { sendError } from "./routes/helpers.js";
import { InvalidArgumentError } from "./scheduling/errors.js";

export interface AppOptions {
  /** Bearer token for every route but /health; empty means loopback-only. */
  apiToken: string;
}

function isBodyParseError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    "status" in err &&
    err.status === 400 &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function createApp(ctx: AppContext, options: AppOptions): Express {
  const app = express();
  app.use(
    cors({
      origin: true,
      allowedHeaders: ["Content-Type", "Authorization"],
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
    }),
  );
  app.use(express.json());
  if (options.apiToken.trim()) {
    app.use(authToken(options.apiToken));
  } else {
    app.use(localhostOnly);
  }

  registerRoutes(app, ctx);

  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
      if (isBodyParseError(err)) {
        sendError(res, new InvalidArgumentError("Body is not valid JSON."), "parse body");
        return;
      }
      sendError(res, err, "handle request");
    },
  );

  return app;
}
