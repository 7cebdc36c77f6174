import type { Express, Request, Response } from "express";
import type { AppContext } from "./helpers.js";

export function registerHealthRoutes(app: Express, ctx: AppContext): void {
  app.get("/health", async (_req: Request, res: Response) => {
    const health = await ctx.scheduler.healthCheck();
    if (health.storeReachable) {
      res.json({ status: "healthy", store: "connected" });
      return;
    }
    res.status(503).json({
      status: "unhealthy",
      store: "disconnected",
      error: health.error,
    });
  });
}
