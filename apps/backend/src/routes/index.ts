import type { Express } from "express";
import type { AppContext } from "./helpers.js";
import { registerHealthRoutes } from "./health.js";
import { registerMessageRoutes } from "./messages.js";

export type { AppContext };

export function registerRoutes(app: Express, ctx: AppContext): void {
  registerHealthRoutes(app, ctx);
  registerMessageRoutes(app, ctx);
}
