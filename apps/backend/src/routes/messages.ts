import type { Express, Request, Response } from "express";
import type { AppContext } from "./helpers.js";
import { getParam, getQuery, sendError } from "./helpers.js";

export function registerMessageRoutes(app: Express, ctx: AppContext): void {
  const { scheduler } = ctx;

  app.post("/messages", async (req: Request, res: Response) => {
    try {
      res.json(await scheduler.schedule(req.body));
    } catch (err) {
      sendError(res, err, "schedule message");
    }
  });

  app.get("/messages", (_req: Request, res: Response) => {
    res.json(scheduler.listInMemory());
  });

  // Registered before /messages/:id so "search" and "bulk" are not taken as ids
  app.get("/messages/search", async (req: Request, res: Response) => {
    try {
      res.json(
        await scheduler.search({
          prefix: getQuery(req, "prefix"),
          contains: getQuery(req, "contains"),
        }),
      );
    } catch (err) {
      sendError(res, err, "search messages");
    }
  });

  app.delete("/messages/bulk", async (req: Request, res: Response) => {
    try {
      res.json(
        await scheduler.bulkDelete({
          prefix: getQuery(req, "prefix"),
          contains: getQuery(req, "contains"),
        }),
      );
    } catch (err) {
      sendError(res, err, "bulk delete messages");
    }
  });

  app.get("/messages/:id", async (req: Request, res: Response) => {
    try {
      res.json(await scheduler.get(getParam(req, "id")));
    } catch (err) {
      sendError(res, err, "retrieve message");
    }
  });

  app.delete("/messages/:id", async (req: Request, res: Response) => {
    try {
      res.json(await scheduler.delete(getParam(req, "id")));
    } catch (err) {
      sendError(res, err, "delete message");
    }
  });
}
