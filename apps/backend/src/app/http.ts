/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { registerQuotaRoutes } from "../routes/quotas";
import { registerSessionRoutes } from "../routes/sessions";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.use(express.json({ limit: "100kb" }));

  // Robots guardrails: keep /api/* dark to crawlers
  app.use("/api", (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Robots-Tag", "noindex, nofollow");
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", quotas: ctx.quotas.list().length });
  });

  registerSessionRoutes(app, ctx);
  registerQuotaRoutes(app, ctx);

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "invalid_json" });
    }
    next(err);
  });

  return app;
}
