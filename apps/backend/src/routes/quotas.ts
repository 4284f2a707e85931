/**
 * Quota Routes
 *
 * Condition assignment for experiment pages and read-only quota status for
 * monitoring. Status counts are a snapshot and may lag concurrent sessions.
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { sendError, sendValidationError } from "./httpErrors";

const sessionBodySchema = z
  .object({
    sessionId: z.string().trim().min(1),
  })
  .strict();

const assignBodySchema = sessionBodySchema.extend({
  keepSession: z.boolean().optional(),
});

export function registerQuotaRoutes(app: Express, ctx: AppContext): void {
  const { logger, quotas, sessionService } = ctx;

  app.get("/api/quotas", (_req: Request, res: Response) => {
    res.json({
      quotas: quotas.list().map((quota) => ({
        name: quota.name,
        version: quota.version,
        conditions: quota.conditions,
        nSlots: quota.nSlots,
      })),
    });
  });

  /**
   * POST /api/quotas/:name/assign
   * Returns the session's condition, or { full: true } once every slot is taken.
   * A full quota aborts the session unless `keepSession` is true.
   */
  app.post("/api/quotas/:name/assign", (req: Request, res: Response) => {
    const { name } = req.params;
    const body = assignBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendValidationError(res, body.error);

    try {
      const { sessionId, keepSession } = body.data;
      res.json(sessionService.assignCondition(sessionId, name, { keepSession }));
    } catch (error) {
      sendError(res, logger, error, { quota: name, sessionId: body.data.sessionId });
    }
  });

  app.post("/api/quotas/:name/finish", (req: Request, res: Response) => {
    const { name } = req.params;
    const body = sessionBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendValidationError(res, body.error);

    try {
      const finished = sessionService.finishSlot(body.data.sessionId, name);
      res.json({ ok: true, finished });
    } catch (error) {
      sendError(res, logger, error, { quota: name, sessionId: body.data.sessionId });
    }
  });

  app.get("/api/quotas/:name/status", (req: Request, res: Response) => {
    const { name } = req.params;
    const quota = quotas.get(name);
    if (!quota) {
      return res.status(404).json({ error: "not_found", message: `Quota "${name}" is not configured` });
    }

    try {
      res.json(quota.status());
    } catch (error) {
      sendError(res, logger, error, { quota: name });
    }
  });
}
