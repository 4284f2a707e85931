/**
 * Experiment Session Routes
 *
 * Participant session lifecycle: start, heartbeat, finish, abort.
 */

import type { Express, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { sendError, sendValidationError } from "./httpErrors";

const startSchema = z
  .object({
    id: z
      .string()
      .trim()
      .min(1)
      .max(128)
      .regex(/^[A-Za-z0-9._:-]+$/, "id may only contain letters, digits and . _ : -")
      .optional(),
    timeoutSec: z.number().int().positive().optional(),
  })
  .strict();

const abortSchema = z
  .object({
    reason: z.string().trim().min(1).max(200).optional(),
  })
  .strict();

export function registerSessionRoutes(app: Express, ctx: AppContext): void {
  const { logger, sessionService } = ctx;

  /**
   * POST /api/sessions
   * Start a participant session. `id` lets the caller reuse an external participant id;
   * 409 when it is taken.
   */
  app.post("/api/sessions", (req: Request, res: Response) => {
    const body = startSchema.safeParse(req.body ?? {});
    if (!body.success) return sendValidationError(res, body.error);

    try {
      const timeoutMs = body.data.timeoutSec !== undefined ? body.data.timeoutSec * 1000 : undefined;
      const session = sessionService.startSession({ id: body.data.id, timeoutMs });
      res.status(201).json({ ok: true, session });
    } catch (error) {
      sendError(res, logger, error, { route: "startSession" });
    }
  });

  app.get("/api/sessions/:id", (req: Request, res: Response) => {
    const { id } = req.params;
    try {
      res.json(sessionService.getSession(id));
    } catch (error) {
      sendError(res, logger, error, { sessionId: id });
    }
  });

  app.post("/api/sessions/:id/heartbeat", (req: Request, res: Response) => {
    const { id } = req.params;
    try {
      const session = sessionService.heartbeat(id);
      res.json({ ok: true, session });
    } catch (error) {
      sendError(res, logger, error, { sessionId: id });
    }
  });

  /**
   * POST /api/sessions/:id/finish
   * Complete the session; its slots in every quota become finished
   */
  app.post("/api/sessions/:id/finish", (req: Request, res: Response) => {
    const { id } = req.params;
    try {
      const { session, finishedQuotas } = sessionService.finishSession(id);
      res.json({ ok: true, session, finishedQuotas });
    } catch (error) {
      sendError(res, logger, error, { sessionId: id });
    }
  });

  app.post("/api/sessions/:id/abort", (req: Request, res: Response) => {
    const { id } = req.params;
    const body = abortSchema.safeParse(req.body ?? {});
    if (!body.success) return sendValidationError(res, body.error);

    try {
      const session = sessionService.abortSession(id, body.data.reason);
      res.json({ ok: true, session });
    } catch (error) {
      sendError(res, logger, error, { sessionId: id });
    }
  });
}
