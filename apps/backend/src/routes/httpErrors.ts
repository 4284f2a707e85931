import type { Response } from "express";
import type { Logger } from "pino";
import type { z } from "zod";
import { formatIssues } from "../domain/condition";
import { SessionNotPermittedError, StoreUnavailableError } from "../domain/errors";
import {
  QuotaNotFoundError,
  SessionConflictError,
  SessionInactiveError,
  SessionNotFoundError,
} from "../services/experimentSessionService";

export const sendValidationError = (res: Response, error: z.ZodError) =>
  res.status(400).json({ error: "invalid_request", message: formatIssues(error) });

/**
 * Map domain errors to status codes; anything unexpected is logged as a 500.
 */
export function sendError(res: Response, logger: Logger, error: unknown, context: Record<string, unknown>) {
  if (error instanceof SessionNotFoundError || error instanceof QuotaNotFoundError) {
    return res.status(404).json({ error: "not_found", message: error.message });
  }
  if (error instanceof SessionConflictError) {
    return res.status(409).json({ error: "conflict", message: error.message });
  }
  if (error instanceof SessionInactiveError) {
    return res.status(410).json({ error: "session_inactive", state: error.state, message: error.message });
  }
  if (error instanceof SessionNotPermittedError) {
    return res.status(403).json({ error: "not_permitted", message: error.message });
  }
  if (error instanceof StoreUnavailableError) {
    logger.error({ err: error, ...context }, "Store unavailable");
    return res.status(503).json({ error: "store_unavailable" });
  }

  logger.error({ err: error, ...context }, "Request failed");
  return res.status(500).json({ error: "internal_error" });
}
