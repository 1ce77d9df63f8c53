import type { Response } from "express";
import { ZodError } from "zod";
import { StoreConflictError, StoreNotFoundError } from "./services/inventoryStore.js";

export class ApiError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

export const notFound = (what: string) => new ApiError(404, `${what} not found`);

/**
 * Answer a failed request. Known errors keep their status,
 * everything else is logged and reported as a 500.
 */
export function sendError(res: Response, err: unknown, tag = "API") {
  if (err instanceof ApiError) {
    return res.status(err.status).json(
      err.details === undefined
        ? { error: err.message }
        : { error: err.message, details: err.details }
    );
  }

  if (err instanceof StoreNotFoundError) {
    return res.status(404).json({ error: err.message });
  }

  if (err instanceof StoreConflictError) {
    return res.status(409).json({ error: err.message });
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      error: "Invalid request",
      details: err.issues
    });
  }

  console.error(`[${tag}] ERROR:`, err);
  return res.status(500).json({
    error: err instanceof Error && err.message ? err.message : "Internal error"
  });
}
