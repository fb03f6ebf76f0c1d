import { Request, Response, NextFunction } from "express";
import type { ApiError } from "../../../shared/types.js";
import { env } from "../config/env.js";
import { ZodError } from "zod";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * A single race/session or schedule could not be loaded from the data provider.
 * Callers aggregating history skip the slice and continue.
 */
export class DataUnavailableError extends AppError {
  constructor(message: string) {
    super(502, message, "DATA_UNAVAILABLE");
    this.name = "DataUnavailableError";
  }
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  // Zod validation errors
  if (err instanceof ZodError) {
    const body: ApiError = {
      error: "Validation Error",
      code: "VALIDATION_ERROR",
      details: err.errors.map((e) => ({
        field: e.path.join("."),
        message: e.message,
      })),
    };
    res.status(400).json(body);
    return;
  }

  // Known application errors
  if (err instanceof AppError) {
    const body: ApiError = { error: err.message, code: err.code };
    res.status(err.statusCode).json(body);
    return;
  }

  // Unknown errors
  console.error("Unhandled error:", err);
  const body: ApiError = {
    error:
      env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
  };
  res.status(500).json(body);
}
