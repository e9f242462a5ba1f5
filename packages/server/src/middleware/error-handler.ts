import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { InputValidationError } from "@cqi/engine";
import type { ErrorResponse } from "../models/responses.js";

function statusOf(err: Error): number {
  return "status" in err && typeof err.status === "number" ? err.status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (err instanceof ZodError || err instanceof InputValidationError) {
    const details =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        : err.issues;
    console.warn(`[validation] ${JSON.stringify(details)}`);
    res.status(422).json({
      message: err instanceof ZodError ? "Validation failed" : err.message,
      details,
    });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    console.error(`[error] ${err.message}`);
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}
