import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { ErrorResponse } from "../../../packages/shared/src/types";
import { HttpError } from "../utils/httpError";
import { GenerationError, InvalidSessionStateError, SessionNotFoundError } from "../services/errors";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

function sendError(res: Response, status: number, message: string): void {
  const body: ErrorResponse = { error: message };
  res.status(status).json(body);
}

function statusFor(error: unknown): number | null {
  if (error instanceof HttpError) return error.statusCode;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof InvalidSessionStateError) return 400;
  if (error instanceof GenerationError) return 500;
  return null;
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusFor(error);
  if (status !== null && error instanceof Error) {
    sendError(res, status, error.message);
    return;
  }

  if (error instanceof ZodError) {
    sendError(res, 400, error.issues.map((i) => i.message).join(", "));
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && "body" in error) {
    sendError(res, 400, "Malformed JSON body");
    return;
  }

  console.error(error);
  sendError(res, 500, "Internal server error");
}
