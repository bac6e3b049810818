import { type NextFunction, type Request, type Response } from "express";
import type { ZodTypeAny } from "zod";
import { HttpError } from "../utils/httpError";

/** Replace req.body with the parsed value, or fail with 400 listing each issue as "field: message". */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      const message = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join(", ");
      next(new HttpError(400, message));
      return;
    }
    req.body = result.data;
    next();
  };
}
