import type { NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, NotFoundError, ValidationError } from "../utils/errors";

/** Forwards rejections of async route handlers to the error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not Found" });
}

// Keep internals out of responses
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ValidationError) {
    res.status(err.statusCode).json(err.hint ? { error: err.message, hint: err.hint } : { error: err.message });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }
  if (err instanceof AppError) {
    // eslint-disable-next-line no-console
    console.error(`${err.name}: ${err.message}`);
    res.status(err.statusCode).json({ error: err.message });
    return;
  }
  // express.json() rejects malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  // eslint-disable-next-line no-console
  console.error(err);
  res.status(500).json({ error: "Internal Server Error" });
}
