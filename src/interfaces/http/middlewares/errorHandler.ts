import type { NextFunction, Request, Response } from "express";
import { AppError, StoreError } from "../../../errors";

/** body-parser tags its failures with `type`, e.g. "entity.parse.failed". */
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    "type" in err && typeof err.type === "string" &&
    "status" in err && typeof err.status === "number"
  );
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ message: "Not Found" });
}

// express recognises error middleware by its four parameters
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof StoreError) {
    console.error(`${err.message}: ${err.detail}`);
    res.status(err.status).json({ message: err.message, error: err.detail });
    return;
  }
  if (err instanceof AppError) {
    res.status(err.status).json({ message: err.message });
    return;
  }
  if (isBodyParserError(err) && err.type === "entity.too.large") {
    res.status(413).json({ message: "Request payload too large" });
    return;
  }
  if (isBodyParserError(err)) {
    res.status(400).json({ message: "Invalid request payload" });
    return;
  }
  console.error(err);
  res.status(500).json({ message: "Internal Server Error" });
}
