import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export function attachRequestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = crypto.randomUUID();
  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}
