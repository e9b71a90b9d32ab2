import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_HEADER = 'x-request-id';

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.get(REQUEST_ID_HEADER);
  const requestId =
    incomingId && incomingId.trim().length > 0 ? incomingId.trim() : uuidv4();

  req.request_id = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  next();
}
