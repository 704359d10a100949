import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../shared/types';

const INCOMING_ID = /^[A-Za-z0-9._-]{8,128}$/;

/**
 * Tags each request with an id, reusing a well-formed X-Request-Id from the
 * caller so logs can be joined across services.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  const id = incoming !== undefined && INCOMING_ID.test(incoming) ? incoming : uuidv4();
  req.id = id;
  res.setHeader('X-Request-Id', id);
  next();
}
