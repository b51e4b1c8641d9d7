import { NextFunction, Request, Response } from 'express';
import { logger } from '../logger';

export function notFound(req: Request, res: Response): void {
  res.status(404).render('error', {
    status: 404,
    message: 'Page not found.',
    messages: [],
    currentUser: req.currentUser ?? null,
  });
}

// Express recognises error middleware by its four parameters.
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  logger.error({ err, method: req.method, path: req.path }, 'Unhandled request error');

  res.status(500).render('error', {
    status: 500,
    message: 'Something went wrong. Please try again.',
    messages: [],
    currentUser: req.currentUser ?? null,
  });
}
