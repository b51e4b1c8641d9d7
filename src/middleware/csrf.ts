import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';

export const CSRF_FIELD = '_csrf';

/** Per-session token embedded in every form. */
export function csrfToken(req: Request): string {
  if (!req.session.csrfToken) {
    req.session.csrfToken = uuidv4();
  }
  return req.session.csrfToken;
}

export function verifyCsrf(req: Request, res: Response, next: NextFunction): void {
  const submitted: unknown = req.body?.[CSRF_FIELD];

  if (typeof submitted === 'string' && submitted === req.session.csrfToken) {
    next();
    return;
  }

  logger.warn({ path: req.path }, 'Rejected form with invalid CSRF token');
  res.status(403).render('error', {
    status: 403,
    message: 'The form has expired. Go back, reload the page and try again.',
    messages: [],
    currentUser: null,
  });
}
