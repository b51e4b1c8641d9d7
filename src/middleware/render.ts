import { Request, Response } from 'express';
import { consumeFlash } from './flash';
import { csrfToken } from './csrf';

/** Renders a page with the locals every layout needs. */
export function renderPage(
  req: Request,
  res: Response,
  view: string,
  locals: Record<string, unknown> = {}
): void {
  res.render(view, {
    ...locals,
    messages: consumeFlash(req),
    csrfToken: csrfToken(req),
    currentUser: req.currentUser ?? null,
  });
}
