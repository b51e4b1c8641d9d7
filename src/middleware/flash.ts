import { Request } from 'express';
import { FlashCategory, FlashMessage } from '../interfaces/session';

export function flash(req: Request, category: FlashCategory, message: string): void {
  const queue = req.session.flash ?? [];
  queue.push({ category, message });
  req.session.flash = queue;
}

/** Returns the queued messages and empties the queue. */
export function consumeFlash(req: Request): FlashMessage[] {
  const queue = req.session.flash ?? [];
  req.session.flash = [];
  return queue;
}
