import { NextFunction, Request, Response } from 'express';
import { UserService } from '../modules/users';
import { flash } from './flash';
import { asyncHandler } from './asyncHandler';
import '../interfaces/session';

export const LOGIN_PATH = '/';

/** Regenerates the session id and marks the user as logged in. */
export function establishSession(req: Request, userId: number): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => {
      if (err) {
        reject(err);
        return;
      }
      req.session.userId = userId;
      resolve();
    });
  });
}

export function endSession(req: Request): void {
  delete req.session.userId;
  delete req.currentUser;
}

/**
 * Resolves the session's user onto `req.currentUser`; anonymous requests are
 * sent to the login page.
 */
export function requireAuth(users: Pick<UserService, 'findById'>) {
  return asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const userId = req.session.userId;
    const user = userId === undefined ? null : await users.findById(userId);

    if (!user) {
      delete req.session.userId;
      flash(req, 'info', 'Please log in to access this page.');
      res.redirect(LOGIN_PATH);
      return;
    }

    req.currentUser = user;
    next();
  });
}
