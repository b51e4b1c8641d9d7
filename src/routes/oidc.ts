import { Request, Response, Router } from 'express';
import { OidcAuthenticator } from '../auth/oidc';
import { UserService } from '../modules/users';
import { AsyncRequestHandler, asyncHandler } from '../middleware/asyncHandler';
import { LOGIN_PATH, establishSession, requireAuth } from '../middleware/auth';
import { flash } from '../middleware/flash';
import { renderPage } from '../middleware/render';
import { logger } from '../logger';
import { DASHBOARD_PATH, logout } from './auth';

export interface OidcAuthDeps {
  users: Pick<UserService, 'upsertFromIdentity' | 'findById'>;
  authenticator: OidcAuthenticator;
}

export function createOidcHandlers({ users, authenticator }: OidcAuthDeps) {
  const showSignIn = (req: Request, res: Response): void => {
    if (req.session.userId !== undefined) {
      res.redirect(DASHBOARD_PATH);
      return;
    }
    renderPage(req, res, 'signin');
  };

  const beginLogin = (req: Request, res: Response): void => {
    const { url, state, nonce } = authenticator.begin();
    req.session.oidc = { state, nonce };
    res.redirect(url);
  };

  const callback: AsyncRequestHandler = async (req, res) => {
    const checks = req.session.oidc;
    delete req.session.oidc;

    if (!checks) {
      flash(req, 'error', 'Your sign-in attempt expired. Please try again.');
      res.redirect(LOGIN_PATH);
      return;
    }

    try {
      const identity = await authenticator.complete(req, checks);
      const user = await users.upsertFromIdentity(identity);

      await establishSession(req, user.id);
      logger.info({ userId: user.id }, 'User signed in through identity provider');
      flash(req, 'success', 'Logged in successfully.');
      res.redirect(DASHBOARD_PATH);
    } catch (err) {
      logger.warn({ err }, 'Identity provider callback failed');
      flash(req, 'error', 'Sign-in failed. Please try again.');
      res.redirect(LOGIN_PATH);
    }
  };

  return { showSignIn, beginLogin, callback };
}

export function createOidcRouter(deps: OidcAuthDeps): Router {
  const router = Router();
  const handlers = createOidcHandlers(deps);

  router.get('/', handlers.showSignIn);
  router.get('/auth/login', handlers.beginLogin);
  router.get('/auth/callback', asyncHandler(handlers.callback));
  router.get('/logout', requireAuth(deps.users), logout);

  return router;
}
