import { Request, Response, Router } from 'express';
import { UserService } from '../modules/users';
import { LoginFormSchema, RegisterFormSchema, formErrors } from '../schemas/forms.schema';
import { AsyncRequestHandler, asyncHandler } from '../middleware/asyncHandler';
import { LOGIN_PATH, endSession, establishSession, requireAuth } from '../middleware/auth';
import { verifyCsrf } from '../middleware/csrf';
import { flash } from '../middleware/flash';
import { renderPage } from '../middleware/render';
import { logger } from '../logger';

export const DASHBOARD_PATH = '/weather';

export interface LocalAuthDeps {
  users: Pick<UserService, 'authenticate' | 'register' | 'findById'>;
}

export function logout(req: Request, res: Response): void {
  const userId = req.session.userId;
  endSession(req);
  logger.info({ userId }, 'User logged out');
  flash(req, 'info', 'You have been logged out.');
  res.redirect(LOGIN_PATH);
}

export function createLocalAuthHandlers({ users }: LocalAuthDeps) {
  const showLogin = (req: Request, res: Response): void => {
    if (req.session.userId !== undefined) {
      res.redirect(DASHBOARD_PATH);
      return;
    }
    renderPage(req, res, 'login', { form: { email: '' } });
  };

  const login: AsyncRequestHandler = async (req, res) => {
    if (req.session.userId !== undefined) {
      res.redirect(DASHBOARD_PATH);
      return;
    }

    const parsed = LoginFormSchema.safeParse(req.body);
    if (!parsed.success) {
      formErrors(parsed.error).forEach((message) => flash(req, 'error', message));
      res.status(400);
      renderPage(req, res, 'login', { form: { email: String(req.body?.email ?? '') } });
      return;
    }

    const user = await users.authenticate(parsed.data.email, parsed.data.password);
    if (!user) {
      flash(req, 'error', 'Invalid email or password.');
      res.status(401);
      renderPage(req, res, 'login', { form: { email: parsed.data.email } });
      return;
    }

    await establishSession(req, user.id);
    logger.info({ userId: user.id }, 'User logged in');
    flash(req, 'success', 'Logged in successfully.');
    res.redirect(DASHBOARD_PATH);
  };

  const showRegister = (req: Request, res: Response): void => {
    if (req.session.userId !== undefined) {
      res.redirect(DASHBOARD_PATH);
      return;
    }
    renderPage(req, res, 'register', { form: { username: '', email: '' } });
  };

  const register: AsyncRequestHandler = async (req, res) => {
    if (req.session.userId !== undefined) {
      res.redirect(DASHBOARD_PATH);
      return;
    }

    const parsed = RegisterFormSchema.safeParse(req.body);
    if (!parsed.success) {
      formErrors(parsed.error).forEach((message) => flash(req, 'error', message));
      res.status(400);
      renderPage(req, res, 'register', {
        form: {
          username: String(req.body?.username ?? ''),
          email: String(req.body?.email ?? ''),
        },
      });
      return;
    }

    const user = await users.register(parsed.data);
    if (!user) {
      flash(req, 'warning', 'Email already registered. Please log in instead.');
      res.redirect(LOGIN_PATH);
      return;
    }

    await establishSession(req, user.id);
    flash(req, 'success', 'Registration successful!');
    res.redirect(DASHBOARD_PATH);
  };

  return { showLogin, login, showRegister, register };
}

export function createLocalAuthRouter(deps: LocalAuthDeps): Router {
  const router = Router();
  const handlers = createLocalAuthHandlers(deps);

  router.get('/', handlers.showLogin);
  router.post('/', verifyCsrf, asyncHandler(handlers.login));
  router.get('/register', handlers.showRegister);
  router.post('/register', verifyCsrf, asyncHandler(handlers.register));
  router.get('/logout', requireAuth(deps.users), logout);

  return router;
}
