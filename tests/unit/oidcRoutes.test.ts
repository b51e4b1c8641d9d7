import { createOidcHandlers } from '@/routes/oidc';
import { createRequest, createResponse, makeUser } from '../helpers/http';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('identity provider routes (unit)', () => {
  const users = {
    upsertFromIdentity: jest.fn(),
    findById: jest.fn(),
  };
  const authenticator = {
    begin: jest.fn(),
    complete: jest.fn(),
  };
  const next = jest.fn();
  const handlers = createOidcHandlers({ users, authenticator });

  it('renders the sign-in page for anonymous visitors', () => {
    const req = createRequest();
    const { res, render } = createResponse();

    handlers.showSignIn(req, res);

    expect(render).toHaveBeenCalledWith(
      'signin',
      expect.objectContaining({ messages: [], currentUser: null })
    );
  });

  it('sends signed-in users to the dashboard', () => {
    const req = createRequest({ session: { userId: 7 } });
    const { res, redirect, render } = createResponse();

    handlers.showSignIn(req, res);

    expect(redirect).toHaveBeenCalledWith('/weather');
    expect(render).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - state and nonce are kept in the session before the provider redirect
   */
  it('starts the authorization redirect', () => {
    authenticator.begin.mockReturnValue({
      url: 'https://id.example.test/authorize?state=s-1',
      state: 's-1',
      nonce: 'n-1',
    });
    const req = createRequest();
    const { res, redirect } = createResponse();

    handlers.beginLogin(req, res);

    expect(req.session.oidc).toEqual({ state: 's-1', nonce: 'n-1' });
    expect(redirect).toHaveBeenCalledWith('https://id.example.test/authorize?state=s-1');
  });

  it('signs the user in on a valid callback', async () => {
    const identity = { subject: 'sub-1', name: 'Ana', email: 'ana@example.com' };
    authenticator.complete.mockResolvedValue(identity);
    users.upsertFromIdentity.mockResolvedValue(makeUser({ id: 12 }));
    const req = createRequest({ session: { oidc: { state: 's-1', nonce: 'n-1' } } });
    const { res, redirect } = createResponse();

    await handlers.callback(req, res, next);

    expect(authenticator.complete).toHaveBeenCalledWith(req, { state: 's-1', nonce: 'n-1' });
    expect(users.upsertFromIdentity).toHaveBeenCalledWith(identity);
    expect(req.session.userId).toBe(12);
    expect(req.session.oidc).toBeUndefined();
    expect(req.session.flash).toEqual([{ category: 'success', message: 'Logged in successfully.' }]);
    expect(redirect).toHaveBeenCalledWith('/weather');
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - a callback without stored checks never reaches the provider
   */
  it('rejects a callback without a pending sign-in', async () => {
    const req = createRequest();
    const { res, redirect } = createResponse();

    await handlers.callback(req, res, next);

    expect(authenticator.complete).not.toHaveBeenCalled();
    expect(req.session.flash).toEqual([
      { category: 'error', message: 'Your sign-in attempt expired. Please try again.' },
    ]);
    expect(redirect).toHaveBeenCalledWith('/');
  });

  it('reports a failed token exchange', async () => {
    authenticator.complete.mockRejectedValue(new Error('state mismatch'));
    const req = createRequest({ session: { oidc: { state: 's-1', nonce: 'n-1' } } });
    const { res, redirect } = createResponse();

    await handlers.callback(req, res, next);

    expect(users.upsertFromIdentity).not.toHaveBeenCalled();
    expect(req.session.userId).toBeUndefined();
    expect(req.session.flash).toEqual([
      { category: 'error', message: 'Sign-in failed. Please try again.' },
    ]);
    expect(redirect).toHaveBeenCalledWith('/');
    expect(next).not.toHaveBeenCalled();
  });
});
