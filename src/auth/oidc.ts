import type { IncomingMessage } from 'http';
import { BaseClient, Issuer, generators } from 'openid-client';
import { OidcConfig } from '../config/env';
import { Identity, IdentitySchema } from '../interfaces/identity';
import { OidcChecks } from '../interfaces/session';
import { logger } from '../logger';

const SCOPE = 'openid profile email';

export interface AuthorizationRequest extends OidcChecks {
  url: string;
}

export interface OidcAuthenticator {
  /** Starts the authorization-code flow; the checks must be kept until the callback. */
  begin(): AuthorizationRequest;
  /** Exchanges the callback code and returns the signed-in identity. */
  complete(req: IncomingMessage, checks: OidcChecks): Promise<Identity>;
}

export function createAuthenticator(client: BaseClient, redirectUri: string): OidcAuthenticator {
  return {
    begin() {
      const state = generators.state();
      const nonce = generators.nonce();
      const url = client.authorizationUrl({ scope: SCOPE, state, nonce });
      return { url, state, nonce };
    },

    async complete(req, checks) {
      const params = client.callbackParams(req);
      const tokenSet = await client.callback(redirectUri, params, checks);
      const claims = tokenSet.claims();

      return IdentitySchema.parse({
        subject: claims.sub,
        name: claims.name ?? claims.preferred_username ?? claims.email,
        email: claims.email,
      });
    },
  };
}

export async function discoverAuthenticator(config: OidcConfig): Promise<OidcAuthenticator> {
  const issuer = await Issuer.discover(config.issuerUrl);
  logger.info({ issuer: issuer.metadata.issuer }, 'Identity provider discovered');

  const client = new issuer.Client({
    client_id: config.clientId,
    client_secret: config.clientSecret,
    redirect_uris: [config.redirectUri],
    response_types: ['code'],
  });

  return createAuthenticator(client, config.redirectUri);
}
