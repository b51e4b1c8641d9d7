import path from 'path';
import express, { Express } from 'express';
import session from 'express-session';
import { OidcAuthenticator } from './auth/oidc';
import { CityService } from './modules/cities';
import { CityLookup } from './modules/cityLookup';
import { UserService } from './modules/users';
import { WeatherService } from './modules/weather';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createLocalAuthRouter } from './routes/auth';
import { createOidcRouter } from './routes/oidc';
import { createCityRouter } from './routes/cities';

export const VIEWS_DIR = path.resolve(__dirname, '..', 'views');

export interface AppDeps {
  sessionSecret: string;
  secureCookies: boolean;
  users: UserService;
  cities: CityService;
  weather: WeatherService;
  lookup: CityLookup;
  // Present in identity-provider mode, absent for local password auth
  authenticator?: OidcAuthenticator;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.set('trust proxy', true);
  app.set('view engine', 'ejs');
  app.set('views', VIEWS_DIR);
  app.locals.authMode = deps.authenticator ? 'oidc' : 'local';

  app.use(express.urlencoded({ extended: false }));
  app.use(
    session({
      name: 'weather.sid',
      secret: deps.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: deps.secureCookies,
      },
    })
  );

  if (deps.authenticator) {
    app.use(createOidcRouter({ users: deps.users, authenticator: deps.authenticator }));
  } else {
    app.use(createLocalAuthRouter({ users: deps.users }));
  }

  app.use(
    createCityRouter({
      users: deps.users,
      cities: deps.cities,
      weather: deps.weather,
      lookup: deps.lookup,
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
