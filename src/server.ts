import http from 'http';
import { loadConfig } from './config/env';
import { logger } from './logger';
import { shutdownCache } from './cache';
import { initDataSource } from './db/dataSource';
import { discoverAuthenticator } from './auth/oidc';
import { createOpenWeatherClient } from './modules/openWeatherClient';
import { createCityLookup } from './modules/cityLookup';
import { WeatherService } from './modules/weather';
import { UserService } from './modules/users';
import { CityService } from './modules/cities';
import { createApp } from './app';

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
const config = loadConfig();

let isShuttingDown = false;

(async () => {
  const dataSource = await initDataSource(config.databasePath);

  const weatherClient = createOpenWeatherClient({
    apiKey: config.weather.apiKey,
    apiUrl: config.weather.apiUrl,
    timeoutMs: config.weather.timeoutMs,
  });

  const authenticator =
    config.auth.mode === 'oidc' ? await discoverAuthenticator(config.auth.oidc) : undefined;

  const app = createApp({
    sessionSecret: config.sessionSecret,
    secureCookies: config.env === 'production',
    users: new UserService(dataSource),
    cities: new CityService(dataSource),
    weather: new WeatherService(weatherClient, config.weather.cacheTtlSeconds),
    lookup: createCityLookup(weatherClient),
    authenticator,
  });

  const server = http.createServer(app);

  // -------------------------------------------------
  // Graceful shutdown handling
  // -------------------------------------------------
  async function shutdown(signal: string) {
    if (isShuttingDown) {
      logger.warn(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}. Shutting down gracefully...`);
    try {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      logger.info('HTTP server closed');

      shutdownCache();
      logger.info('Cache closed');

      await dataSource.destroy();
      logger.info('Database closed');

      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  server.listen(config.port, () => {
    logger.info(
      { authMode: config.auth.mode, env: config.env },
      `Server running on http://localhost:${config.port}`
    );
  });
})().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
