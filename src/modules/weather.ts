import axios from 'axios';
import { CityWeather } from '../interfaces/cityWeather';
import { UnavailableReason, WeatherResult } from '../interfaces/weatherResult';
import { normalizeWeather } from '../utils/normalizeWeather';

import { cacheAvailable, cacheGet, cacheSet } from '../cache';
import { logger } from '../logger';

import { OpenWeatherClient, WeatherApiError } from './openWeatherClient';

export const DEFAULT_CACHE_TTL_SECONDS = 300;

export function weatherCacheKey(cityId: number): string {
  return `weather:${cityId}`;
}

function failureReason(err: unknown): UnavailableReason {
  if (err instanceof WeatherApiError) {
    return err.reason;
  }
  if (axios.isAxiosError(err)) {
    return err.code === 'ETIMEDOUT' || err.code === 'ECONNABORTED'
      ? 'timeout'
      : 'api_error';
  }
  return 'malformed';
}

/**
 * Read-through cache in front of the current-weather endpoint.
 *
 * Concurrent misses for the same city are not coalesced: each one fetches
 * and the last cache write wins.
 */
export class WeatherService {
  constructor(
    private readonly client: Pick<OpenWeatherClient, 'getCurrentById'>,
    private readonly ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS
  ) {}

  // Public API
  async getData(cityId: number): Promise<WeatherResult> {
    const timestamp = Date.now();
    const cacheKey = weatherCacheKey(cityId);

    // Cache-first (best effort)
    if (cacheAvailable()) {
      try {
        const cached = await cacheGet<CityWeather>(cacheKey);

        if (cached) {
          logger.debug({ cityId }, 'Weather cache hit');

          return {
            status: 'success',
            source: 'cache',
            data: cached,
            timestamp,
          };
        }
      } catch (err) {
        logger.warn({ err, cityId }, 'Cache read failed, falling back to API');
      }
    }

    return this.fetchFromApi(cacheKey, cityId, timestamp);
  }

  /** Snapshot for the city, or null when it cannot be produced. */
  async getWeather(cityId: number): Promise<Readonly<CityWeather> | null> {
    const result = await this.getData(cityId);
    return result.status === 'success' ? result.data : null;
  }

  private async fetchFromApi(
    cacheKey: string,
    cityId: number,
    timestamp: number
  ): Promise<WeatherResult> {
    let data: Readonly<CityWeather>;

    try {
      const weather = await this.client.getCurrentById(cityId);
      data = normalizeWeather(cityId, weather);
    } catch (err) {
      const reason = failureReason(err);

      logger.warn(
        { cityId, reason, message: err instanceof Error ? err.message : String(err) },
        'Weather API request failed'
      );

      return {
        status: 'unavailable',
        reason,
        timestamp,
      };
    }

    // Cache write (best effort)
    if (cacheAvailable()) {
      try {
        await cacheSet(cacheKey, data, this.ttlSeconds);
        logger.debug({ cityId, ttlSeconds: this.ttlSeconds }, 'Weather cached');
      } catch (err) {
        logger.warn({ err, cityId }, 'Cache write failed');
      }
    }

    logger.info({ cityId }, 'Weather fetched from API');

    return {
      status: 'success',
      source: 'api',
      data,
      timestamp,
    };
  }
}
