import { AxiosError } from 'axios';
import { WeatherService, weatherCacheKey, DEFAULT_CACHE_TTL_SECONDS } from '@/modules/weather';
import { WeatherApiError } from '@/modules/openWeatherClient';
import { OpenWeatherResponse } from '@/schemas/openWeather.schema';
import { MemoryStore } from '@/cache/memoryStore';
import { CacheStore, shutdownCache, useCacheStore } from '@/cache';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const body: OpenWeatherResponse = {
  weather: [{ description: 'light rain', icon: '10d' }],
  main: { temp: 11.2, temp_min: 9.8, temp_max: 12.5, pressure: 1008, humidity: 81 },
  visibility: 8000,
  wind: { speed: 5.1 },
  dt: Date.UTC(2025, 0, 1, 10, 0, 0) / 1000,
  sys: { country: 'GB' },
  timezone: 0,
  id: 2643743,
  name: 'London',
  cod: 200,
};

describe('WeatherService (unit)', () => {
  let store: MemoryStore;
  let getCurrentById: jest.Mock<Promise<OpenWeatherResponse>, [number]>;
  let service: WeatherService;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2025-01-01T10:00:00Z'));

    store = new MemoryStore();
    useCacheStore(store);

    getCurrentById = jest.fn<Promise<OpenWeatherResponse>, [number]>().mockResolvedValue(body);
    service = new WeatherService({ getCurrentById });
  });

  afterEach(() => {
    jest.useRealTimers();
    shutdownCache();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - first call goes to the API and caches the snapshot
   * - a repeat inside the TTL performs no outbound call
   * - both calls return the same data
   */
  it('serves repeated fetches within the TTL from cache', async () => {
    const first = await service.getData(2643743);

    jest.advanceTimersByTime((DEFAULT_CACHE_TTL_SECONDS - 1) * 1000);
    const second = await service.getData(2643743);

    expect(first).toMatchObject({ status: 'success', source: 'api' });
    expect(second).toMatchObject({ status: 'success', source: 'cache' });
    expect(getCurrentById).toHaveBeenCalledTimes(1);

    if (first.status === 'success' && second.status === 'success') {
      expect(second.data).toBe(first.data);
      expect(JSON.stringify(second.data)).toBe(JSON.stringify(first.data));
    }
  });

  /**
   * Purpose:
   * Verifies TTL behavior:
   * - after the TTL exactly one more outbound call is made
   */
  it('refetches once after the TTL elapses', async () => {
    await service.getWeather(2643743);

    jest.advanceTimersByTime(DEFAULT_CACHE_TTL_SECONDS * 1000);

    const refreshed = await service.getData(2643743);
    await service.getData(2643743);

    expect(refreshed).toMatchObject({ status: 'success', source: 'api' });
    expect(getCurrentById).toHaveBeenCalledTimes(2);
  });

  it('honours a custom TTL', async () => {
    service = new WeatherService({ getCurrentById }, 60);

    await service.getWeather(2643743);
    jest.advanceTimersByTime(60_000);
    await service.getWeather(2643743);

    expect(getCurrentById).toHaveBeenCalledTimes(2);
  });

  it('caches per city id', async () => {
    await service.getWeather(1);
    await service.getWeather(2);

    expect(getCurrentById).toHaveBeenNthCalledWith(1, 1);
    expect(getCurrentById).toHaveBeenNthCalledWith(2, 2);
    await expect(store.get(weatherCacheKey(1))).resolves.toMatchObject({ id: 1, name: 'London' });
    await expect(store.get(weatherCacheKey(2))).resolves.toMatchObject({ id: 2 });
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - provider-reported failure → absent, no cache write, no retry
   */
  it('returns null without caching when the provider reports an error', async () => {
    getCurrentById.mockRejectedValue(
      new WeatherApiError('Weather API error: city not found', 'provider_error')
    );

    const result = await service.getData(404);

    expect(result).toEqual({
      status: 'unavailable',
      reason: 'provider_error',
      timestamp: Date.parse('2025-01-01T10:00:00Z'),
    });
    await expect(service.getWeather(404)).resolves.toBeNull();
    expect(getCurrentById).toHaveBeenCalledTimes(2);
    expect(store.size()).toBe(0);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - axios timeouts are reported as such
   * - other transport failures are api errors
   */
  it('classifies transport failures', async () => {
    getCurrentById.mockRejectedValueOnce(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));
    await expect(service.getData(1)).resolves.toMatchObject({ reason: 'timeout' });

    getCurrentById.mockRejectedValueOnce(new AxiosError('Request failed with status code 401', 'ERR_BAD_REQUEST'));
    await expect(service.getData(1)).resolves.toMatchObject({ reason: 'api_error' });

    getCurrentById.mockRejectedValueOnce(new WeatherApiError('Weather API schema mismatch', 'malformed'));
    await expect(service.getData(1)).resolves.toMatchObject({ reason: 'malformed' });
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - an unavailable cache backend is bypassed
   * - a failing cache read falls back to the API
   */
  it('falls back to the API when the cache cannot serve', async () => {
    const offline: CacheStore = {
      available: () => false,
      get: jest.fn(),
      set: jest.fn(),
      shutdown: jest.fn(),
    };
    useCacheStore(offline);

    await service.getWeather(1);
    await service.getWeather(1);

    expect(getCurrentById).toHaveBeenCalledTimes(2);
    expect(offline.get).not.toHaveBeenCalled();
    expect(offline.set).not.toHaveBeenCalled();

    const broken: CacheStore = {
      available: () => true,
      get: jest.fn().mockRejectedValue(new Error('read failed')),
      set: jest.fn().mockResolvedValue(undefined),
      shutdown: jest.fn(),
    };
    useCacheStore(broken);

    const result = await service.getData(1);

    expect(result).toMatchObject({ status: 'success', source: 'api' });
    expect(broken.set).toHaveBeenCalledWith(weatherCacheKey(1), expect.objectContaining({ id: 1 }), 300);
  });

  /**
   * Purpose:
   * Documents accepted behavior:
   * - concurrent misses for one city both fetch
   */
  it('does not coalesce concurrent misses', async () => {
    await Promise.all([service.getWeather(7), service.getWeather(7)]);

    expect(getCurrentById).toHaveBeenCalledTimes(2);
    await expect(store.get(weatherCacheKey(7))).resolves.toMatchObject({ id: 7 });
  });
});
