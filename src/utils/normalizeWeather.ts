import { CityWeather, NOT_AVAILABLE } from '../interfaces/cityWeather';
import { OpenWeatherResponse } from '../schemas/openWeather.schema';
import { formatLocalTime } from './time';

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

export function formatVisibility(meters: number | undefined): string {
    return isFiniteNumber(meters) ? (meters / 1000).toFixed(1) : NOT_AVAILABLE;
}

/**
 * Maps a provider body to a snapshot. All "missing field -> default"
 * decisions live here; the result is frozen.
 */
export function normalizeWeather(
    cityId: number,
    data: OpenWeatherResponse,
    now: number = Date.now()
): Readonly<CityWeather> {
    const { main, sys, wind } = data;
    const condition = data.weather?.[0];
    const offset = data.timezone;
    const windSpeed = wind?.speed;

    const snapshot: CityWeather = {
        id: cityId,
        name: data.name ?? NOT_AVAILABLE,
        country: sys?.country ?? '',
        description: condition?.description ?? NOT_AVAILABLE,
        temp: main?.temp ?? null,
        tempMin: main?.temp_min ?? null,
        tempMax: main?.temp_max ?? null,
        icon: condition?.icon ?? null,
        pressure: main?.pressure ?? NOT_AVAILABLE,
        humidity: main?.humidity ?? NOT_AVAILABLE,
        visibility: formatVisibility(data.visibility),
        windSpeed: isFiniteNumber(windSpeed) ? String(windSpeed) : NOT_AVAILABLE,
        observedAt: formatLocalTime(data.dt, offset, now),
        sunrise: formatLocalTime(sys?.sunrise, offset, now),
        sunset: formatLocalTime(sys?.sunset, offset, now),
    };

    return Object.freeze(snapshot);
}
