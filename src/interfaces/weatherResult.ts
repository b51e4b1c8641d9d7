import { CityWeather } from './cityWeather';

export type UnavailableReason = 'timeout' | 'api_error' | 'provider_error' | 'malformed';

export type WeatherResult =
    | {
        status: 'success';
        source: 'cache' | 'api';
        data: Readonly<CityWeather>;
        timestamp: number;
    }
    | {
        status: 'unavailable';
        reason: UnavailableReason;
        timestamp: number;
    };
