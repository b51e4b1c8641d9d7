import axios from 'axios';
import https from 'https';
import { z } from 'zod';
import { OpenWeatherResponse, OpenWeatherSchema } from '../schemas/openWeather.schema';
import { UnavailableReason } from '../interfaces/weatherResult';

export class WeatherApiError extends Error {
  constructor(
    message: string,
    readonly reason: Exclude<UnavailableReason, 'timeout'>,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'WeatherApiError';
  }
}

export interface OpenWeatherClientOptions {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
}

export interface OpenWeatherClient {
  /** Current weather by provider city id. Throws unless the body reports `cod` 200. */
  getCurrentById(cityId: number): Promise<OpenWeatherResponse>;
  /** Raw lookup by free-text name; HTTP errors propagate as axios errors. */
  findByName(name: string): Promise<OpenWeatherResponse>;
}

/** Success is the numeric 200; error bodies carry `cod` as a string. */
export function isSuccessCode(cod: OpenWeatherResponse['cod']): boolean {
  return cod === 200;
}

export function createOpenWeatherClient(options: OpenWeatherClientOptions): OpenWeatherClient {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  const axiosClient = axios.create({
    timeout: options.timeoutMs,
    httpsAgent,
  });

  async function request(query: { id: number } | { q: string }): Promise<OpenWeatherResponse> {
    const response = await axiosClient.get<unknown>(options.apiUrl, {
      params: {
        ...query,
        appid: options.apiKey,
        units: 'metric',
      },
    });

    const parsed = OpenWeatherSchema.safeParse(response.data);

    if (!parsed.success) {
      throw new WeatherApiError('Weather API schema mismatch', 'malformed', parsed.error.issues);
    }

    return parsed.data;
  }

  return {
    async getCurrentById(cityId) {
      const data = await request({ id: cityId });

      if (!isSuccessCode(data.cod)) {
        throw new WeatherApiError(
          `Weather API error: ${data.message ?? 'Unknown error'}`,
          'provider_error'
        );
      }

      return data;
    },

    findByName(name) {
      return request({ q: name });
    },
  };
}
