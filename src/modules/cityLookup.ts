import axios from 'axios';
import { logger } from '../logger';
import { OpenWeatherClient, isSuccessCode } from './openWeatherClient';

export type CityLookup = (name: string) => Promise<number | null>;

/**
 * Resolves a free-text city name to the provider's city id. The provider's
 * single match wins; any failure resolves to null.
 */
export async function findCityByName(
  client: Pick<OpenWeatherClient, 'findByName'>,
  name: string
): Promise<number | null> {
  try {
    const data = await client.findByName(name);

    if (isSuccessCode(data.cod) && typeof data.id === 'number') {
      return data.id;
    }

    logger.warn({ name, cod: data.cod }, 'City lookup returned no id');
    return null;
  } catch (err) {
    if (axios.isAxiosError(err) && err.response) {
      if (err.response.status === 404) {
        logger.info({ name }, 'City not found');
      } else {
        logger.warn({ name, status: err.response.status }, 'HTTP error finding city');
      }
      return null;
    }

    logger.warn(
      { name, message: err instanceof Error ? err.message : String(err) },
      'Error finding city'
    );
    return null;
  }
}

export function createCityLookup(client: Pick<OpenWeatherClient, 'findByName'>): CityLookup {
  return (name) => findCityByName(client, name);
}
