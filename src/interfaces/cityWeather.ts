export const NOT_AVAILABLE = 'N/A';

export type NotAvailable = typeof NOT_AVAILABLE;

export interface CityWeather {
    id: number;
    name: string;
    country: string;
    description: string;
    temp: number | null;
    tempMin: number | null;
    tempMax: number | null;
    icon: string | null;
    pressure: number | NotAvailable;
    humidity: number | NotAvailable;
    visibility: string;
    windSpeed: string;
    observedAt: string;
    sunrise: string;
    sunset: string;
}
