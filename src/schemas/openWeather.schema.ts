import { z } from "zod";

/*
 * Shape of the OpenWeatherMap current-weather body. Leaf fields that are null
 * or of the wrong type read as absent, so normalization substitutes a default
 * for that field alone. Only a body or container of the wrong shape is rejected.
 * The provider reports `cod` as a number on success and as a string on errors.
 */

export const CodSchema = z.union([z.number(), z.string()]);

const optionalNumber = z.number().optional().catch(undefined);
const optionalString = z.string().optional().catch(undefined);

export const ConditionSchema = z
  .object({
    id: optionalNumber,
    main: optionalString,
    description: optionalString,
    icon: optionalString,
  })
  .passthrough();

export const MainSchema = z
  .object({
    temp: optionalNumber,
    feels_like: optionalNumber,
    temp_min: optionalNumber,
    temp_max: optionalNumber,
    pressure: optionalNumber,
    humidity: optionalNumber,
  })
  .passthrough();

export const SysSchema = z
  .object({
    country: optionalString,
    sunrise: optionalNumber,
    sunset: optionalNumber,
  })
  .passthrough();

export const WindSchema = z
  .object({
    speed: optionalNumber,
    deg: optionalNumber,
  })
  .passthrough();

export const OpenWeatherSchema = z
  .object({
    cod: CodSchema.optional(),
    message: z.union([z.string(), z.number()]).optional().catch(undefined),
    id: optionalNumber,
    name: optionalString,
    dt: optionalNumber,
    timezone: optionalNumber,
    visibility: optionalNumber,
    main: MainSchema.optional(),
    sys: SysSchema.optional(),
    wind: WindSchema.optional(),
    weather: z.array(ConditionSchema).optional(),
  })
  .passthrough();

export type OpenWeatherResponse = z.infer<typeof OpenWeatherSchema>;
