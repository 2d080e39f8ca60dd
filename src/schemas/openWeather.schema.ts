import { z } from "zod";

const MAX_OBSERVATION_TIME = 8_640_000_000_000;

/* ------------------ Current weather (OpenWeatherMap) ------------------ */

export const ConditionSchema = z.object({
  id: z.number().optional(),
  main: z.string().optional(),
  description: z.string().trim().min(1, "description is empty"),
  icon: z.string().optional(),
});

export const MainSchema = z.object({
  temp: z.number().finite(),
  humidity: z
    .number()
    .int("humidity must be an integer")
    .min(0, "humidity below 0")
    .max(100, "humidity above 100"),
  feels_like: z.number().optional(),
  pressure: z.number().optional(),
});

export const CurrentWeatherSchema = z.object({
  name: z.string().optional(),
  // unix seconds, UTC; bounded by the largest time a Date can hold
  dt: z
    .number()
    .int("observation time must be an integer")
    .nonnegative("observation time before 1970")
    .max(MAX_OBSERVATION_TIME, "observation time out of range"),
  main: MainSchema,
  weather: z.array(ConditionSchema).min(1, "no weather conditions"),
});

// Anything the provider answers with must at least be a JSON object.
export const RawPayloadSchema = z.record(z.string(), z.unknown());
