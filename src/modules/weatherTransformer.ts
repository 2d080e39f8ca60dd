import { z } from 'zod';
import { CurrentWeatherResponse } from '../interfaces/openWeather';
import { TransformResult } from '../interfaces/results';
import { RawObservation, WeatherReading } from '../interfaces/weatherReading';
import { CurrentWeatherSchema } from '../schemas/openWeather.schema';
import { toCelsius } from '../utils/temperature';

// Payload paths (array indices dropped) -> WeatherReading field names
const FIELD_BY_PATH: Record<string, keyof WeatherReading> = {
  'main.temp': 'temperature',
  'main.humidity': 'humidity',
  'weather': 'description',
  'weather.description': 'description',
  'dt': 'observedAt',
};

// Celsius; also keeps values inside the numeric(6, 2) column
export const TEMPERATURE_RANGE = { min: -100, max: 100 } as const;

function fieldOf(issue: z.ZodIssue): string {
  const key = issue.path.filter((segment) => typeof segment === 'string').join('.');
  return FIELD_BY_PATH[key] ?? (key || 'payload');
}

export function toReading(cityName: string, units: RawObservation['units'], data: CurrentWeatherResponse): WeatherReading {
  return {
    cityName,
    observedAt: new Date(data.dt * 1000),
    temperature: toCelsius(data.main.temp, units),
    humidity: data.main.humidity,
    description: data.weather[0].description,
  };
}

/**
 * Maps one provider response to a reading. Out-of-range values are reported
 * as errors, never clamped. The temperature range is checked after conversion
 * to Celsius.
 */
export function transformObservation(raw: RawObservation): TransformResult {
  const parsed = CurrentWeatherSchema.safeParse(raw.payload);

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return {
      status: 'failed',
      error: { field: fieldOf(issue), reason: issue.message },
    };
  }

  const reading = toReading(raw.cityName, raw.units, parsed.data);

  if (
    reading.temperature < TEMPERATURE_RANGE.min ||
    reading.temperature > TEMPERATURE_RANGE.max
  ) {
    return {
      status: 'failed',
      error: {
        field: 'temperature',
        reason: `temperature ${reading.temperature} °C out of range`,
      },
    };
  }

  return { status: 'success', reading };
}
