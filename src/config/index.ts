import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { City, CitySchema } from '../interfaces/city';
import { FatalConfigurationError } from '../interfaces/errors';
import { UnitSystem } from '../interfaces/weatherReading';
import { BackoffPolicy } from '../utils/backoff';
import { errorMessage } from '../utils/errorMessage';

dotenv.config({
  quiet: process.env.NODE_ENV === 'test',
});

type Env = Record<string, string | undefined>;

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  WEATHER_API_BASE_URL: z
    .string()
    .url()
    .default('https://api.openweathermap.org/data/2.5/weather'),
  WEATHER_UNITS: z.enum(['standard', 'metric', 'imperial']).default('metric'),
  WEATHER_CITIES: z.string().optional(),
  WEATHER_CITIES_FILE: z.string().min(1).default('config/cities.json'),

  DATABASE_HOST: z.string().min(1).default('localhost'),
  DATABASE_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DATABASE_USER: z.string().min(1).default('weather'),
  DATABASE_NAME: z.string().min(1).default('weather'),
  DATABASE_SSL: booleanFlag,
  DATABASE_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DATABASE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(5).default(1),
  FETCH_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),

  RETRY_COUNT: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  RETRY_FACTOR: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),

  BREAKER_THRESHOLD: z.coerce.number().int().min(1).default(3),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(60_000),

  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  FAIL_ON_PARTIAL: booleanFlag,

  KAFKA_BROKER_ADDRESS: z.string().min(1).optional(),
});

export interface ProviderConfig {
  baseUrl: string;
  apiKey: string;
  units: UnitSystem;
  timeoutMs: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
  statementTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface RetryConfig extends BackoffPolicy {
  retries: number;
}

export interface RunConfig {
  cities: readonly City[];
  concurrency: number;
  minIntervalMs: number;
  retry: RetryConfig;
  breaker: { threshold: number; cooldownMs: number };
  runTimeoutMs: number;
  failOnPartial: boolean;
}

export interface EtlConfig {
  env: 'development' | 'production' | 'test';
  provider: ProviderConfig;
  database: DatabaseConfig;
  run: RunConfig;
  kafkaBrokerAddress?: string;
}

/**
 * Reads a secret that is either given literally or as a Docker secrets path.
 */
export function resolveSecret(env: Env, envVar: string): string {
  const value = env[envVar]?.trim();
  if (!value) {
    throw new FatalConfigurationError(`${envVar} is not set`);
  }
  if (value.startsWith('/run/secrets/')) {
    try {
      return fs.readFileSync(value, 'utf8').trim();
    } catch (err) {
      throw new FatalConfigurationError(
        `${envVar} points to an unreadable secret file (${errorMessage(err)})`
      );
    }
  }
  return value;
}

/**
 * Parses `Name=query;Name=query`. The query part may itself contain commas
 * ("London,GB" or "51.51,-0.13"), so entries are split on ';' only.
 */
export function parseCityList(value: string): unknown[] {
  return value
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('=');
      return separator === -1
        ? { name: entry, query: entry }
        : { name: entry.slice(0, separator), query: entry.slice(separator + 1) };
    });
}

function readCitiesFile(file: string): unknown {
  const fullPath = path.resolve(process.cwd(), file);
  let content: string;
  try {
    content = fs.readFileSync(fullPath, 'utf8');
  } catch (err) {
    throw new FatalConfigurationError(
      `Cannot read city list ${fullPath} (${errorMessage(err)})`
    );
  }
  try {
    return JSON.parse(content);
  } catch {
    throw new FatalConfigurationError(`City list ${fullPath} is not valid JSON`);
  }
}

export function loadCities(raw: unknown): City[] {
  const parsed = z
    .array(CitySchema)
    .min(1, 'at least one city must be configured')
    .safeParse(raw);

  if (!parsed.success) {
    throw new FatalConfigurationError('Invalid city configuration', parsed.error.issues);
  }

  const seen = new Set<string>();
  for (const city of parsed.data) {
    if (seen.has(city.name)) {
      throw new FatalConfigurationError(`Duplicate city name "${city.name}"`);
    }
    seen.add(city.name);
  }

  return parsed.data;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Readonly<EtlConfig> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new FatalConfigurationError('Invalid environment', parsed.error.issues);
  }

  const vars = parsed.data;

  const cities = loadCities(
    vars.WEATHER_CITIES !== undefined
      ? parseCityList(vars.WEATHER_CITIES)
      : readCitiesFile(vars.WEATHER_CITIES_FILE)
  );

  const config: EtlConfig = {
    env: vars.NODE_ENV,
    provider: {
      baseUrl: vars.WEATHER_API_BASE_URL,
      apiKey: resolveSecret(env, 'WEATHER_API_KEY'),
      units: vars.WEATHER_UNITS,
      timeoutMs: vars.FETCH_TIMEOUT_MS,
    },
    database: {
      host: vars.DATABASE_HOST,
      port: vars.DATABASE_PORT,
      user: vars.DATABASE_USER,
      password: resolveSecret(env, 'DATABASE_PASSWORD'),
      database: vars.DATABASE_NAME,
      ssl: vars.DATABASE_SSL,
      statementTimeoutMs: vars.DATABASE_STATEMENT_TIMEOUT_MS,
      connectTimeoutMs: vars.DATABASE_CONNECT_TIMEOUT_MS,
    },
    run: {
      cities,
      concurrency: vars.FETCH_CONCURRENCY,
      minIntervalMs: vars.FETCH_MIN_INTERVAL_MS,
      retry: {
        retries: vars.RETRY_COUNT,
        baseDelayMs: vars.RETRY_BASE_DELAY_MS,
        factor: vars.RETRY_FACTOR,
        maxDelayMs: vars.RETRY_MAX_DELAY_MS,
      },
      breaker: {
        threshold: vars.BREAKER_THRESHOLD,
        cooldownMs: vars.BREAKER_COOLDOWN_MS,
      },
      runTimeoutMs: vars.RUN_TIMEOUT_MS,
      failOnPartial: vars.FAIL_ON_PARTIAL,
    },
    kafkaBrokerAddress: vars.KAFKA_BROKER_ADDRESS,
  };

  return deepFreeze(config);
}
