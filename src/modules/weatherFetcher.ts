import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { City } from '../interfaces/city';
import { FetchError } from '../interfaces/errors';
import { FetchResult } from '../interfaces/results';
import { UnitSystem } from '../interfaces/weatherReading';
import { RawPayloadSchema } from '../schemas/openWeather.schema';
import { ProviderConfig } from '../config';
import { logger } from '../logger';

export interface WeatherFetcher {
  fetch(city: City, signal?: AbortSignal): Promise<FetchResult>;
}

const COORDINATES = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

export function createWeatherApiClient(timeoutMs: number): {
  axiosClient: AxiosInstance;
  httpsAgent: https.Agent;
} {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  const axiosClient = axios.create({
    timeout: timeoutMs,
    httpsAgent,
  });

  return { axiosClient, httpsAgent };
}

/**
 * "51.51,-0.13" is sent as coordinates, anything else as a place query.
 */
export function buildQueryParams(
  query: string
): { q: string } | { lat: number; lon: number } {
  const match = COORDINATES.exec(query);
  if (match) {
    return { lat: Number(match[1]), lon: Number(match[2]) };
  }
  return { q: query.trim() };
}

export function classifyRequestError(err: unknown): FetchError {
  if (axios.isCancel(err)) {
    return { kind: 'cancelled' };
  }

  if (!axios.isAxiosError(err)) {
    return { kind: 'network', code: 'UNKNOWN' };
  }

  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
    return { kind: 'timeout' };
  }

  const status = err.response?.status;
  if (status === 401 || status === 403) {
    return { kind: 'unauthorized', status };
  }
  if (status !== undefined) {
    return { kind: 'http', status };
  }

  return { kind: 'network', code: err.code ?? 'UNKNOWN' };
}

export class OpenWeatherFetcher implements WeatherFetcher {
  private readonly axiosClient: AxiosInstance;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly units: UnitSystem;
  private readonly timeoutMs: number;

  constructor(axiosClient: AxiosInstance, provider: ProviderConfig) {
    this.axiosClient = axiosClient;
    this.baseUrl = provider.baseUrl;
    this.apiKey = provider.apiKey;
    this.units = provider.units;
    this.timeoutMs = provider.timeoutMs;
  }

  async fetch(city: City, signal?: AbortSignal): Promise<FetchResult> {
    try {
      const response = await this.axiosClient.get<unknown>(this.baseUrl, {
        timeout: this.timeoutMs,
        signal,
        params: {
          ...buildQueryParams(city.query),
          appid: this.apiKey,
          units: this.units,
        },
      });

      const parsed = RawPayloadSchema.safeParse(response.data);

      if (!parsed.success) {
        logger.warn(
          { city: city.name, issues: parsed.error.issues },
          'Weather API returned a non-object body'
        );

        return {
          status: 'failed',
          error: { kind: 'invalid_response', detail: 'response body is not a JSON object' },
        };
      }

      return {
        status: 'success',
        raw: {
          cityName: city.name,
          units: this.units,
          payload: parsed.data,
        },
      };
    } catch (err) {
      const error = classifyRequestError(err);

      logger.debug({ city: city.name, error }, 'Weather API request failed');

      return { status: 'failed', error };
    }
  }
}
