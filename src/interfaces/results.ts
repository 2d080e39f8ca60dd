import { FetchError, LoadError, TransformError } from './errors';
import { RawObservation, WeatherReading } from './weatherReading';

export type FetchResult =
  | { status: 'success'; raw: RawObservation }
  | { status: 'failed'; error: FetchError };

export type TransformResult =
  | { status: 'success'; reading: WeatherReading }
  | { status: 'failed'; error: TransformError };

export type LoadResult =
  | { status: 'success'; inserted: number; duplicates: number }
  | { status: 'failed'; error: LoadError };
