export type UnitSystem = 'standard' | 'metric' | 'imperial';

// Provider body for one city, untouched apart from the unit tag.
export interface RawObservation {
  cityName: string;
  units: UnitSystem;
  payload: Record<string, unknown>;
}

export interface WeatherReading {
  cityName: string;
  observedAt: Date;
  temperature: number; // Celsius
  humidity: number;
  description: string;
}
