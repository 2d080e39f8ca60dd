import { UnitSystem } from '../interfaces/weatherReading';

const KELVIN_OFFSET = 273.15;

export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/**
 * Converts a provider temperature to Celsius, rounded to hundredths
 * (the precision of the `temperature` column).
 */
export function toCelsius(value: number, units: UnitSystem): number {
    switch (units) {
        case 'standard':
            return roundTo(value - KELVIN_OFFSET, 2);
        case 'imperial':
            return roundTo(((value - 32) * 5) / 9, 2);
        case 'metric':
            return roundTo(value, 2);
    }
}
