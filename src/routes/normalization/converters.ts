/**
 * Unit conversion utilities for weather data normalization
 */

/**
 * Temperature conversions
 */

export function fahrenheitToCelsius(fahrenheit: number): number {
    return (fahrenheit - 32) * 5/9;
}

export function kelvinToCelsius(kelvin: number): number {
    return kelvin - 273.15;
}

/**
 * Pressure conversions
 */

export function inhgToHpa(inhg: number): number {
    return inhg / 0.02953;
}

export function paToHpa(pa: number): number {
    return pa / 100;
}

/**
 * Precipitation conversions
 */

export function inchesToMm(inches: number): number {
    return inches * 25.4;
}

export function inchesToCm(inches: number): number {
    return inches * 2.54;
}

export function mmToCm(mm: number): number {
    return mm / 10;
}

/**
 * Wind speed conversions
 */

export function msToKmh(ms: number): number {
    return ms * 3.6;
}

export function mphToKmh(mph: number): number {
    return mph / 0.621371;
}

export function knotsToKmh(knots: number): number {
    return knots * 1.852;
}

/**
 * Normalize wind direction to 0-360 range
 */
export function normalizeWindDirection(degrees: number): number {
    let normalized = degrees % 360;
    if (normalized < 0) normalized += 360;
    return normalized;
}

export function degreesToRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

export function radiansToDegrees(radians: number): number {
    return radians * (180 / Math.PI);
}

/**
 * Canonical unit per metric. Values in any other unit listed in UNIT_CONVERSIONS are converted on
 * the way in, so every table holds one unit per column.
 */
export const CANONICAL_UNITS: Readonly<Record<string, string>> = {
    temperature_2m: '°C',
    dew_point_2m: '°C',
    apparent_temperature: '°C',
    relative_humidity_2m: '%',
    precipitation: 'mm',
    rain: 'mm',
    snowfall: 'cm',
    cloudcover: '%',
    pressure_msl: 'hPa',
    windspeed_10m: 'km/h',
    winddirection_10m: '°',
};

const UNIT_CONVERSIONS: Readonly<Record<string, Readonly<Record<string, (value: number) => number>>>> = {
    '°F': { '°C': fahrenheitToCelsius },
    'K': { '°C': kelvinToCelsius },
    'inch': { 'mm': inchesToMm, 'cm': inchesToCm },
    'mm': { 'cm': mmToCm },
    'm/s': { 'km/h': msToKmh },
    'mph': { 'km/h': mphToKmh },
    'kn': { 'km/h': knotsToKmh },
    'inHg': { 'hPa': inhgToHpa },
    'Pa': { 'hPa': paToHpa },
};

export type UnitConverter = (value: number) => number;

/**
 * Resolve the conversion from a delivered unit to the metric's canonical unit.
 * Returns undefined if the unit is unknown and cannot be converted.
 */
export function converterFor(metric: string, unit: string | undefined): UnitConverter | undefined {
    const canonical = CANONICAL_UNITS[metric];
    if (unit === undefined || canonical === undefined || unit === canonical) {
        return (value) => value;
    }
    return UNIT_CONVERSIONS[unit]?.[canonical];
}

