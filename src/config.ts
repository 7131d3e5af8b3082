import { LogLevel, parseLogLevel } from './lib/logger';

export interface StationConfig {
    lowerNightThreshold: number;
    upperNightThreshold: number;
    precipitationIntervalMs: number;
    communicationTimeoutMs: number;
    pollIntervalMs: number;
    northCorrection: number;            // degrees, -180..180
    threeLetterDirection: boolean;      // 16-point compass instead of 8
    logLevel: LogLevel;
}

const MINUTE_MS = 60_000;

export const DEFAULT_STATION_CONFIG: Readonly<StationConfig> = Object.freeze({
    lowerNightThreshold: 4.5,
    upperNightThreshold: 5.5,
    precipitationIntervalMs: 3 * MINUTE_MS,
    communicationTimeoutMs: 2 * MINUTE_MS,
    pollIntervalMs: 100,
    northCorrection: 0,
    threeLetterDirection: false,
    logLevel: 'INFO'
});

export function parseNumber(value: string | undefined, fallback: number): number {
    if (typeof value !== 'string' || value.trim().length === 0) return fallback;
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (typeof value !== 'string') return fallback;
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return fallback;
}

export function resolveStationConfig(overrides: Partial<StationConfig> = {}): Readonly<StationConfig> {
    return Object.freeze({ ...DEFAULT_STATION_CONFIG, ...overrides });
}

/**
 * Reads WEATHER_STATION_* variables. Intervals are given in seconds,
 * anything unparsable falls back to the default.
 */
export function loadStationConfig(env: NodeJS.ProcessEnv = process.env): Readonly<StationConfig> {
    const d = DEFAULT_STATION_CONFIG;
    return resolveStationConfig({
        lowerNightThreshold: parseNumber(env.WEATHER_STATION_LOWER_NIGHT_THRESHOLD, d.lowerNightThreshold),
        upperNightThreshold: parseNumber(env.WEATHER_STATION_UPPER_NIGHT_THRESHOLD, d.upperNightThreshold),
        precipitationIntervalMs: parseNumber(env.WEATHER_STATION_PRECIPITATION_INTERVAL_S, d.precipitationIntervalMs / 1000) * 1000,
        communicationTimeoutMs: parseNumber(env.WEATHER_STATION_TIMEOUT_S, d.communicationTimeoutMs / 1000) * 1000,
        pollIntervalMs: parseNumber(env.WEATHER_STATION_POLL_INTERVAL_MS, d.pollIntervalMs),
        northCorrection: parseNumber(env.WEATHER_STATION_NORTH_CORRECTION, d.northCorrection),
        threeLetterDirection: parseBoolean(env.WEATHER_STATION_THREE_LETTER_DIRECTION, d.threeLetterDirection),
        logLevel: parseLogLevel(env.WEATHER_STATION_LOG_LEVEL, d.logLevel)
    });
}

export function assertStationConfig(config: StationConfig): void {
    const problems: string[] = [];
    const positive: Array<keyof StationConfig> = ['precipitationIntervalMs', 'communicationTimeoutMs', 'pollIntervalMs'];
    for (const key of positive) {
        const value = config[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            problems.push(`${key} must be a positive number`);
        }
    }
    if (!Number.isFinite(config.lowerNightThreshold)) problems.push('lowerNightThreshold must be finite');
    if (!Number.isFinite(config.upperNightThreshold)) problems.push('upperNightThreshold must be finite');
    if (!Number.isFinite(config.northCorrection) || config.northCorrection < -180 || config.northCorrection > 180) {
        problems.push('northCorrection must be between -180 and 180');
    }

    if (problems.length > 0) {
        throw new Error(`Invalid station configuration: ${problems.join(', ')}`);
    }
}
