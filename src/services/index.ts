/**
 * Services Index
 *
 * Central export point for the station session and its building blocks.
 */

// Session / ingestion loop
export { WeatherStationService } from './WeatherStationService';
export type { WeatherStationOptions } from './WeatherStationService';

// Stateful detectors
export { NightDetector } from './NightDetector';
export {
    PrecipitationRateEstimator,
    DEFAULT_PRECIPITATION_INTERVAL_MS
} from './PrecipitationRateEstimator';
export type { CounterAnomaly, PrecipitationEstimatorState } from './PrecipitationRateEstimator';
export { SessionWatchdog, DEFAULT_COMMUNICATION_TIMEOUT_MS } from './SessionWatchdog';
export type { SessionState, WatchdogAction } from './SessionWatchdog';

// Transport
export { QueuedByteSource, attachReadable } from './ByteSource';
export type { ByteSource } from './ByteSource';
