/**
 * Services Index Unit Tests
 *
 * Tests for the services barrel and the package entry point.
 */
import { describe, it, expect } from 'vitest';
import {
    WeatherStationService,
    NightDetector,
    PrecipitationRateEstimator,
    DEFAULT_PRECIPITATION_INTERVAL_MS,
    SessionWatchdog,
    DEFAULT_COMMUNICATION_TIMEOUT_MS,
    QueuedByteSource,
    attachReadable
} from '../services';
import * as station from '../index';

describe('Services Index', () => {
    it('should export the session service', () => {
        expect(typeof WeatherStationService).toBe('function');
        expect(typeof station.WeatherStationService).toBe('function');
    });

    it('should export the stateful detectors', () => {
        expect(new NightDetector().state).toEqual({ lastResult: false, hasRun: false });
        expect(new PrecipitationRateEstimator().state.lastCounter).toBeNull();
        expect(new SessionWatchdog().state.firstDataReceived).toBe(false);
    });

    it('should export the default intervals', () => {
        expect(DEFAULT_PRECIPITATION_INTERVAL_MS).toBe(180000);
        expect(DEFAULT_COMMUNICATION_TIMEOUT_MS).toBe(120000);
    });

    it('should export the transport helpers', () => {
        expect(new QueuedByteSource().available()).toBe(0);
        expect(typeof attachReadable).toBe('function');
    });
});

describe('Package entry', () => {
    it('should export the frame helpers', () => {
        expect(station.classifyFrame(Uint8Array.from([0x24]))).toBe(station.PacketVariant.INVALID);
        expect(station.formatHexPretty(Uint8Array.from([0x24, 0x9f]))).toBe('24.9F (2)');
    });

    it('should export the store and config helpers', () => {
        expect(station.createStationStore().getState().connectionState).toBe('waiting');
        expect(station.DEFAULT_STATION_CONFIG.pollIntervalMs).toBe(100);
    });
});
