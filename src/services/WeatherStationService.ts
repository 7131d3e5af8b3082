/**
 * Weather Station Service
 *
 * Owns one station session: polls the byte source, validates and decodes
 * each transmission, runs the stateful detectors and publishes every bound
 * channel.
 *
 * Tick order:
 * 1. watchdog check (fires on silence alone, no bytes needed)
 * 2. read whatever the source reports as available into one buffer
 * 3. classify; rejected buffers are logged and dropped
 * 4. decode, update detectors, publish
 *
 * Nothing here blocks. `start()` drives `tick()` from a timer; callers with
 * their own loop call `tick()` directly.
 */

import { ByteSource } from './ByteSource';
import { NightDetector } from './NightDetector';
import { CounterAnomaly, PrecipitationRateEstimator } from './PrecipitationRateEstimator';
import { SessionWatchdog } from './SessionWatchdog';
import { assertStationConfig, resolveStationConfig, StationConfig } from '../config';
import { createLogger, Logger } from '../lib/logger';
import type { StationStore } from '../store/stationStore';
import {
    BINARY_CHANNELS,
    ChannelSinks,
    DecodedReading,
    DiagnosticKind,
    NUMERIC_CHANNELS,
    PacketVariant,
    StationDiagnostic,
    TEXT_CHANNELS
} from '../types/station_structs';
import { decodeReading } from '../utils/fieldDecoder';
import { formatHexPretty, inspectFrame } from '../utils/frameValidator';
import {
    getCompassDirection,
    getLightDescription,
    getPrecipitationDescription,
    getWindDescription
} from '../utils/weatherDescriptions';

export interface WeatherStationOptions {
    source: ByteSource;
    sinks: ChannelSinks;
    config?: Partial<StationConfig>;
    /** Monotonic clock in ms. */
    now?: () => number;
    logger?: Logger;
    /** Receives connection state and frame counters; channel values go through `sinks`. */
    store?: StationStore;
    onDiagnostic?: (diagnostic: StationDiagnostic) => void;
}

export class WeatherStationService {
    readonly config: Readonly<StationConfig>;

    private readonly source: ByteSource;
    private readonly sinks: ChannelSinks;
    private readonly now: () => number;
    private readonly log: Logger;
    private readonly store: StationStore | null;
    private readonly onDiagnostic: ((diagnostic: StationDiagnostic) => void) | null;

    private readonly watchdog: SessionWatchdog;
    private readonly nightDetector = new NightDetector();
    private readonly rateEstimator = new PrecipitationRateEstimator();
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(options: WeatherStationOptions) {
        this.config = resolveStationConfig(options.config);
        assertStationConfig(this.config);

        this.source = options.source;
        this.sinks = options.sinks;
        this.now = options.now ?? (() => performance.now());
        this.log = options.logger ?? createLogger('weather-station', { minLevel: this.config.logLevel });
        this.store = options.store ?? null;
        this.onDiagnostic = options.onDiagnostic ?? null;
        this.watchdog = new SessionWatchdog(this.config.communicationTimeoutMs);

        this.rateEstimator.onAnomaly((anomaly, counter, at) => this.handleCounterAnomaly(anomaly, counter, at));
    }

    start(): void {
        if (this.timer) return;
        this.log.info('Polling started', { pollIntervalMs: this.config.pollIntervalMs });
        this.timer = setInterval(() => {
            try {
                this.tick();
            } catch (error) {
                this.log.error('Tick failed', { error: error instanceof Error ? error.message : String(error) });
            }
        }, this.config.pollIntervalMs);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.log.info('Polling stopped');
    }

    get isRunning(): boolean {
        return this.timer !== null;
    }

    tick(): void {
        const now = this.now();

        if (this.watchdog.check(now) === 'reset') {
            this.handleTimeout(now);
        }

        const size = this.source.available();
        if (size <= 0) return;

        const buffer = new Uint8Array(size);
        for (let i = 0; i < size; i++) {
            buffer[i] = this.source.read();
        }

        const first = this.watchdog.recordActivity(now);
        this.log.debug(first ? 'First packet received' : 'Packet received', { hex: formatHexPretty(buffer) });

        const inspection = inspectFrame(buffer);
        if (inspection.variant === PacketVariant.INVALID) {
            this.log.warn('Unknown packet received', { hex: formatHexPretty(buffer), verdict: inspection.verdict });
            this.emitDiagnostic(DiagnosticKind.MALFORMED_FRAME, now, inspection.verdict);
            this.store?.getState().recordFrame('rejected', now);
            return;
        }

        if (inspection.verdict !== 'ok') {
            this.log.info('Pressure block dropped', { verdict: inspection.verdict, length: buffer.length });
            this.emitDiagnostic(DiagnosticKind.DEGRADED_FRAME, now, inspection.verdict);
            this.store?.getState().recordFrame('degraded', now);
        } else {
            this.store?.getState().recordFrame('accepted', now);
        }

        const reading = decodeReading(buffer, inspection.variant === PacketVariant.BASIC_WITH_PRESSURE);
        this.publishReading(reading, now);
    }

    private publishReading(reading: DecodedReading, now: number): void {
        const sinks = this.sinks;
        const { lowerNightThreshold, upperNightThreshold, northCorrection, threeLetterDirection } = this.config;

        sinks.pressure?.(reading.pressure_hpa);
        sinks.wind_direction_degrees?.(reading.wind_direction_deg);
        sinks.wind_direction?.(
            reading.wind_direction_deg === null
                ? null
                : getCompassDirection(reading.wind_direction_deg, northCorrection, threeLetterDirection)
        );
        sinks.battery_low?.(reading.battery_low);
        sinks.temperature?.(reading.temperature_c);
        sinks.humidity?.(reading.humidity_pct);
        sinks.wind_speed?.(reading.wind_speed_kmh);
        sinks.wind_description?.(reading.wind_speed_kmh === null ? null : getWindDescription(reading.wind_speed_kmh));
        sinks.wind_gust?.(reading.wind_gust_kmh);

        // The estimator runs on every frame; intensity is only published when a window closes.
        const rate = this.rateEstimator.update(reading.precipitation_counter, now, this.config.precipitationIntervalMs);
        sinks.accumulated_precipitation?.(reading.accumulated_precipitation_mm);
        if (rate !== null) {
            sinks.precipitation_intensity?.(rate);
            sinks.precipitation_description?.(getPrecipitationDescription(rate));
        } else if (reading.precipitation_counter === null) {
            sinks.precipitation_intensity?.(null);
            sinks.precipitation_description?.(null);
        }

        sinks.uv_intensity?.(reading.uv_intensity);
        sinks.uv_index?.(reading.uv_index);
        if (reading.uv_intensity !== null) {
            const night = this.nightDetector.update(reading.uv_intensity, lowerNightThreshold, upperNightThreshold);
            sinks.night?.(night);
        }

        sinks.light?.(reading.light_lux);
        sinks.light_description?.(reading.light_lux === null ? null : getLightDescription(reading.light_lux));
    }

    private handleTimeout(now: number): void {
        this.log.warn('Communication timeout', { timeoutMs: this.config.communicationTimeoutMs });
        this.resetChannels();
        this.nightDetector.reset();
        this.rateEstimator.reset();
        this.store?.getState().resetChannels();
        this.store?.getState().setConnectionState('timed_out');
        this.emitDiagnostic(DiagnosticKind.COMMUNICATION_TIMEOUT, now, 'no data received');
    }

    private resetChannels(): void {
        for (const name of NUMERIC_CHANNELS) this.sinks[name]?.(null);
        for (const name of BINARY_CHANNELS) this.sinks[name]?.(null);
        for (const name of TEXT_CHANNELS) this.sinks[name]?.(null);
    }

    private handleCounterAnomaly(anomaly: CounterAnomaly, counter: number | null, at: number): void {
        this.log.info('Precipitation baseline restarted', { anomaly, counter });
        this.emitDiagnostic(DiagnosticKind.COUNTER_ANOMALY, at, anomaly);
    }

    private emitDiagnostic(kind: DiagnosticKind, at: number, detail: string): void {
        this.onDiagnostic?.({ kind, at, detail });
    }
}
