/**
 * Precipitation Rate Estimator
 *
 * Turns the station's running tip counter into mm/hour over a sliding window.
 * The baseline (counter, time) only advances once more than `minIntervalMs`
 * has passed, so slow rain still accumulates a measurable delta.
 *
 * Counter anomalies never produce a rate:
 * - sentinel (`null`) drops the baseline entirely;
 * - a counter lower than the baseline (wrap or station reboot) restarts the
 *   window from the current value.
 */

import { PRECIPITATION_MM_PER_TICK } from '../types/station_structs';

export const DEFAULT_PRECIPITATION_INTERVAL_MS = 3 * 60_000;

const MS_PER_HOUR = 3_600_000;

export type CounterAnomaly = 'sentinel' | 'counter_decreased';

export interface PrecipitationEstimatorState {
    lastCounter: number | null;
    lastSampleTime: number;
}

export class PrecipitationRateEstimator {
    private lastCounter: number | null = null;
    private lastSampleTime = 0;
    private anomalyListener: ((anomaly: CounterAnomaly, counter: number | null, at: number) => void) | null = null;

    onAnomaly(listener: ((anomaly: CounterAnomaly, counter: number | null, at: number) => void) | null): void {
        this.anomalyListener = listener;
    }

    /**
     * @param counter - raw 16-bit counter, `null` when the station reported its sentinel
     * @param now - monotonic time in ms
     * @returns mm/hour when a window just closed, otherwise `null`
     */
    update(counter: number | null, now: number, minIntervalMs: number = DEFAULT_PRECIPITATION_INTERVAL_MS): number | null {
        if (counter === null) {
            this.lastCounter = null;
            this.anomalyListener?.('sentinel', null, now);
            return null;
        }

        if (this.lastCounter === null) {
            this.setBaseline(counter, now);
            return null;
        }

        if (counter < this.lastCounter) {
            this.setBaseline(counter, now);
            this.anomalyListener?.('counter_decreased', counter, now);
            return null;
        }

        const elapsed = now - this.lastSampleTime;
        if (elapsed <= minIntervalMs) {
            return null;
        }

        const rate = (counter - this.lastCounter) * PRECIPITATION_MM_PER_TICK / (elapsed / MS_PER_HOUR);
        this.setBaseline(counter, now);
        return rate;
    }

    reset(): void {
        this.lastCounter = null;
        this.lastSampleTime = 0;
    }

    get state(): PrecipitationEstimatorState {
        return { lastCounter: this.lastCounter, lastSampleTime: this.lastSampleTime };
    }

    private setBaseline(counter: number, now: number): void {
        this.lastCounter = counter;
        this.lastSampleTime = now;
    }
}
