import { describe, it, expect, beforeEach } from 'vitest';
import { NightDetector } from '../../services/NightDetector';

const LOWER = 4.5;
const UPPER = 5.5;

describe('NightDetector', () => {
    let detector: NightDetector;

    beforeEach(() => {
        detector = new NightDetector();
    });

    describe('first reading', () => {
        it('should report day at or above the midpoint', () => {
            expect(detector.update(6.0, LOWER, UPPER)).toBe(false);
        });

        it('should report day exactly at the midpoint', () => {
            expect(detector.update(5.0, LOWER, UPPER)).toBe(false);
        });

        it('should report night below the midpoint', () => {
            expect(detector.update(4.9, LOWER, UPPER)).toBe(true);
        });

        it('should mark the detector as run', () => {
            detector.update(6.0, LOWER, UPPER);
            expect(detector.state).toEqual({ lastResult: false, hasRun: true });
        });
    });

    describe('hysteresis', () => {
        it('should follow the documented sequence', () => {
            expect(detector.update(6.0, LOWER, UPPER)).toBe(false); // midpoint 5.0
            expect(detector.update(5.0, LOWER, UPPER)).toBe(false); // day needs < 4.5 to flip
            expect(detector.update(4.4, LOWER, UPPER)).toBe(true);
            expect(detector.update(4.8, LOWER, UPPER)).toBe(true);  // night needs >= 5.5 to flip
            expect(detector.update(5.6, LOWER, UPPER)).toBe(false);
        });

        it('should stay day while UV oscillates between the thresholds', () => {
            detector.update(6.0, LOWER, UPPER);
            for (const uv of [4.6, 5.4, 4.51, 5.49, 5.0, 4.7]) {
                expect(detector.update(uv, LOWER, UPPER)).toBe(false);
            }
        });

        it('should stay night while UV oscillates between the thresholds', () => {
            detector.update(1.0, LOWER, UPPER);
            for (const uv of [4.6, 5.4, 4.51, 5.49, 5.0, 4.7]) {
                expect(detector.update(uv, LOWER, UPPER)).toBe(true);
            }
        });

        it('should flip to day exactly at the upper threshold', () => {
            detector.update(1.0, LOWER, UPPER);
            expect(detector.update(5.5, LOWER, UPPER)).toBe(false);
        });

        it('should stay day exactly at the lower threshold', () => {
            detector.update(6.0, LOWER, UPPER);
            expect(detector.update(4.5, LOWER, UPPER)).toBe(false);
        });
    });

    describe('reset', () => {
        it('should compare against the midpoint again after reset', () => {
            detector.update(1.0, LOWER, UPPER);
            detector.reset();
            expect(detector.state).toEqual({ lastResult: false, hasRun: false });
            // As night, 5.2 < upper would stay night; fresh, it is above the midpoint.
            expect(detector.update(5.2, LOWER, UPPER)).toBe(false);
        });
    });

    describe('independent instances', () => {
        it('should not share state between detectors', () => {
            const other = new NightDetector();
            detector.update(1.0, LOWER, UPPER);
            expect(other.update(5.2, LOWER, UPPER)).toBe(false);
            expect(detector.update(5.2, LOWER, UPPER)).toBe(true);
        });
    });

    describe('inverted thresholds', () => {
        it('should chatter without throwing', () => {
            expect(detector.update(5.0, 6.0, 4.0)).toBe(false);
            expect(detector.update(5.0, 6.0, 4.0)).toBe(true);
            expect(detector.update(5.0, 6.0, 4.0)).toBe(false);
        });
    });
});
