/**
 * Night Detector
 *
 * Two-threshold comparator on UV intensity. Once it reports night, UV must
 * climb to the upper threshold before it reports day again; once day, UV must
 * drop below the lower threshold. The first reading of a session is compared
 * against the midpoint.
 *
 * A lower threshold above the upper one is not rejected; the output simply
 * chatters.
 */
export class NightDetector {
    private lastResult = false;
    private hasRun = false;

    update(uvIntensity: number, lowerThreshold: number, upperThreshold: number): boolean {
        let result: boolean;
        if (!this.hasRun) {
            result = uvIntensity < (lowerThreshold + upperThreshold) / 2;
            this.hasRun = true;
        } else {
            result = this.lastResult ? uvIntensity < upperThreshold : uvIntensity < lowerThreshold;
        }
        this.lastResult = result;
        return result;
    }

    reset(): void {
        this.lastResult = false;
        this.hasRun = false;
    }

    get state(): { lastResult: boolean; hasRun: boolean } {
        return { lastResult: this.lastResult, hasRun: this.hasRun };
    }
}
