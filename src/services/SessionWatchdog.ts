export const DEFAULT_COMMUNICATION_TIMEOUT_MS = 2 * 60_000;

export type WatchdogAction = 'none' | 'reset';

export interface SessionState {
    firstDataReceived: boolean;
    lastPacketTime: number;
}

/**
 * Tracks link liveness. Any buffer counts as activity, even one the frame
 * validator rejects; the reset decision is made on time alone.
 */
export class SessionWatchdog {
    private firstDataReceived = false;
    private lastPacketTime = 0;
    private readonly timeoutMs: number;

    constructor(timeoutMs: number = DEFAULT_COMMUNICATION_TIMEOUT_MS) {
        this.timeoutMs = timeoutMs;
    }

    check(now: number): WatchdogAction {
        if (this.firstDataReceived && now - this.lastPacketTime > this.timeoutMs) {
            this.firstDataReceived = false;
            return 'reset';
        }
        return 'none';
    }

    /** Returns true when this buffer opened the session. */
    recordActivity(now: number): boolean {
        const first = !this.firstDataReceived;
        this.firstDataReceived = true;
        this.lastPacketTime = now;
        return first;
    }

    silenceMs(now: number): number {
        return this.firstDataReceived ? now - this.lastPacketTime : 0;
    }

    get state(): SessionState {
        return { firstDataReceived: this.firstDataReceived, lastPacketTime: this.lastPacketTime };
    }
}
