/** Reported until two distinct timestamps are available. */
export const UNKNOWN_FPS = -1;

/**
 * Moving-average frame rate over recent arrival timestamps. Diagnostic only.
 */
export class FrameRateTracker {
    // Newest first.
    private timestamps: number[] = [];
    private fps = UNKNOWN_FPS;

    constructor(private readonly windowSize: number) {
        if (!Number.isInteger(windowSize) || windowSize < 2) {
            throw new Error(`FrameRateTracker: windowSize must be an integer >= 2, got ${windowSize}.`);
        }
    }

    /**
     * Records a frame arrival and returns the updated estimate. The window
     * retains at most `windowSize - 1` timestamps.
     */
    public record(timestampMs: number): number {
        this.timestamps.unshift(timestampMs);
        while (this.timestamps.length >= this.windowSize) {
            this.timestamps.pop();
        }

        const newest = this.timestamps[0];
        const oldest = this.timestamps[this.timestamps.length - 1];
        const elapsed = newest - oldest;
        this.fps = elapsed > 0 ? 1000 / (elapsed / this.timestamps.length) : UNKNOWN_FPS;
        return this.fps;
    }

    public get framesPerSecond(): number {
        return this.fps;
    }

    /** Most recently recorded arrival, or `null` before the first frame. */
    public get lastTimestamp(): number | null {
        return this.timestamps.length > 0 ? this.timestamps[0] : null;
    }

    public get size(): number {
        return this.timestamps.length;
    }
}
