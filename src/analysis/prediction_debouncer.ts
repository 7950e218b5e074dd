/**
 * Debounces per-frame top-class predictions.
 *
 * Keeps the last `required` class indices (oldest evicted first). A prediction
 * is stable only when the history is full and every entry agrees.
 */
export class PredictionDebouncer {
    private history: number[] = [];

    constructor(private readonly required: number) {
        if (!Number.isInteger(required) || required < 1) {
            throw new Error(`PredictionDebouncer: required must be a positive integer, got ${required}.`);
        }
    }

    public push(classIndex: number): void {
        this.history.push(classIndex);
        while (this.history.length > this.required) {
            this.history.shift();
        }
    }

    /** The unanimous class index, or `null` while the history disagrees or is short. */
    public stablePrediction(): number | null {
        if (this.history.length < this.required) {
            return null;
        }
        const first = this.history[0];
        return this.history.every(idx => idx === first) ? first : null;
    }

    public getHistory(): readonly number[] {
        return [...this.history];
    }

    public clear(): void {
        this.history = [];
    }
}
