/** The most recent recognized signs, oldest first, bounded to `capacity`. */
export class SignTranscript {
    private entries: string[] = [];

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`SignTranscript: capacity must be a positive integer, got ${capacity}.`);
        }
    }

    public append(label: string): void {
        this.entries.push(label);
        if (this.entries.length > this.capacity) {
            this.entries.shift();
        }
    }

    public getEntries(): readonly string[] {
        return [...this.entries];
    }

    public toString(): string {
        return this.entries.join(' ');
    }
}
