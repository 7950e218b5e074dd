export interface SignAnalyzerEvents {
    /** Current output string, published exactly once per analyzed frame. */
    TEXT_OUTPUT: { text: string; transcript: readonly string[]; frameTimeMs: number };
    /** Edge event: the displayed text changed to a newly recognized sign. */
    SIGN_RECOGNIZED: { label: string; classIndex: number; frameTimeMs: number };
    FRAME_ANALYZED: {
        frameTimeMs: number;
        handsDetected: number;
        topClass: number | null;
        framesPerSecond: number;
    };
    CLASSIFIER_FAILED: { frameTimeMs: number; message: string };
}

export type SignAnalyzerChannel = keyof SignAnalyzerEvents;

export type Listener<K extends SignAnalyzerChannel> = (payload: SignAnalyzerEvents[K]) => void;

export class EventBus {
    private subscribers: Map<SignAnalyzerChannel, Set<Function>> = new Map();

    public subscribe<K extends SignAnalyzerChannel>(channel: K, listener: Listener<K>): () => void {
        let channelSubscribers = this.subscribers.get(channel);
        if (!channelSubscribers) {
            channelSubscribers = new Set();
            this.subscribers.set(channel, channelSubscribers);
        }
        channelSubscribers.add(listener);

        return () => {
            const subs = this.subscribers.get(channel);
            if (subs) {
                subs.delete(listener);
            }
        };
    }

    public hasSubscribers(channel: SignAnalyzerChannel): boolean {
        return this.listenerCount(channel) > 0;
    }

    public listenerCount(channel: SignAnalyzerChannel): number {
        return this.subscribers.get(channel)?.size ?? 0;
    }

    public publish<K extends SignAnalyzerChannel>(channel: K, payload: SignAnalyzerEvents[K]): boolean {
        const channelSubscribers = this.subscribers.get(channel);
        if (!channelSubscribers || channelSubscribers.size === 0) {
            return false;
        }

        // Snapshot: a listener may unsubscribe itself (or others) mid-dispatch.
        for (const listener of Array.from(channelSubscribers)) {
            try {
                listener(payload);
            } catch (error) {
                // Isolate subscriber failures.
                console.error(`[EventBus] Subscriber on ${channel} threw; continuing dispatch.`, error);
            }
        }

        return true;
    }

    public clear(): void {
        this.subscribers.clear();
    }
}
