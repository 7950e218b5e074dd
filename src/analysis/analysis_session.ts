import type { AnalyzerConfig } from '../kernel/config';
import type { HandObservation } from '../kernel/hand_types';
import type { AnalyzerResources } from '../resources/resource_loader';
import { assignHands } from './hand_assignment';
import { buildFrameContribution, CoordinateWindow } from './coordinate_window';
import { PredictionDebouncer } from './prediction_debouncer';
import { FrameRateTracker } from './frame_rate_tracker';
import { SignTranscript } from './sign_transcript';

export type OutputUpdate =
    | { kind: 'unchanged' }
    | { kind: 'recognized'; label: string; classIndex: number }
    | { kind: 'unknown-class'; classIndex: number };

let nextSessionId = 1;

/**
 * All mutable analysis state for one camera session: the coordinate window,
 * the prediction history, the frame-rate window and the displayed output.
 *
 * Owned by exactly one analyzer, which confines every mutation to its
 * serialized frame chain.
 */
export class AnalysisSession {
    public readonly id = nextSessionId++;
    public readonly window: CoordinateWindow;
    public readonly debouncer: PredictionDebouncer;
    public readonly frameRate: FrameRateTracker;
    public readonly transcript: SignTranscript;

    private output = '';

    constructor(
        private readonly config: AnalyzerConfig,
        private readonly resources: AnalyzerResources
    ) {
        this.window = new CoordinateWindow(config.framesPerSign);
        this.debouncer = new PredictionDebouncer(config.concurrentPredsRequired);
        this.frameRate = new FrameRateTracker(config.frameRateWindow);
        this.transcript = new SignTranscript(config.transcriptLength);
    }

    public get text(): string {
        return this.output;
    }

    /** Normalizes the frame's hands into the window; zero hands push a zero frame. */
    public pushHands(hands: readonly HandObservation[]): void {
        const { left, right } = assignHands(hands);
        this.window.push(
            buildFrameContribution(
                left === null ? null : hands[left],
                right === null ? null : hands[right],
                this.resources.normalization
            )
        );
    }

    /**
     * Records a per-frame top class and re-evaluates the displayed text.
     *
     * Output is sticky: it changes only on unanimous, non-background agreement
     * and is never cleared back to empty.
     */
    public recordPrediction(classIndex: number): OutputUpdate {
        this.debouncer.push(classIndex);

        const stable = this.debouncer.stablePrediction();
        if (stable === null || stable === this.config.backgroundClassIndex) {
            return { kind: 'unchanged' };
        }

        const label = this.resources.vocabulary.get(stable);
        if (label === undefined) {
            return { kind: 'unknown-class', classIndex: stable };
        }
        if (label === this.output) {
            return { kind: 'unchanged' };
        }

        this.output = label;
        this.transcript.append(label);
        return { kind: 'recognized', label, classIndex: stable };
    }
}
