/**
 * sign_analyzer_plugin.ts: per-frame analysis driver
 *
 * Sequences one camera frame through the pipeline:
 *
 *   frame ──copy+release──► still image ──extract──► hands
 *         ──assign+normalize──► window ──classify──► top class
 *         ──debounce──► output ──publish──► TEXT_OUTPUT listeners
 *
 * The frame is released as soon as its pixels are copied. Extraction and
 * classification then run on a single serialized chain, so the coordinate
 * window, prediction history and output string only ever have one writer.
 *
 * When nobody listens on TEXT_OUTPUT the frame is released untouched.
 */

import type { EventBus, Listener } from '../kernel/event_bus';
import type { CameraFrame, StillImage } from '../kernel/hand_types';
import type { Clock, Plugin, PluginContext } from '../kernel/plugin_supervisor';
import type { AnalyzerResources } from '../resources/resource_loader';
import { AnalysisSession } from '../analysis/analysis_session';
import { classifyWindow, Classifier } from '../analysis/classifier';
import { FrameBuffer } from '../analysis/frame_buffer';
import { extractHands, LandmarkExtractor } from '../analysis/landmark_extractor';
import { UNKNOWN_FPS } from '../analysis/frame_rate_tracker';

export type AnalyzerState = 'IDLE' | 'AWAITING_EXTRACTION' | 'CLASSIFYING' | 'PUBLISHING';

export interface SignAnalyzerDeps {
    extractor: LandmarkExtractor;
    classifier: Classifier;
    resources: AnalyzerResources;
}

export interface AnalyzerStats {
    framesPerSecond: number;
    lastAnalyzedTimestamp: number | null;
    framesCaptured: number;
    framesAnalyzed: number;
    framesSkipped: number;
    noHandFrames: number;
    classifierFailures: number;
    /** True once the window holds `framesPerSign` real frames. */
    windowFilled: boolean;
}

export class SignAnalyzerPlugin implements Plugin {
    public readonly name = 'SignAnalyzerPlugin';
    public readonly version = '1.0.0';

    private readonly extractor: LandmarkExtractor;
    private readonly classifier: Classifier;
    private readonly resources: AnalyzerResources;
    private readonly frameBuffer = new FrameBuffer();

    private eventBus: EventBus | null = null;
    private clock: Clock | null = null;
    private session: AnalysisSession | null = null;
    private active = false;
    private state: AnalyzerState = 'IDLE';
    private chain: Promise<void> = Promise.resolve();

    private framesAnalyzed = 0;
    private framesSkipped = 0;
    private noHandFrames = 0;
    private classifierFailures = 0;

    constructor(deps: SignAnalyzerDeps) {
        this.extractor = deps.extractor;
        this.classifier = deps.classifier;
        this.resources = deps.resources;
    }

    // ── Lifecycle ─────────────────────────────────────────────────────────────

    public async init(context: PluginContext): Promise<void> {
        this.eventBus = context.eventBus;
        this.clock = context.clock;
        await this.extractor.init();
        await this.classifier.init();
        this.session = new AnalysisSession(context.config, this.resources);
    }

    public start(): void {
        this.active = true;
        console.log('[SignAnalyzerPlugin] Started');
    }

    public stop(): void {
        this.active = false;
        console.log('[SignAnalyzerPlugin] Stopped');
    }

    public async destroy(): Promise<void> {
        this.active = false;
        // Results still in flight for the last frame are dropped.
        this.session = null;
        this.eventBus = null;
        try {
            await this.extractor.close();
        } finally {
            await this.classifier.close();
        }
    }

    // ── Public API ────────────────────────────────────────────────────────────

    /** Registers an output subscriber; returns its unsubscribe function. */
    public onText(listener: (text: string) => void): () => void {
        if (!this.eventBus) {
            throw new Error('[SignAnalyzerPlugin] onText() called before init().');
        }
        const relay: Listener<'TEXT_OUTPUT'> = payload => listener(payload.text);
        return this.eventBus.subscribe('TEXT_OUTPUT', relay);
    }

    public getText(): string {
        return this.session?.text ?? '';
    }

    public getTranscript(): readonly string[] {
        return this.session?.transcript.getEntries() ?? [];
    }

    public getState(): AnalyzerState {
        return this.state;
    }

    public getStats(): AnalyzerStats {
        return {
            framesPerSecond: this.session?.frameRate.framesPerSecond ?? UNKNOWN_FPS,
            lastAnalyzedTimestamp: this.session?.frameRate.lastTimestamp ?? null,
            framesCaptured: this.frameBuffer.captured,
            framesAnalyzed: this.framesAnalyzed,
            framesSkipped: this.framesSkipped,
            noHandFrames: this.noHandFrames,
            classifierFailures: this.classifierFailures,
            windowFilled: this.session?.window.isFilled ?? false,
        };
    }

    /**
     * Analyzes one frame. The frame is always released before this returns
     * control to the event loop; the promise settles once the frame's output
     * has been published (or the frame was skipped).
     */
    public analyze(frame: CameraFrame): Promise<void> {
        const session = this.session;
        const bus = this.eventBus;
        const clock = this.clock;
        if (!this.active || !session || !bus || !clock || !bus.hasSubscribers('TEXT_OUTPUT')) {
            frame.close();
            this.framesSkipped++;
            return Promise.resolve();
        }

        const frameTimeMs = clock.now();
        session.frameRate.record(frameTimeMs);

        let image: StillImage;
        try {
            image = this.frameBuffer.capture(frame);
        } catch (error) {
            this.framesSkipped++;
            return Promise.reject(error);
        }

        const run = this.chain.then(() => this.processFrame(session, image, frameTimeMs));
        // Keep the chain alive past a failed frame; the caller still sees the rejection.
        this.chain = run.catch(() => undefined);
        return run;
    }

    // ── Pipeline ──────────────────────────────────────────────────────────────

    private async processFrame(session: AnalysisSession, image: StillImage, frameTimeMs: number): Promise<void> {
        this.state = 'AWAITING_EXTRACTION';
        const outcome = await extractHands(this.extractor, image, frameTimeMs);
        if (!this.isCurrent(session)) return;
        if (!outcome.ok) {
            console.warn(`[SignAnalyzerPlugin] Extraction failed for frame ${frameTimeMs}: ${outcome.reason}`);
        }

        const hands = outcome.hands;
        session.pushHands(hands);

        let topClass: number | null = null;
        if (hands.length === 0) {
            this.noHandFrames++;
        } else {
            this.state = 'CLASSIFYING';
            try {
                topClass = await classifyWindow(this.classifier, session.window.toTensor());
            } catch (error) {
                if (!this.isCurrent(session)) return;
                this.reportClassifierFailure(frameTimeMs, error);
            }
            if (!this.isCurrent(session)) return;
            if (topClass !== null) {
                console.debug(`[SignAnalyzerPlugin] Prediction from frame ${frameTimeMs} is ${topClass}`);
                this.applyPrediction(session, topClass, frameTimeMs);
            }
        }

        this.publish(session, hands.length, topClass, frameTimeMs);
    }

    private applyPrediction(session: AnalysisSession, topClass: number, frameTimeMs: number): void {
        const update = session.recordPrediction(topClass);
        if (update.kind === 'recognized') {
            this.eventBus?.publish('SIGN_RECOGNIZED', {
                label: update.label,
                classIndex: update.classIndex,
                frameTimeMs,
            });
        } else if (update.kind === 'unknown-class') {
            console.warn(`[SignAnalyzerPlugin] Stable class ${update.classIndex} has no vocabulary label; keeping output.`);
        }
    }

    private reportClassifierFailure(frameTimeMs: number, error: unknown): void {
        this.classifierFailures++;
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[SignAnalyzerPlugin] Classifier failed on frame ${frameTimeMs}; prediction skipped.`, error);
        this.eventBus?.publish('CLASSIFIER_FAILED', { frameTimeMs, message });
    }

    private publish(session: AnalysisSession, handsDetected: number, topClass: number | null, frameTimeMs: number): void {
        const bus = this.eventBus;
        if (!bus) return;

        this.state = 'PUBLISHING';
        this.framesAnalyzed++;
        try {
            bus.publish('TEXT_OUTPUT', {
                text: session.text,
                transcript: session.transcript.getEntries(),
                frameTimeMs,
            });
            bus.publish('FRAME_ANALYZED', {
                frameTimeMs,
                handsDetected,
                topClass,
                framesPerSecond: session.frameRate.framesPerSecond,
            });
        } finally {
            this.state = 'IDLE';
        }
    }

    private isCurrent(session: AnalysisSession): boolean {
        if (this.session === session) return true;
        this.state = 'IDLE';
        return false;
    }
}
