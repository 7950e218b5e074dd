import type { Category, HandLandmarkerResult, Landmark as MediaPipeLandmark } from '@mediapipe/tasks-vision';
import type { HandObservation, StillImage } from '../kernel/hand_types';
import { HandsResultSchema } from '../kernel/schemas';

/**
 * Hand-pose capability. Given an upright still image and a monotonic
 * timestamp, resolves with 0–2 hands of 21 landmarks each.
 */
export interface LandmarkExtractor {
    init(): Promise<void> | void;
    detect(image: StillImage, timestampMs: number): Promise<HandObservation[]>;
    close(): Promise<void> | void;
}

export type ExtractionOutcome =
    | { ok: true; hands: HandObservation[] }
    | { ok: false; hands: []; reason: string };

/**
 * Calls the extractor and validates what comes back. Rejections and invalid
 * payloads become a zero-hand outcome carrying the reason; extraction never
 * fails a frame.
 */
export async function extractHands(
    extractor: LandmarkExtractor,
    image: StillImage,
    timestampMs: number
): Promise<ExtractionOutcome> {
    let raw: unknown;
    try {
        raw = await extractor.detect(image, timestampMs);
    } catch (error) {
        return { ok: false, hands: [], reason: error instanceof Error ? error.message : String(error) };
    }

    const parsed = HandsResultSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return {
            ok: false,
            hands: [],
            reason: `invalid extractor payload at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
        };
    }
    return { ok: true, hands: parsed.data };
}

// ── MediaPipe Tasks adapter ───────────────────────────────────────────────────

export type HandLandmarkerHands = Pick<HandLandmarkerResult, 'worldLandmarks' | 'handedness'>;

/**
 * Converts a HandLandmarker result into observations. World landmarks are
 * used (metric, wrist-relative), matching the space the classifier was
 * trained on. Hands whose top handedness category is neither "Left" nor
 * "Right" are dropped.
 */
export function landmarkerResultToObservations(result: HandLandmarkerHands): HandObservation[] {
    const observations: HandObservation[] = [];

    result.worldLandmarks.forEach((hand: MediaPipeLandmark[], idx: number) => {
        const category: Category | undefined = result.handedness[idx]?.[0];
        const label = category?.categoryName;
        if (label !== 'Left' && label !== 'Right') return;

        observations.push({
            landmarks: hand.map(lm => ({ x: lm.x, y: lm.y, z: lm.z })),
            handedness: label,
            confidence: category?.score ?? 0,
        });
    });

    return observations;
}
