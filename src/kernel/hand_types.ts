/**
 * @file hand_types.ts
 * @description Shared hand-tracking and frame payload types.
 *
 * This file has no infrastructure imports and is safe to import from any
 * layer without introducing cycles.
 */

// ── Landmark geometry ────────────────────────────────────────────────────────

/** Single (x, y, z) landmark in the extractor's hand-relative (world) space. */
export interface Landmark {
    x: number;
    y: number;
    z: number;
}

export type Handedness = 'Left' | 'Right';

/**
 * One detected hand for one frame. Produced fresh per frame by the landmark
 * extractor and discarded once the frame is processed.
 */
export interface HandObservation {
    /** Exactly 21 landmarks, in MediaPipe's anatomical order (0 = wrist). */
    landmarks: Landmark[];
    handedness: Handedness;
    /** Handedness confidence in [0, 1]. */
    confidence: number;
}

// ── Images ───────────────────────────────────────────────────────────────────

export type PixelFormat = 'RGBA_8888';

export type RotationDegrees = 0 | 90 | 180 | 270;

export interface FramePlane {
    buffer: Uint8Array;
    /** Bytes between the start of consecutive rows (may include padding). */
    rowStride: number;
    /** Bytes between consecutive pixels within a row. */
    pixelStride: number;
}

/**
 * A camera frame on loan from the frame source. It must be released with
 * `close()` as soon as its pixels are copied; upstream delivery stalls until
 * it is.
 */
export interface CameraFrame {
    width: number;
    height: number;
    format: PixelFormat;
    rotationDegrees: number;
    planes: FramePlane[];
    close(): void;
}

/** An upright, tightly packed RGBA image owned by the analyzer. */
export interface StillImage {
    width: number;
    height: number;
    data: Uint8ClampedArray;
}

// ── Classifier input ─────────────────────────────────────────────────────────

/** Dense float tensor of shape (1, 1, framesPerSign, 3, 42). */
export interface WindowTensor {
    data: Float32Array;
    dims: readonly number[];
}
