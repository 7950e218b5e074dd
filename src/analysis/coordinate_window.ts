import type { HandObservation, WindowTensor } from '../kernel/hand_types';
import { AXES, COORDS_PER_FRAME, LANDMARKS_PER_HAND, SLOTS_PER_AXIS } from '../kernel/config';

/**
 * Per-coordinate (mean, scale) statistics, indexed by `landmark * 3 + axis`.
 * The table is hand-independent: both slots share the same entries.
 */
export interface NormalizationTable {
    readonly means: Float32Array;
    readonly scales: Float32Array;
}

const LEFT_SLOT = 0;
const RIGHT_SLOT = 1;

/**
 * Flattens one frame into the classifier's layout, normalizing as it goes:
 *
 *   [leftX(21), rightX(21), leftY(21), rightY(21), leftZ(21), rightZ(21)]
 *
 * Axes are grouped before hands. An absent hand contributes zeros.
 */
export function buildFrameContribution(
    left: HandObservation | null,
    right: HandObservation | null,
    table: NormalizationTable
): Float32Array {
    const frame = new Float32Array(COORDS_PER_FRAME);
    writeHand(frame, left, LEFT_SLOT, table);
    writeHand(frame, right, RIGHT_SLOT, table);
    return frame;
}

function writeHand(
    frame: Float32Array,
    hand: HandObservation | null,
    slot: number,
    table: NormalizationTable
): void {
    if (!hand) return;

    hand.landmarks.forEach((landmark, idx) => {
        const raw = [landmark.x, landmark.y, landmark.z];
        for (let axis = 0; axis < AXES; axis++) {
            const statIdx = idx * AXES + axis;
            const offset = axis * SLOTS_PER_AXIS + slot * LANDMARKS_PER_HAND + idx;
            frame[offset] = (raw[axis] - table.means[statIdx]) / table.scales[statIdx];
        }
    });
}

/**
 * Fixed-length FIFO over the last `framesPerSign` frame contributions, stored
 * as one flat buffer. Zero-initialized, so the classifier sees zero frames
 * until the window has filled.
 *
 * Single-writer: only the owning analysis session calls `push`. Readers get
 * copies.
 */
export class CoordinateWindow {
    private readonly buffer: Float32Array;
    private framesPushed = 0;

    constructor(private readonly framesPerSign: number) {
        if (!Number.isInteger(framesPerSign) || framesPerSign < 1) {
            throw new Error(`CoordinateWindow: framesPerSign must be a positive integer, got ${framesPerSign}.`);
        }
        this.buffer = new Float32Array(framesPerSign * COORDS_PER_FRAME);
    }

    /** Drops the oldest frame and appends `frame` at the end. */
    public push(frame: Float32Array): void {
        if (frame.length !== COORDS_PER_FRAME) {
            throw new Error(`CoordinateWindow: expected ${COORDS_PER_FRAME} coordinates per frame, got ${frame.length}.`);
        }
        this.buffer.copyWithin(0, COORDS_PER_FRAME);
        this.buffer.set(frame, this.buffer.length - COORDS_PER_FRAME);
        this.framesPushed++;
    }

    public get length(): number {
        return this.buffer.length;
    }

    /** True once `framesPerSign` real frames have been pushed. */
    public get isFilled(): boolean {
        return this.framesPushed >= this.framesPerSign;
    }

    public latestFrame(): Float32Array {
        return this.buffer.slice(this.buffer.length - COORDS_PER_FRAME);
    }

    public toTensor(): WindowTensor {
        return {
            data: this.buffer.slice(),
            dims: [1, 1, this.framesPerSign, AXES, SLOTS_PER_AXIS],
        };
    }
}
