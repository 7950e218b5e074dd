import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { buildFrameContribution, CoordinateWindow, NormalizationTable } from '../../src/analysis/coordinate_window';
import { COORDS_PER_FRAME } from '../../src/kernel/config';
import { identityNormalization, makeHand } from '../helpers/fakes';

// Offsets into one frame: [leftX, rightX, leftY, rightY, leftZ, rightZ] × 21
const LEFT_X = 0;
const RIGHT_X = 21;
const LEFT_Y = 42;
const RIGHT_Y = 63;
const LEFT_Z = 84;
const RIGHT_Z = 105;

function frameOf(value: number): Float32Array {
    return new Float32Array(COORDS_PER_FRAME).fill(value);
}

describe('buildFrameContribution', () => {
    it('leaves a raw landmark unchanged under mean=0, scale=1', () => {
        const hand = makeHand('Left', 1, () => ({ x: 0.5, y: -0.3, z: 0.1 }));
        const frame = buildFrameContribution(hand, null, identityNormalization());
        expect(frame[LEFT_X]).toBeCloseTo(0.5, 6);
        expect(frame[LEFT_Y]).toBeCloseTo(-0.3, 6);
        expect(frame[LEFT_Z]).toBeCloseTo(0.1, 6);
    });

    it('groups axes before hands and zero-fills an absent hand', () => {
        const left = makeHand('Left', 1, idx => ({ x: idx, y: 100 + idx, z: 200 + idx }));
        const frame = buildFrameContribution(left, null, identityNormalization());

        expect(frame[LEFT_X + 20]).toBe(20);
        expect(frame[LEFT_Y + 3]).toBe(103);
        expect(frame[LEFT_Z + 7]).toBe(207);
        expect(Array.from(frame.subarray(RIGHT_X, RIGHT_X + 21)).every(v => v === 0)).toBe(true);
        expect(Array.from(frame.subarray(RIGHT_Y, RIGHT_Y + 21)).every(v => v === 0)).toBe(true);
        expect(Array.from(frame.subarray(RIGHT_Z, RIGHT_Z + 21)).every(v => v === 0)).toBe(true);
    });

    it('places the right hand after the left within each axis', () => {
        const right = makeHand('Right', 1, idx => ({ x: idx, y: 2 * idx, z: 3 * idx }));
        const frame = buildFrameContribution(null, right, identityNormalization());
        expect(frame[RIGHT_X + 4]).toBe(4);
        expect(frame[RIGHT_Y + 4]).toBe(8);
        expect(frame[RIGHT_Z + 4]).toBe(12);
        expect(frame[LEFT_X + 4]).toBe(0);
    });

    it('normalizes with the hand-independent entry at landmark * 3 + axis', () => {
        const table: NormalizationTable = identityNormalization();
        // landmark 2: x stat at 6, y at 7, z at 8
        table.means[6] = 1;
        table.scales[6] = 2;
        table.means[7] = -1;
        table.scales[7] = 4;
        table.scales[8] = 0.5;

        const hand = () => makeHand('Left', 1, () => ({ x: 5, y: 3, z: 1 }));
        const frame = buildFrameContribution(hand(), hand(), table);

        expect(frame[LEFT_X + 2]).toBe(2);   // (5 - 1) / 2
        expect(frame[RIGHT_X + 2]).toBe(2);
        expect(frame[LEFT_Y + 2]).toBe(1);   // (3 + 1) / 4
        expect(frame[RIGHT_Y + 2]).toBe(1);
        expect(frame[LEFT_Z + 2]).toBe(2);   // (1 - 0) / 0.5
        expect(frame[LEFT_X + 3]).toBe(5);   // identity entries elsewhere
    });
});

describe('CoordinateWindow', () => {
    it('starts zero-filled at framesPerSign × 126 values', () => {
        const window = new CoordinateWindow(7);
        expect(window.length).toBe(7 * 126);
        expect(window.toTensor().data.every(v => v === 0)).toBe(true);
        expect(window.isFilled).toBe(false);
    });

    it('reports the classifier tensor shape', () => {
        expect(new CoordinateWindow(7).toTensor().dims).toEqual([1, 1, 7, 3, 42]);
    });

    it('appends the newest frame at the end and evicts the oldest from the front', () => {
        const window = new CoordinateWindow(3);
        window.push(frameOf(1));
        window.push(frameOf(2));
        window.push(frameOf(3));
        window.push(frameOf(4));

        const data = window.toTensor().data;
        expect(data[0]).toBe(2);
        expect(data[COORDS_PER_FRAME]).toBe(3);
        expect(data[2 * COORDS_PER_FRAME]).toBe(4);
        expect(data[data.length - 1]).toBe(4);
        expect(window.isFilled).toBe(true);
    });

    it('keeps zero frames ahead of real ones until the window fills', () => {
        const window = new CoordinateWindow(3);
        window.push(frameOf(9));
        const data = window.toTensor().data;
        expect(data[0]).toBe(0);
        expect(data[COORDS_PER_FRAME]).toBe(0);
        expect(data[2 * COORDS_PER_FRAME]).toBe(9);
    });

    it('hands out copies, never its own buffer', () => {
        const window = new CoordinateWindow(2);
        window.push(frameOf(1));
        const tensor = window.toTensor();
        tensor.data.fill(42);
        window.latestFrame().fill(42);
        expect(window.latestFrame()[0]).toBe(1);
    });

    it('rejects a frame of the wrong size', () => {
        expect(() => new CoordinateWindow(2).push(new Float32Array(10))).toThrow(/expected 126/);
    });

    it('keeps exactly framesPerSign frames and the last pushed frame at the tail, for any push sequence', () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 1, max: 10 }),
                fc.array(fc.integer({ min: -1000, max: 1000 }), { minLength: 1, maxLength: 30 }),
                (framesPerSign, values) => {
                    const window = new CoordinateWindow(framesPerSign);
                    values.forEach(v => window.push(frameOf(v)));
                    const data = window.toTensor().data;
                    const expectedFront = values.length >= framesPerSign ? values[values.length - framesPerSign] : 0;
                    return data.length === framesPerSign * COORDS_PER_FRAME
                        && window.latestFrame()[0] === values[values.length - 1]
                        && data[0] === expectedFront;
                }
            )
        );
    });
});
