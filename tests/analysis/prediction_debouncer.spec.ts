import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { PredictionDebouncer } from '../../src/analysis/prediction_debouncer';

describe('PredictionDebouncer', () => {
    it('has no stable prediction while empty', () => {
        expect(new PredictionDebouncer(4).stablePrediction()).toBeNull();
    });

    it('has no stable prediction until the history is full', () => {
        const debouncer = new PredictionDebouncer(4);
        [3, 3, 3].forEach(idx => debouncer.push(idx));
        expect(debouncer.stablePrediction()).toBeNull();
        debouncer.push(3);
        expect(debouncer.stablePrediction()).toBe(3);
    });

    it('loses stability on a single disagreeing entry', () => {
        const debouncer = new PredictionDebouncer(3);
        [2, 2, 5].forEach(idx => debouncer.push(idx));
        expect(debouncer.stablePrediction()).toBeNull();
    });

    it('evicts the oldest entry first', () => {
        const debouncer = new PredictionDebouncer(3);
        [1, 2, 3, 4].forEach(idx => debouncer.push(idx));
        expect(debouncer.getHistory()).toEqual([2, 3, 4]);
    });

    it('regains stability once the disagreeing entry has been evicted', () => {
        const debouncer = new PredictionDebouncer(2);
        [7, 1, 1].forEach(idx => debouncer.push(idx));
        expect(debouncer.stablePrediction()).toBe(1);
    });

    it('reports the background class like any other; suppression happens downstream', () => {
        const debouncer = new PredictionDebouncer(2);
        [0, 0].forEach(idx => debouncer.push(idx));
        expect(debouncer.stablePrediction()).toBe(0);
    });

    it('clear() empties the history', () => {
        const debouncer = new PredictionDebouncer(1);
        debouncer.push(4);
        debouncer.clear();
        expect(debouncer.getHistory()).toEqual([]);
        expect(debouncer.stablePrediction()).toBeNull();
    });

    it('rejects a non-positive capacity', () => {
        expect(() => new PredictionDebouncer(0)).toThrow(/positive integer/);
    });

    it('never exceeds capacity and always holds the most recent entries', () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 1, max: 8 }),
                fc.array(fc.nat(10), { maxLength: 40 }),
                (capacity, pushes) => {
                    const debouncer = new PredictionDebouncer(capacity);
                    pushes.forEach(idx => debouncer.push(idx));
                    const history = debouncer.getHistory();
                    expect(history.length).toBeLessThanOrEqual(capacity);
                    expect(history).toEqual(pushes.slice(Math.max(0, pushes.length - capacity)));
                }
            )
        );
    });
});
