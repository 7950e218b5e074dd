import type { WindowTensor } from '../kernel/hand_types';

/**
 * Sequence classifier capability. Opaque: given the window tensor it returns
 * one score per vocabulary class. Initialized once, released on teardown.
 */
export interface Classifier {
    init(): Promise<void> | void;
    classify(input: WindowTensor): Promise<ArrayLike<number>>;
    close(): Promise<void> | void;
}

export class ClassifierError extends Error {
    constructor(message: string) {
        super(`[Classifier] ${message}`);
        this.name = 'ClassifierError';
    }
}

/**
 * Index of the highest score; the first occurrence wins ties. Returns -1 when
 * no score beats -Infinity (empty or all-NaN output).
 */
export function selectTopClass(scores: ArrayLike<number>): number {
    let maxScore = -Infinity;
    let maxIdx = -1;
    for (let idx = 0; idx < scores.length; idx++) {
        if (scores[idx] > maxScore) {
            maxScore = scores[idx];
            maxIdx = idx;
        }
    }
    return maxIdx;
}

/** Runs the classifier and reduces its output to a class index. */
export async function classifyWindow(classifier: Classifier, input: WindowTensor): Promise<number> {
    const scores = await classifier.classify(input);
    if (scores.length === 0) {
        throw new ClassifierError('classifier returned an empty score vector.');
    }
    const topClass = selectTopClass(scores);
    if (topClass < 0) {
        throw new ClassifierError(`classifier returned no comparable scores (${scores.length} values).`);
    }
    return topClass;
}
