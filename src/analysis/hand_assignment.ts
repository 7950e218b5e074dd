import type { HandObservation } from '../kernel/hand_types';

/** Indices into the frame's observation list; `null` means the side is absent. */
export interface HandAssignment {
    left: number | null;
    right: number | null;
}

/**
 * Likelihood that an observation is the left hand: the confidence itself when
 * labelled "Left", its complement when labelled "Right".
 */
export function leftLikelihood(hand: HandObservation): number {
    return hand.handedness === 'Left' ? hand.confidence : 1 - hand.confidence;
}

/**
 * Decides which observation fills the left slot and which the right.
 *
 * With two hands the labels alone are not trusted (the extractor often reports
 * both as the same side); the hand with the higher left-likelihood becomes
 * left and the other becomes right. On an exact tie the first observation
 * wins the left slot. Never throws.
 */
export function assignHands(hands: readonly HandObservation[]): HandAssignment {
    if (hands.length === 0) {
        return { left: null, right: null };
    }

    if (hands.length === 1) {
        return hands[0].handedness === 'Left'
            ? { left: 0, right: null }
            : { left: null, right: 0 };
    }

    const first = leftLikelihood(hands[0]);
    const second = leftLikelihood(hands[1]);
    return second > first ? { left: 1, right: 0 } : { left: 0, right: 1 };
}
