import { z } from 'zod';
import { LANDMARKS_PER_HAND, HANDS } from './config';

// Runtime enforcement at the extractor boundary: the landmark capability is
// an opaque collaborator, so everything it hands back is checked before the
// window buffer sees it.

export const LandmarkSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    z: z.number().finite(),
});

export const HandObservationSchema = z.object({
    landmarks: z.array(LandmarkSchema).length(LANDMARKS_PER_HAND),
    handedness: z.enum(['Left', 'Right']),
    confidence: z.number().min(0).max(1),
});

export const HandsResultSchema = z.array(HandObservationSchema).max(HANDS);

// ── Static resources ─────────────────────────────────────────────────────────

export const VocabularyEntrySchema = z.object({
    index: z.string().trim().min(1).pipe(z.coerce.number().int().nonnegative()),
    label: z.string().trim().min(1),
});

export const NormalizationRowSchema = z.array(z.string().trim().min(1).pipe(z.coerce.number().finite()));
