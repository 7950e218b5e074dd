import { z } from 'zod';

// ── Fixed geometry ────────────────────────────────────────────────────────────
// The classifier was trained on this layout; none of it is configurable.

export const AXES = 3;
export const LANDMARKS_PER_HAND = 21;
export const HANDS = 2;
/** Coordinates contributed by one frame: 3 axes × 21 landmarks × 2 hands. */
export const COORDS_PER_FRAME = AXES * LANDMARKS_PER_HAND * HANDS;
/** Coordinate slots per axis in the tensor's last dimension (21 × 2). */
export const SLOTS_PER_AXIS = LANDMARKS_PER_HAND * HANDS;

// ── Tunables ──────────────────────────────────────────────────────────────────

export const AnalyzerConfigSchema = z.object({
    /** Frames in the temporal window fed to the classifier. */
    framesPerSign: z.number().int().positive().default(7),
    /** Consecutive agreeing per-frame predictions required before a label is shown. */
    concurrentPredsRequired: z.number().int().positive().default(4),
    /** Timestamps kept for the moving-average frame rate. */
    frameRateWindow: z.number().int().min(2).default(8),
    /** Distinct recognized signs remembered in the transcript. */
    transcriptLength: z.number().int().positive().default(6),
    /** Reserved "no sign" class, never displayed. */
    backgroundClassIndex: z.number().int().nonnegative().default(0),
    vocabularyResource: z.string().min(1).default('sign_vocab.csv'),
    normStatsResource: z.string().min(1).default('sign_norm_stats.csv'),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;

export class ConfigError extends Error {
    public readonly issues: z.ZodIssue[];

    constructor(issues: z.ZodIssue[]) {
        super(
            `[Config] INVALID ANALYZER CONFIG: ` +
            issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ')
        );
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

export function resolveAnalyzerConfig(overrides: AnalyzerConfigInput = {}): AnalyzerConfig {
    const parsed = AnalyzerConfigSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues);
    }
    return parsed.data;
}

const EnvSchema = z.object({
    SIGN_FRAMES_PER_SIGN: z.coerce.number().optional(),
    SIGN_CONCURRENT_PREDS: z.coerce.number().optional(),
    SIGN_FRAME_RATE_WINDOW: z.coerce.number().optional(),
    SIGN_TRANSCRIPT_LENGTH: z.coerce.number().optional(),
    SIGN_RESOURCE_VOCAB: z.string().optional(),
    SIGN_RESOURCE_NORM_STATS: z.string().optional(),
});

/**
 * Reads analyzer tunables from environment variables. Unset variables fall
 * back to the schema defaults.
 */
export function analyzerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues);
    }
    const vars = parsed.data;
    return resolveAnalyzerConfig({
        framesPerSign: vars.SIGN_FRAMES_PER_SIGN,
        concurrentPredsRequired: vars.SIGN_CONCURRENT_PREDS,
        frameRateWindow: vars.SIGN_FRAME_RATE_WINDOW,
        transcriptLength: vars.SIGN_TRANSCRIPT_LENGTH,
        vocabularyResource: vars.SIGN_RESOURCE_VOCAB,
        normStatsResource: vars.SIGN_RESOURCE_NORM_STATS,
    });
}
