import { readFile } from 'fs/promises';
import * as path from 'path';
import type { AnalyzerConfig } from '../kernel/config';
import { COORDS_PER_FRAME } from '../kernel/config';
import { NormalizationRowSchema, VocabularyEntrySchema } from '../kernel/schemas';
import type { NormalizationTable } from '../analysis/coordinate_window';

export type Vocabulary = ReadonlyMap<number, string>;

export interface AnalyzerResources {
    vocabulary: Vocabulary;
    normalization: NormalizationTable;
}

/** Supplies static text resources by name. */
export interface ResourceLoader {
    readText(name: string): Promise<string>;
}

export class ResourceLoadError extends Error {
    constructor(public readonly resource: string, detail: string) {
        super(`[ResourceLoader] Failed to load '${resource}': ${detail}`);
        this.name = 'ResourceLoadError';
    }
}

export class FileResourceLoader implements ResourceLoader {
    constructor(private readonly baseDir: string) {}

    public async readText(name: string): Promise<string> {
        return readFile(path.join(this.baseDir, name), 'utf-8');
    }
}

function contentLines(text: string): string[] {
    return text.split(/\r?\n/).filter(line => line.trim().length > 0);
}

/**
 * Parses `index,label` lines. Everything after the first comma is the label,
 * so labels may themselves contain commas.
 */
export function parseVocabulary(text: string, resource = 'vocabulary'): Vocabulary {
    const vocabulary = new Map<number, string>();

    contentLines(text).forEach((line, lineIdx) => {
        const comma = line.indexOf(',');
        if (comma < 0) {
            throw new ResourceLoadError(resource, `line ${lineIdx + 1} has no comma: "${line}"`);
        }
        const parsed = VocabularyEntrySchema.safeParse({
            index: line.slice(0, comma),
            label: line.slice(comma + 1),
        });
        if (!parsed.success) {
            throw new ResourceLoadError(resource, `line ${lineIdx + 1}: ${parsed.error.issues[0].message}`);
        }
        const { index, label } = parsed.data;
        if (vocabulary.has(index)) {
            throw new ResourceLoadError(resource, `duplicate class index ${index} on line ${lineIdx + 1}`);
        }
        vocabulary.set(index, label);
    });

    if (vocabulary.size === 0) {
        throw new ResourceLoadError(resource, 'no vocabulary entries');
    }
    return vocabulary;
}

/**
 * Parses the two-line stats file: means on the first line, scales on the
 * second, each with `expectedLength` comma-separated floats.
 */
export function parseNormalizationStats(
    text: string,
    resource = 'normalization stats',
    expectedLength = COORDS_PER_FRAME
): NormalizationTable {
    const lines = contentLines(text);
    if (lines.length !== 2) {
        throw new ResourceLoadError(resource, `expected 2 lines (means, scales), found ${lines.length}`);
    }

    const [means, scales] = lines.map((line, lineIdx) => {
        const parsed = NormalizationRowSchema.safeParse(line.split(','));
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new ResourceLoadError(resource, `line ${lineIdx + 1}, column ${Number(issue.path[0]) + 1}: ${issue.message}`);
        }
        if (parsed.data.length !== expectedLength) {
            throw new ResourceLoadError(resource, `line ${lineIdx + 1} has ${parsed.data.length} values, expected ${expectedLength}`);
        }
        return Float32Array.from(parsed.data);
    });

    const zeroScale = scales.findIndex(scale => scale === 0);
    if (zeroScale >= 0) {
        throw new ResourceLoadError(resource, `scale at column ${zeroScale + 1} is zero`);
    }
    return { means, scales };
}

/** Loads both tables. Any failure is fatal to analyzer construction. */
export async function loadAnalyzerResources(
    loader: ResourceLoader,
    config: AnalyzerConfig
): Promise<AnalyzerResources> {
    const vocabulary = parseVocabulary(
        await readResource(loader, config.vocabularyResource),
        config.vocabularyResource
    );
    const normalization = parseNormalizationStats(
        await readResource(loader, config.normStatsResource),
        config.normStatsResource
    );
    console.log(`[ResourceLoader] Read vocab file, we have ${vocabulary.size} signs`);
    return { vocabulary, normalization };
}

async function readResource(loader: ResourceLoader, name: string): Promise<string> {
    try {
        return await loader.readText(name);
    } catch (error) {
        throw new ResourceLoadError(name, error instanceof Error ? error.message : String(error));
    }
}
