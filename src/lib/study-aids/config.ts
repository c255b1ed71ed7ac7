/**
 * Study Aids — Configuration
 *
 * Tunables of the pipeline. Every option has a default; callers pass
 * partial overrides which are merged and validated once.
 */

import { ConfigurationError } from "./errors";
import type { ExtractorLimits } from "./types";

export interface StudyAidConfig {
    /** Target chunk size in words */
    chunkSize: number;
    /** Words carried over between consecutive chunks */
    overlap: number;
    /** Maximum characters of selected content handed to the composers */
    maxChars: number;
    /** Content shorter than this (in characters) is not analysed */
    minContentLength: number;
    /** Pages with this many characters or fewer are treated as image-only */
    minPageChars: number;
    /** Chunks shorter than this (in characters) are discarded */
    minChunkChars: number;
    limits: ExtractorLimits;
}

export type StudyAidConfigOverrides = Partial<Omit<StudyAidConfig, "limits">> & {
    limits?: Partial<ExtractorLimits>;
};

export const DEFAULT_LIMITS: ExtractorLimits = {
    topics: 8,
    keyPoints: 10,
    examples: 5,
    definitions: 3,
    numericData: 3,
    topicTerms: 7,
    questions: 8,
    minQuestions: 5,
    informativeSentences: 5,
};

export const DEFAULT_CONFIG: StudyAidConfig = {
    chunkSize: 1000,
    overlap: 200,
    maxChars: 8000,
    minContentLength: 100,
    minPageChars: 50,
    minChunkChars: 100,
    limits: DEFAULT_LIMITS,
};

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigurationError when a value is out of range
 */
export function resolveConfig(overrides: StudyAidConfigOverrides = {}): StudyAidConfig {
    const limits = overrides.limits ?? {};
    const config: StudyAidConfig = {
        chunkSize: overrides.chunkSize ?? DEFAULT_CONFIG.chunkSize,
        overlap: overrides.overlap ?? DEFAULT_CONFIG.overlap,
        maxChars: overrides.maxChars ?? DEFAULT_CONFIG.maxChars,
        minContentLength: overrides.minContentLength ?? DEFAULT_CONFIG.minContentLength,
        minPageChars: overrides.minPageChars ?? DEFAULT_CONFIG.minPageChars,
        minChunkChars: overrides.minChunkChars ?? DEFAULT_CONFIG.minChunkChars,
        limits: {
            topics: limits.topics ?? DEFAULT_LIMITS.topics,
            keyPoints: limits.keyPoints ?? DEFAULT_LIMITS.keyPoints,
            examples: limits.examples ?? DEFAULT_LIMITS.examples,
            definitions: limits.definitions ?? DEFAULT_LIMITS.definitions,
            numericData: limits.numericData ?? DEFAULT_LIMITS.numericData,
            topicTerms: limits.topicTerms ?? DEFAULT_LIMITS.topicTerms,
            questions: limits.questions ?? DEFAULT_LIMITS.questions,
            minQuestions: limits.minQuestions ?? DEFAULT_LIMITS.minQuestions,
            informativeSentences: limits.informativeSentences ?? DEFAULT_LIMITS.informativeSentences,
        },
    };

    requirePositiveInteger("chunkSize", config.chunkSize);
    requireNonNegativeInteger("overlap", config.overlap);
    if (config.overlap >= config.chunkSize) {
        throw new ConfigurationError(
            `overlap (${config.overlap}) must be smaller than chunkSize (${config.chunkSize})`
        );
    }
    requirePositiveInteger("maxChars", config.maxChars);
    requireNonNegativeInteger("minContentLength", config.minContentLength);
    requireNonNegativeInteger("minPageChars", config.minPageChars);
    requireNonNegativeInteger("minChunkChars", config.minChunkChars);

    for (const [name, value] of Object.entries(config.limits)) {
        requireNonNegativeInteger(`limits.${name}`, value);
    }
    if (config.limits.minQuestions > config.limits.questions) {
        throw new ConfigurationError(
            `limits.minQuestions (${config.limits.minQuestions}) cannot exceed limits.questions (${config.limits.questions})`
        );
    }

    return config;
}

function requirePositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
    }
}

function requireNonNegativeInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative integer (got ${value})`);
    }
}
