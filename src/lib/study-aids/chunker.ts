/**
 * Study Aids — Chunker
 *
 * Splits cleaned text into bounded, overlapping segments. Sentence
 * boundaries are preferred; unpunctuated text falls back to fixed word
 * windows.
 */

import { DEFAULT_CONFIG } from "./config";
import { countWords } from "./normalize";

/** Sentences carried from a closed chunk into the next one */
const OVERLAP_SENTENCES = 2;

// Each match keeps its trailing whitespace so that joining matches
// reproduces the source exactly.
const SENTENCE_PATTERN = /[^.!?]*[.!?]+["')\]]*\s*|[^.!?]+$/g;
const WORD_CHARACTER = /[\p{L}\p{N}]/u;

/** Split text into sentences; concatenating the result yields the input */
export function splitSentences(text: string): string[] {
    return text.match(SENTENCE_PATTERN) ?? [];
}

/**
 * Split `text` into chunks of at most `size` words, carrying an overlap of
 * up to `overlap` words between consecutive chunks.
 *
 * A sentence longer than `size` words is cut into word windows. Chunks
 * shorter than `minChunkChars` characters are dropped unless every chunk is.
 *
 * @throws RangeError when `size < 1` or `overlap` is not in `[0, size)`
 */
export function chunkText(
    text: string,
    size: number = DEFAULT_CONFIG.chunkSize,
    overlap: number = DEFAULT_CONFIG.overlap,
    minChunkChars: number = DEFAULT_CONFIG.minChunkChars
): string[] {
    if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`Chunk size must be a positive integer (got ${size})`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
        throw new RangeError(`Overlap must be an integer in [0, ${size}) (got ${overlap})`);
    }

    const trimmed = text.trim();
    if (!trimmed) {
        return [];
    }

    const sentences = splitSentences(trimmed);
    const chunks = sentences.some((sentence) => WORD_CHARACTER.test(sentence))
        ? chunkBySentences(sentences, size, overlap)
        : chunkByWords(trimmed, size, overlap);

    const kept = chunks.filter((chunk) => chunk.length >= minChunkChars);
    return kept.length > 0 ? kept : chunks;
}

function chunkBySentences(sentences: string[], size: number, overlap: number): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let currentWords = 0;
    // Set while `current` only holds words carried over from a word window
    let carriedOnly = false;

    for (const sentence of sentences) {
        const words = countWords(sentence);

        if (words > size) {
            // An unpunctuated run longer than a chunk is windowed by words,
            // led and followed by the usual overlap
            const lead = lastWords(current.join(""), overlap);
            if (current.length > 0 && !carriedOnly) {
                chunks.push(current.join("").trim());
            }

            const windows = chunkByWords([...lead, sentence.trim()].join(" "), size, overlap);
            chunks.push(...windows);

            const tail = lastWords(windows[windows.length - 1], overlap);
            current = tail.length > 0 ? [`${tail.join(" ")} `] : [];
            currentWords = tail.length;
            carriedOnly = true;
            continue;
        }

        if (current.length > 0 && currentWords + words > size) {
            if (!carriedOnly) {
                chunks.push(current.join("").trim());
            }

            let seed = current.slice(-OVERLAP_SENTENCES);
            let seedWords = seed.reduce((total, item) => total + countWords(item), 0);
            while (seed.length > 0 && (seedWords > overlap || seedWords + words > size)) {
                seedWords -= countWords(seed[0]);
                seed = seed.slice(1);
            }

            current = seed;
            currentWords = seedWords;
        }

        current.push(sentence);
        currentWords += words;
        carriedOnly = false;
    }

    if (current.length > 0 && !carriedOnly) {
        chunks.push(current.join("").trim());
    }

    return chunks;
}

function lastWords(text: string, count: number): string[] {
    if (count <= 0) {
        return [];
    }
    return text.split(/\s+/).filter(Boolean).slice(-count);
}

function chunkByWords(text: string, size: number, overlap: number): string[] {
    const words = text.split(/\s+/);
    const step = size - overlap;
    const chunks: string[] = [];

    for (let start = 0; start < words.length; start += step) {
        chunks.push(words.slice(start, start + size).join(" "));
        if (start + size >= words.length) {
            break;
        }
    }

    return chunks;
}

/**
 * Concatenate chunks in order, separated by a blank line, without passing
 * `maxChars`. A first chunk longer than the budget is cut at a word boundary.
 */
export function selectContent(chunks: string[], maxChars: number = DEFAULT_CONFIG.maxChars): string {
    let selected = "";

    for (const chunk of chunks) {
        const next = selected ? `${selected}\n\n${chunk}` : chunk;
        if (next.length > maxChars) {
            if (!selected) {
                selected = truncateAtWord(chunk, maxChars);
            }
            break;
        }
        selected = next;
    }

    return selected;
}

function truncateAtWord(text: string, maxChars: number): string {
    if (text.length <= maxChars) {
        return text;
    }

    const cut = text.slice(0, maxChars);
    if (/\s/.test(text.charAt(maxChars))) {
        return cut.trimEnd();
    }

    const lastBreak = cut.search(/\s\S*$/);
    return (lastBreak > 0 ? cut.slice(0, lastBreak) : cut).trimEnd();
}
