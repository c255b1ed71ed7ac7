/**
 * Study Aids — Text Cleaner
 *
 * Turns the noisy text layer of a PDF into line-preserving prose: page
 * numbers, running "Page N" headers and stray fragments are removed so
 * the heuristics downstream only see substantial lines.
 */

/** Lines this long or shorter are dropped unless they end a sentence */
export const MIN_LINE_LENGTH = 10;

const PAGE_NUMBER_LINE = /^\s*\d+\s*$/;
const PAGE_HEADER_LINE = /^\s*page\s+\d+(?:\s*(?:of|\/)\s*\d+)?\s*$/i;
const SENTENCE_TERMINAL = /[.!?]/;

/**
 * Clean a raw text string:
 * 1. Remove null bytes / form-feeds, unify line endings, map non-breaking
 *    and zero-width characters to a plain space
 * 2. Collapse horizontal whitespace runs and trim each line
 * 3. Drop page-number-only and "Page N" lines
 * 4. Drop lines of up to ten characters without sentence-terminal punctuation
 * 5. Collapse runs of blank lines into a single blank line
 *
 * Idempotent: cleaning cleaned text returns it unchanged.
 */
export function cleanText(raw: string): string {
    if (!raw) {
        return "";
    }

    const lines = raw
        .replace(/[\x00\x0C]/g, "")
        .replace(/\r\n?/g, "\n")
        .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ")
        .replace(/[ \t\v]+/g, " ")
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => isSubstantialLine(line));

    return lines
        .join("\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

/** Empty lines are kept as paragraph separators */
function isSubstantialLine(line: string): boolean {
    if (line.length === 0) {
        return true;
    }
    if (PAGE_NUMBER_LINE.test(line) || PAGE_HEADER_LINE.test(line)) {
        return false;
    }
    return line.length > MIN_LINE_LENGTH || SENTENCE_TERMINAL.test(line);
}

/** Count whitespace-separated words */
export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}
