import { DEFAULT_LIMITS } from "../config";
import { finalize } from "./shared";

const TERM_LENGTH = { min: 4, max: 60 };

const CAPITALIZED_PHRASE = /\b[A-Z][a-z]+(?: [A-Z][a-z]+)+\b/g;

/** Words that open a sentence rather than a name */
const LEADING_STOPWORDS = new Set([
    "The", "A", "An", "This", "That", "These", "Those", "It", "Its", "In", "On", "At", "For",
    "And", "But", "Or", "If", "When", "Where", "What", "Which", "Who", "How", "Why", "There",
    "Here", "Such", "Each", "Some", "Many", "Most", "Our", "Their",
]);

/**
 * Capitalized multi-word phrases ("Calvin Cycle", "Electron Transport
 * Chain") used as question subjects.
 */
export function extractTopicTerms(text: string, cap: number = DEFAULT_LIMITS.topicTerms): string[] {
    if (!text) {
        return [];
    }

    const phrases: string[] = [];
    for (const match of text.matchAll(CAPITALIZED_PHRASE)) {
        const words = match[0].split(" ");
        while (words.length > 0 && LEADING_STOPWORDS.has(words[0])) {
            words.shift();
        }
        if (words.length >= 2) {
            phrases.push(words.join(" "));
        }
    }

    return finalize(phrases, TERM_LENGTH, cap);
}
