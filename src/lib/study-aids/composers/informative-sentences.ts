import { splitSentences } from "../chunker";
import { tidy, uniqueInOrder } from "../heuristics/shared";

const SENTENCE_LENGTH = { min: 30, max: 300 };

/** Stems that mark a sentence as carrying study-relevant content */
const DOMAIN_KEYWORD =
    /\b(?:important|key|main|concept|principle|process|method|result|because|therefore|defin|example|significan|essential|primary|theor|function|structure|system|factor|cause|effect|role|type|law|rule)\w*/gi;

export function scoreSentence(sentence: string): number {
    return sentence.match(DOMAIN_KEYWORD)?.length ?? 0;
}

/**
 * Pick the `count` distinct sentences with the most domain keyword hits, best
 * first; equal scores keep document order.
 */
export function selectInformativeSentences(text: string, count: number): string[] {
    // Overlapping chunks repeat sentences in the selected content
    return uniqueInOrder(splitSentences(text).map(tidy))
        .filter((sentence) => sentence.length >= SENTENCE_LENGTH.min && sentence.length <= SENTENCE_LENGTH.max)
        .map((sentence, index) => ({ sentence, index, score: scoreSentence(sentence) }))
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, Math.max(0, count))
        .map(({ sentence }) => sentence);
}
