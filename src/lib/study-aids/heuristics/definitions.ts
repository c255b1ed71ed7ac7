import { DEFAULT_LIMITS } from "../config";
import type { Definition } from "../types";
import { tidy, uniqueInOrder } from "./shared";

const TERM_LENGTH = { min: 2, max: 49 };
const DEFINITION_LENGTH = { min: 10, max: 199 };

const COPULA_DEFINITION =
    /\b([A-Z][\w-]*(?:[ \t]+[\w-]+){0,3}?)[ \t]+(?:is|are)[ \t]+((?:a|an|the)[ \t]+[^\n.!?]+|defined as[ \t]+[^\n.!?]+)/g;
const VERB_DEFINITION = /\b([A-Z][\w-]*(?:[ \t]+[\w-]+){0,3}?)[ \t]+(?:means|refers to)[ \t]+([^\n.!?]+)/g;
const COLON_DEFINITION = /^([A-Z][\w ()-]{1,48}?)[ \t]*:[ \t]+([^\n]+)$/gm;

/** Subjects that never name a concept */
const PRONOUN_TERMS = new Set(["it", "this", "that", "these", "those", "they", "there", "he", "she", "we", "you"]);
/** Colon labels handled by other extractors or carrying no definition */
const LABEL_TERMS = /^(?:key(?: points?)?|important|note|remember|examples?|for example|page|figure|table|(?:chapter|section|unit|lesson|module|part) \d+)$/i;

/**
 * Term/definition pairs: "X is a …", "X is defined as …", "X means …",
 * "X refers to …" and "Term: definition" lines.
 */
export function extractDefinitions(text: string, cap: number = DEFAULT_LIMITS.definitions): Definition[] {
    if (!text) {
        return [];
    }

    const candidates: Definition[] = [];
    for (const pattern of [COPULA_DEFINITION, VERB_DEFINITION, COLON_DEFINITION]) {
        for (const match of text.matchAll(pattern)) {
            const term = tidy(match[1] ?? "").replace(/^(?:The|A|An)\s+/, "");
            const definition = tidy(match[2] ?? "");
            if (isDefinition(term, definition)) {
                candidates.push({ term, definition });
            }
        }
    }

    return uniqueInOrder(candidates, (item) => item.term.toLowerCase()).slice(0, Math.max(0, cap));
}

function isDefinition(term: string, definition: string): boolean {
    return (
        term.length >= TERM_LENGTH.min &&
        term.length <= TERM_LENGTH.max &&
        definition.length >= DEFINITION_LENGTH.min &&
        definition.length <= DEFINITION_LENGTH.max &&
        !PRONOUN_TERMS.has(term.toLowerCase()) &&
        !LABEL_TERMS.test(term)
    );
}
