import { splitSentences } from "../chunker";
import { DEFAULT_LIMITS } from "../config";
import { collectMatches, finalize } from "./shared";

const KEY_POINT_LENGTH = { min: 16, max: 250 };

const BULLET_LINE = /^[•●▪◦‣∙■*–-][ \t]+([^\n]+)$/gm;
const LABELLED_LINE = /^(?:Key(?:[ \t]+points?)?|Important|Note|Remember)[ \t]*:[ \t]*([^\n]+)$/gim;

const BULLET_PREFIX = /^[•●▪◦‣∙■*–-]\s+/;
const LABEL_PREFIX = /^(?:Key(?:\s+points?)?|Important|Note|Remember)\s*:\s*/i;

/** Stems of verbs that usually announce an effect or a requirement */
const ACTION_VERB =
    /\b(?:improv|enhanc|reduc|increas|decreas|prevent|enabl|ensur|requir|maintain|determin|influenc|produc|provid|support|allow|caus)\w*/i;

/**
 * Statements worth remembering: bulleted lines, "Key:" / "Important:"
 * lines and sentences built around an action verb.
 */
export function extractKeyPoints(text: string, cap: number = DEFAULT_LIMITS.keyPoints): string[] {
    if (!text) {
        return [];
    }

    const labelled = collectMatches(text, [BULLET_LINE, LABELLED_LINE]);
    const sentences = splitSentences(text)
        .map((sentence) => sentence.trim().replace(BULLET_PREFIX, "").replace(LABEL_PREFIX, ""))
        .filter((sentence) => ACTION_VERB.test(sentence));

    return finalize([...labelled, ...sentences], KEY_POINT_LENGTH, cap);
}
