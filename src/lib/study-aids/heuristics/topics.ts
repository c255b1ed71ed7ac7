import { DEFAULT_LIMITS } from "../config";
import { collectMatches, finalize } from "./shared";

const TOPIC_LENGTH = { min: 10, max: 100 };

/** "1. Cell Structure", "2.3 Membrane Transport" */
const NUMBERED_SECTION = /^\d+(?:\.\d+)*\.?[ \t]+([A-Z][^\n.!?]{2,})$/gm;
/** Lines written entirely in capitals, e.g. "CELLULAR RESPIRATION" */
const ALL_CAPS_LINE = /^([A-Z][A-Z0-9 ,&:'()\/-]*[A-Z0-9)])$/gm;
const SECTION_KEYWORD_LINE =
    /^((?:Introduction|Overview|Summary|Conclusions?|Background|Methodology|Methods|Results|Discussion|Objectives?|Applications?|(?:Chapter|Section|Unit|Lesson|Module|Part)[ \t]+\d+)\b[^\n.!?]*)$/gim;

/**
 * Section headings: numbered sections, ALL-CAPS header lines and lines
 * opening with a common section name.
 */
export function extractTopics(text: string, cap: number = DEFAULT_LIMITS.topics): string[] {
    if (!text) {
        return [];
    }

    const matches = collectMatches(text, [NUMBERED_SECTION, ALL_CAPS_LINE, SECTION_KEYWORD_LINE]).map(
        (match) => match.replace(/[\s:;,-]+$/, "")
    );
    return finalize(matches, TOPIC_LENGTH, cap);
}
