/**
 * Study Aids — Notes Composer
 *
 * Lays the extractor output out as markdown sections. When the
 * extractors find too little, the notes are built from the most
 * informative sentences instead.
 */

import { DEFAULT_CONFIG, type StudyAidConfig } from "../config";
import { errorMessage } from "../errors";
import { analyzeContent } from "../heuristics";
import type { ContentAnalysis, GenerationResult } from "../types";
import { selectInformativeSentences } from "./informative-sentences";
import { BULLET, checkContentLength, renderGenerationResult } from "./shared";

export const NOTES_TITLE = "# 📝 Study Notes";
export const REVIEW_PLACEHOLDER = `${BULLET} Key concepts from this section need review`;

/** Structured notes with fewer item lines than this are discarded */
const MIN_STRUCTURED_ITEMS = 3;

interface NotesSection {
    heading: string;
    items: string[];
}

export function composeNotes(content: string, config: StudyAidConfig = DEFAULT_CONFIG): GenerationResult {
    const trimmed = content.trim();
    const insufficient = checkContentLength("notes", trimmed, config.minContentLength);
    if (insufficient) {
        return insufficient;
    }

    try {
        const sections = buildSections(analyzeContent(trimmed, config.limits));
        const itemCount = sections.reduce((total, section) => total + section.items.length, 0);

        if (itemCount >= MIN_STRUCTURED_ITEMS) {
            return { success: true, text: renderNotes(sections) };
        }

        const sentences = selectInformativeSentences(trimmed, config.limits.informativeSentences);
        return { success: true, text: renderNotes([{ heading: "Key Sentences", items: sentences }], true) };
    } catch (error) {
        return { success: false, error: { code: "GENERATION_FAILED", message: errorMessage(error) } };
    }
}

/** Display form of `composeNotes`; never throws */
export function generateNotes(content: string, config: StudyAidConfig = DEFAULT_CONFIG): string {
    return renderGenerationResult("notes", composeNotes(content, config));
}

function buildSections(analysis: ContentAnalysis): NotesSection[] {
    const sections: NotesSection[] = [
        { heading: "Main Topics", items: analysis.topics },
        { heading: "Key Points", items: analysis.keyPoints },
        {
            heading: "Definitions",
            items: analysis.definitions.map(({ term, definition }) => `**${term}**: ${definition}`),
        },
        { heading: "Examples", items: analysis.examples },
        { heading: "Key Figures", items: analysis.numericData },
    ];
    return sections.filter((section) => section.items.length > 0);
}

function renderNotes(sections: NotesSection[], placeholderWhenEmpty = false): string {
    const blocks = sections.map((section) => {
        const items = section.items.map((item) => `${BULLET} ${item}`);
        if (items.length === 0 && placeholderWhenEmpty) {
            items.push(REVIEW_PLACEHOLDER);
        }
        return [`## ${section.heading}`, ...items].join("\n");
    });
    return [NOTES_TITLE, ...blocks].join("\n\n");
}
