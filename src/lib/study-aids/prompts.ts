/**
 * Study Aids — Prompt Templates
 *
 * Templates for the remote generation provider. They are resolved once at
 * startup: a caller-provided file, then the templates shipped in
 * `prompts/`, then a built-in default.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./errors";
import type { Logger, StudyAidKind } from "./types";

export type PromptTemplates = Record<StudyAidKind, string>;

export const CONTENT_PLACEHOLDER = "{content}";

export const DEFAULT_PROMPT_TEMPLATES: PromptTemplates = {
    notes: "Extract the following content into 3-5 bullet-point notes for exam revision:\n\n{content}",
    questions: "Generate 3-5 practice questions based on this content:\n\n{content}",
};

/** Directory holding the shipped `notes.txt` and `questions.txt` */
export const PROMPTS_DIR = path.resolve(__dirname, "..", "..", "..", "prompts");

export interface PromptTemplateOptions {
    notesPath?: string;
    questionsPath?: string;
    /** Overrides `PROMPTS_DIR` */
    promptsDir?: string;
    logger?: Logger;
}

export async function loadPromptTemplates(options: PromptTemplateOptions = {}): Promise<PromptTemplates> {
    const logger = options.logger ?? console;
    const promptsDir = options.promptsDir ?? PROMPTS_DIR;

    return {
        notes: await loadTemplate("notes", [options.notesPath, path.join(promptsDir, "notes.txt")], logger),
        questions: await loadTemplate(
            "questions",
            [options.questionsPath, path.join(promptsDir, "questions.txt")],
            logger
        ),
    };
}

async function loadTemplate(kind: StudyAidKind, candidates: Array<string | undefined>, logger: Logger): Promise<string> {
    for (const candidate of candidates) {
        if (!candidate) {
            continue;
        }

        try {
            const template = (await readFile(candidate, "utf-8")).trim();
            if (template.includes(CONTENT_PLACEHOLDER)) {
                return template;
            }
            logger.warn(`[PromptTemplates] ${candidate} has no ${CONTENT_PLACEHOLDER} placeholder, skipping it`);
        } catch (error) {
            logger.warn(`[PromptTemplates] Could not read ${kind} template ${candidate}: ${errorMessage(error)}`);
        }
    }

    logger.warn(`[PromptTemplates] Using the built-in ${kind} template`);
    return DEFAULT_PROMPT_TEMPLATES[kind];
}

/** Substitute the content into every `{content}` placeholder */
export function fillPrompt(template: string, content: string): string {
    return template.replace(/\{content\}/g, () => content);
}
