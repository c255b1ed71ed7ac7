/**
 * Study Aids — Questions Composer
 *
 * Binds detected topics to question templates, rotating through the
 * categories Understanding → Application → Analysis → Evaluation.
 */

import { DEFAULT_CONFIG, type StudyAidConfig } from "../config";
import { errorMessage } from "../errors";
import { extractTopicTerms, extractTopics } from "../heuristics";
import { uniqueInOrder } from "../heuristics/shared";
import type { GenerationResult } from "../types";
import { checkContentLength, renderGenerationResult } from "./shared";

export const QUESTIONS_TITLE = "# ❓ Practice Questions";

interface QuestionCategory {
    name: string;
    templates: Array<(topic: string) => string>;
}

export const QUESTION_CATEGORIES: readonly QuestionCategory[] = [
    {
        name: "Understanding",
        templates: [
            (topic) => `What is ${topic} and why is it important?`,
            (topic) => `Explain the main idea behind ${topic} in your own words.`,
        ],
    },
    {
        name: "Application",
        templates: [
            (topic) => `How would you apply ${topic} to a real-world problem?`,
            (topic) => `Give a practical example that illustrates ${topic}.`,
        ],
    },
    {
        name: "Analysis",
        templates: [
            (topic) => `How does ${topic} relate to the other concepts in this material?`,
            (topic) => `What are the key components of ${topic} and how do they interact?`,
        ],
    },
    {
        name: "Evaluation",
        templates: [
            (topic) => `What are the strengths and limitations of ${topic}?`,
            (topic) => `How would you judge the significance of ${topic} for the subject as a whole?`,
        ],
    },
];

export const GENERIC_QUESTIONS: readonly string[] = [
    "What are the main concepts discussed in this material?",
    "How do these concepts relate to practical applications?",
    "What are the key differences between the approaches described?",
    "Why is this topic important for the exam?",
    "Can you explain the underlying principles?",
];

export function composeQuestions(content: string, config: StudyAidConfig = DEFAULT_CONFIG): GenerationResult {
    const trimmed = content.trim();
    const insufficient = checkContentLength("questions", trimmed, config.minContentLength);
    if (insufficient) {
        return insufficient;
    }

    try {
        const { limits } = config;
        const topics = uniqueInOrder(
            [...extractTopics(trimmed, limits.topics), ...extractTopicTerms(trimmed, limits.topicTerms)],
            (topic) => topic.toLowerCase()
        );

        const questions = topics.slice(0, limits.questions).map((topic, index) => {
            const category = QUESTION_CATEGORIES[index % QUESTION_CATEGORIES.length];
            const round = Math.floor(index / QUESTION_CATEGORIES.length);
            const template = category.templates[round % category.templates.length];
            return `[${category.name}] ${template(topic)}`;
        });

        for (const generic of GENERIC_QUESTIONS) {
            if (questions.length >= limits.minQuestions) {
                break;
            }
            questions.push(generic);
        }

        return { success: true, text: renderQuestions(questions) };
    } catch (error) {
        return { success: false, error: { code: "GENERATION_FAILED", message: errorMessage(error) } };
    }
}

/** Display form of `composeQuestions`; never throws */
export function generateQuestions(content: string, config: StudyAidConfig = DEFAULT_CONFIG): string {
    return renderGenerationResult("questions", composeQuestions(content, config));
}

function renderQuestions(questions: string[]): string {
    const lines = questions.map((question, index) => `${index + 1}. ${question}`);
    return [QUESTIONS_TITLE, lines.join("\n")].join("\n\n");
}
