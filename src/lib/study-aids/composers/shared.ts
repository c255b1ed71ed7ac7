import { ERROR_MARKER, WARNING_MARKER } from "../errors";
import type { GenerationResult, StudyAidKind } from "../types";

export const BULLET = "•";

const KIND_LABELS: Record<StudyAidKind, string> = {
    notes: "study notes",
    questions: "practice questions",
};

export function insufficientContentMessage(subject: string, length: number, required: number): string {
    return `Insufficient content to generate ${subject} (${length} characters; at least ${required} required).`;
}

/** `INSUFFICIENT_CONTENT` result when `content` is shorter than `required`, else null */
export function checkContentLength(kind: StudyAidKind, content: string, required: number): GenerationResult | null {
    if (content.length >= required) {
        return null;
    }
    return {
        success: false,
        error: {
            code: "INSUFFICIENT_CONTENT",
            message: insufficientContentMessage(KIND_LABELS[kind], content.length, required),
        },
    };
}

/**
 * Collapse a result into display text: the generated text, a warning
 * prefixed with ⚠️, or an error prefixed with ❌.
 */
export function renderGenerationResult(kind: StudyAidKind, result: GenerationResult): string {
    if (result.success) {
        return result.text;
    }
    if (result.error.code === "INSUFFICIENT_CONTENT") {
        return `${WARNING_MARKER} ${result.error.message}`;
    }
    return `${ERROR_MARKER} Error generating ${kind}: ${result.error.message}`;
}
