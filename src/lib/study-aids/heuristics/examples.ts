import { DEFAULT_LIMITS } from "../config";
import { collectMatches, finalize } from "./shared";

const EXAMPLE_LENGTH = { min: 10, max: 200 };

const EXAMPLE_PATTERNS = [
    /\bfor (?:example|instance)\s*,?\s*([^\n.!?]+)/gi,
    /\bexamples?\s*:\s*([^\n.!?]+)/gi,
    /\be\.g\.\s*,?\s*([^\n.!?]+)/gi,
    /\b([A-Z][\w-]*(?:[ \t]+[\w-]+){0,3}[ \t]+uses?[ \t]+[^\n.!?]+)/g,
    /\b(?:such as|including)\s+([^\n.!?]+)/gi,
];

/** Illustrations: "For example, …", "Example: …", "X uses Y", "such as …" */
export function extractExamples(text: string, cap: number = DEFAULT_LIMITS.examples): string[] {
    if (!text) {
        return [];
    }
    return finalize(collectMatches(text, EXAMPLE_PATTERNS), EXAMPLE_LENGTH, cap);
}
