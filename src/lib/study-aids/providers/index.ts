import { DEFAULT_CONFIG, type StudyAidConfig } from "../config";
import { errorMessage } from "../errors";
import type { Logger } from "../types";
import { HeuristicProvider } from "./heuristic";
import { OpenAIStudyAidProvider } from "./openai";
import type { StudyAidProvider } from "./types";

export { HeuristicProvider } from "./heuristic";
export { DEFAULT_OPENAI_MODEL, OpenAIStudyAidProvider, type OpenAIStudyAidOptions } from "./openai";
export type { StudyAidProvider } from "./types";

export interface DefaultProviderOptions {
    apiKey?: string;
    model?: string;
    config?: StudyAidConfig;
    logger?: Logger;
}

/**
 * The OpenAI provider when an API key is configured, the heuristic
 * provider otherwise. Without a key the result is identical to local-only
 * generation.
 */
export function createDefaultProvider(options: DefaultProviderOptions = {}): StudyAidProvider {
    const logger = options.logger ?? console;
    const heuristic = new HeuristicProvider(options.config ?? DEFAULT_CONFIG);
    const apiKey = (options.apiKey ?? process.env.OPENAI_API_KEY)?.trim();

    if (!apiKey || apiKey.startsWith("your_")) {
        return heuristic;
    }

    try {
        return new OpenAIStudyAidProvider({ apiKey, model: options.model, fallback: heuristic, logger });
    } catch (error) {
        logger.warn(
            `[createDefaultProvider] Failed to initialize OpenAI provider (${errorMessage(error)}). Falling back to heuristics.`
        );
        return heuristic;
    }
}
