import OpenAI from "openai";
import { errorMessage } from "../errors";
import type { Logger, StudyAidKind } from "../types";
import { HeuristicProvider } from "./heuristic";
import type { StudyAidProvider } from "./types";

export interface OpenAIStudyAidOptions {
    apiKey?: string;
    model?: string;
    baseURL?: string;
    /** Answers whenever the remote call fails; defaults to the heuristic provider */
    fallback?: StudyAidProvider;
    logger?: Logger;
}

export const DEFAULT_OPENAI_MODEL = "gpt-4.1-mini";

export class OpenAIStudyAidProvider implements StudyAidProvider {
    readonly name = "openai";

    private readonly client: OpenAI;
    private readonly model: string;
    private readonly fallback: StudyAidProvider;
    private readonly logger: Logger;

    constructor(options: OpenAIStudyAidOptions = {}) {
        const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
        if (!apiKey) {
            throw new Error(
                "[OpenAIStudyAidProvider] Missing OPENAI_API_KEY. Pass it via options or environment variable."
            );
        }

        this.client = new OpenAI({ apiKey, baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL });
        this.model = options.model ?? process.env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL;
        this.fallback = options.fallback ?? new HeuristicProvider();
        this.logger = options.logger ?? console;
    }

    async generateNotes(prompt: string, content: string): Promise<string> {
        return this.generate("notes", prompt, content);
    }

    async generateQuestions(prompt: string, content: string): Promise<string> {
        return this.generate("questions", prompt, content);
    }

    private async generate(kind: StudyAidKind, prompt: string, content: string): Promise<string> {
        try {
            const response = await this.client.responses.create({
                model: this.model,
                input: prompt,
            });

            const text = response.output_text.trim();
            if (text) {
                return text;
            }
            this.logger.warn(`[OpenAIStudyAidProvider] Empty ${kind} response, using ${this.fallback.name}`);
        } catch (error) {
            this.logger.error(
                `[OpenAIStudyAidProvider] ${kind} request failed (${errorMessage(error)}), using ${this.fallback.name}`
            );
        }

        return kind === "notes"
            ? this.fallback.generateNotes(prompt, content)
            : this.fallback.generateQuestions(prompt, content);
    }
}
