import { generateNotes, generateQuestions } from "../composers";
import { DEFAULT_CONFIG, type StudyAidConfig } from "../config";
import type { StudyAidProvider } from "./types";

/** Local, pattern-based generation. The prompt is not used. */
export class HeuristicProvider implements StudyAidProvider {
    readonly name = "heuristic";

    private readonly config: StudyAidConfig;

    constructor(config: StudyAidConfig = DEFAULT_CONFIG) {
        this.config = config;
    }

    async generateNotes(_prompt: string, content: string): Promise<string> {
        return generateNotes(content, this.config);
    }

    async generateQuestions(_prompt: string, content: string): Promise<string> {
        return generateQuestions(content, this.config);
    }
}
