/**
 * Pluggable generation backends. The heuristic provider always works
 * offline; remote providers fall back to it.
 */
export interface StudyAidProvider {
    /** Human-readable name (for logging / debugging) */
    readonly name: string;

    /** Produce display-ready study notes for `content` */
    generateNotes(prompt: string, content: string): Promise<string>;

    /** Produce display-ready practice questions for `content` */
    generateQuestions(prompt: string, content: string): Promise<string>;
}
