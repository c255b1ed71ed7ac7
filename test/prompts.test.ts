import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DEFAULT_PROMPT_TEMPLATES, fillPrompt, loadPromptTemplates } from "../src/lib/study-aids/prompts";
import { silentLogger } from "./helpers/pdf-fixtures";

describe("loadPromptTemplates", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), "study-aids-prompts-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test("loads the shipped templates", async () => {
        const templates = await loadPromptTemplates({ logger: silentLogger() });
        expect(templates.notes.startsWith("Condense the following content")).toBe(true);
        expect(templates.questions).toContain("{content}");
    });

    test("prefers an explicit file and falls back to the built-in template", async () => {
        const notesPath = path.join(dir, "custom-notes.txt");
        await writeFile(notesPath, "Summarise:\n{content}\n");
        const logger = silentLogger();

        const templates = await loadPromptTemplates({ notesPath, promptsDir: dir, logger });

        expect(templates.notes).toBe("Summarise:\n{content}");
        expect(templates.questions).toBe(DEFAULT_PROMPT_TEMPLATES.questions);
        expect(logger.warn).toHaveBeenCalled();
    });

    test("skips a template without the content placeholder", async () => {
        await writeFile(path.join(dir, "notes.txt"), "No placeholder here");
        const templates = await loadPromptTemplates({ promptsDir: dir, logger: silentLogger() });
        expect(templates.notes).toBe(DEFAULT_PROMPT_TEMPLATES.notes);
    });
});

describe("fillPrompt", () => {
    test("replaces every placeholder literally", () => {
        expect(fillPrompt("A {content} B {content}", "x$&y")).toBe("A x$&y B x$&y");
    });
});
