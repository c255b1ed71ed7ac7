import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { NOTES_TITLE, QUESTIONS_TITLE, generateNotes } from "../src/lib/study-aids/composers";
import { StudyAidPipeline } from "../src/lib/study-aids/pipeline";
import type { StudyAidProvider } from "../src/lib/study-aids/providers";
import type { PipelineProgress } from "../src/lib/study-aids/types";
import { PROSE_LINES, silentLogger, writePdf } from "./helpers/pdf-fixtures";

function spyProvider() {
    return {
        name: "spy",
        generateNotes: vi.fn(async (_prompt: string, _content: string) => "notes"),
        generateQuestions: vi.fn(async (_prompt: string, _content: string) => "questions"),
    } satisfies StudyAidProvider;
}

describe("StudyAidPipeline", () => {
    let dir: string;
    let lecturePdf: string;

    beforeAll(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), "study-aids-pipeline-"));
        lecturePdf = path.join(dir, "lecture.pdf");
        await writePdf(lecturePdf, [PROSE_LINES, ["Short note on page two."]]);
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test("produces notes and questions for a text PDF", async () => {
        const pipeline = new StudyAidPipeline({ logger: silentLogger() });
        const progress: PipelineProgress[] = [];

        const result = await pipeline.process(lecturePdf, (update) => progress.push(update));

        expect(result.success).toBe(true);
        if (!result.success) {
            return;
        }
        expect(result.notes.startsWith(NOTES_TITLE)).toBe(true);
        expect(result.questions.startsWith(QUESTIONS_TITLE)).toBe(true);
        expect(result.document.pageCount).toBe(2);
        expect(result.document.skippedPages).toEqual([2]);
        expect(result.chunkCount).toBe(1);
        expect(result.status).toBe(
            `✅ Processed lecture.pdf: 1 of 2 pages used, 1 chunks, ${result.contentLength} characters analysed.`
        );
        expect(progress.map((update) => update.percent)).toEqual([10, 30, 50, 75, 100]);
        expect(progress.map((update) => update.stage)).toEqual([
            "extracting",
            "extracted",
            "processed",
            "notes",
            "questions",
        ]);
    });

    test("passes the filled prompt templates to the provider", async () => {
        const provider = spyProvider();
        const pipeline = new StudyAidPipeline({
            provider,
            templates: { notes: "NOTES:\n{content}", questions: "QUESTIONS:\n{content}" },
            logger: silentLogger(),
        });

        const result = await pipeline.process(lecturePdf);

        expect(result).toMatchObject({ success: true, notes: "notes", questions: "questions" });
        const [prompt, content] = provider.generateNotes.mock.calls[0];
        expect(prompt).toBe(`NOTES:\n${content}`);
        expect(provider.generateQuestions).toHaveBeenCalledWith(`QUESTIONS:\n${content}`, content);
    });

    test("reports a missing file without generating anything", async () => {
        const provider = spyProvider();
        const pipeline = new StudyAidPipeline({ provider, logger: silentLogger() });

        const result = await pipeline.process(path.join(dir, "missing.pdf"));

        expect(result).toMatchObject({
            success: false,
            code: "SOURCE_NOT_FOUND",
            fileName: "missing.pdf",
            status: "❌ Could not process missing.pdf.",
        });
        if (!result.success) {
            expect(result.error).toBe(`❌ PDF file not found: ${path.join(dir, "missing.pdf")}`);
        }
        expect(provider.generateNotes).not.toHaveBeenCalled();
        expect(provider.generateQuestions).not.toHaveBeenCalled();
    });

    test("warns about a PDF without extractable text", async () => {
        const blankPdf = path.join(dir, "scanned.pdf");
        await writePdf(blankPdf, [[], []]);

        const result = await new StudyAidPipeline({ logger: silentLogger() }).process(blankPdf);

        expect(result).toMatchObject({
            success: false,
            code: "NO_EXTRACTABLE_TEXT",
            error: "⚠️ No extractable text found in scanned.pdf (2 pages). It may be a scanned, image-only PDF.",
            status: "⚠️ Could not process scanned.pdf.",
        });
    });

    test("warns when the document is too short to study from", async () => {
        const shortPdf = path.join(dir, "short.pdf");
        await writePdf(shortPdf, [["Plants need sunlight, water and carbon dioxide to grow."]]);
        const provider = spyProvider();

        const result = await new StudyAidPipeline({ provider, logger: silentLogger() }).process(shortPdf);

        expect(result).toMatchObject({
            success: false,
            code: "INSUFFICIENT_CONTENT",
            status: "⚠️ short.pdf does not contain enough text to study from.",
        });
        if (!result.success) {
            expect(result.error.startsWith("⚠️ Insufficient content to generate study aids")).toBe(true);
        }
        expect(provider.generateNotes).not.toHaveBeenCalled();
    });

    test("turns a provider failure into an error line", async () => {
        const provider = spyProvider();
        provider.generateNotes.mockRejectedValueOnce(new Error("boom"));
        const logger = silentLogger();

        const result = await new StudyAidPipeline({ provider, logger }).process(lecturePdf);

        expect(result).toMatchObject({
            success: true,
            notes: "❌ Error generating notes: boom",
            questions: "questions",
        });
        expect(logger.error).toHaveBeenCalledWith("[StudyAidPipeline] spy failed to generate notes: boom");
    });

    test("keeps running when the progress callback throws", async () => {
        const logger = silentLogger();
        const pipeline = new StudyAidPipeline({ provider: spyProvider(), logger });

        const result = await pipeline.process(lecturePdf, () => {
            throw new Error("display closed");
        });

        expect(result).toMatchObject({ success: true, notes: "notes", questions: "questions" });
        expect(logger.warn).toHaveBeenCalledWith(
            "[StudyAidPipeline] Progress callback failed at extracting: display closed"
        );
    });

    test("lists each sentence once in notes built from overlapping chunks", () => {
        const sentences = ["first", "second", "third", "fourth", "fifth", "sixth"].map(
            (ordinal) => `the ${ordinal} river flows slowly past the old mill today.`
        );
        const pipeline = new StudyAidPipeline({
            config: { chunkSize: 25, overlap: 12, minChunkChars: 0 },
            logger: silentLogger(),
        });

        const { content, chunkCount } = pipeline.prepareContent(sentences.join(" "));

        expect(chunkCount).toBe(5);
        expect(generateNotes(content)).toBe(
            [NOTES_TITLE, "", "## Key Sentences", ...sentences.slice(0, 5).map((sentence) => `• ${sentence}`)].join(
                "\n"
            )
        );
    });

    test("prepares content from chunks of the cleaned text", () => {
        const pipeline = new StudyAidPipeline({
            config: { chunkSize: 12, overlap: 6, minChunkChars: 0 },
            logger: silentLogger(),
        });
        const text =
            "Alpha beta gamma delta epsilon. Zeta eta theta iota kappa. Lambda mu nu xi omicron.\n42\n" +
            "Pi rho sigma tau upsilon.";

        expect(pipeline.prepareContent(text)).toEqual({
            content: [
                "Alpha beta gamma delta epsilon. Zeta eta theta iota kappa.",
                "Zeta eta theta iota kappa. Lambda mu nu xi omicron.",
                "Lambda mu nu xi omicron.\nPi rho sigma tau upsilon.",
            ].join("\n\n"),
            chunkCount: 3,
        });
    });
});
