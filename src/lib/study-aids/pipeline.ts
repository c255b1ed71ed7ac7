/**
 * Study Aids — Pipeline
 *
 * End-to-end flow: extract → clean → chunk → select → notes → questions.
 * `process` never throws; every failure comes back as a result whose
 * `error` string is ready for display.
 */

import path from "node:path";
import { chunkText, selectContent } from "./chunker";
import { insufficientContentMessage } from "./composers";
import { resolveConfig, type StudyAidConfig, type StudyAidConfigOverrides } from "./config";
import { ERROR_MARKER, StudyAidError, WARNING_MARKER, errorMessage } from "./errors";
import { PdfTextExtractor, resolveFileReference } from "./extractors/pdf";
import { cleanText } from "./normalize";
import { DEFAULT_PROMPT_TEMPLATES, fillPrompt, type PromptTemplates } from "./prompts";
import { HeuristicProvider, type StudyAidProvider } from "./providers";
import type {
    FileReference,
    Logger,
    PdfTextDocument,
    PipelineStage,
    ProgressCallback,
    StudyAidFailureCode,
    StudyAidKind,
    StudyAidResult,
} from "./types";

export interface StudyAidPipelineOptions {
    config?: StudyAidConfigOverrides;
    provider?: StudyAidProvider;
    templates?: PromptTemplates;
    extractor?: PdfTextExtractor;
    logger?: Logger;
}

export interface PreparedContent {
    content: string;
    chunkCount: number;
}

const STAGE_PERCENT: Record<PipelineStage, number> = {
    extracting: 10,
    extracted: 30,
    processed: 50,
    notes: 75,
    questions: 100,
};

export class StudyAidPipeline {
    readonly config: StudyAidConfig;

    private readonly provider: StudyAidProvider;
    private readonly templates: PromptTemplates;
    private readonly extractor: PdfTextExtractor;
    private readonly logger: Logger;

    /** @throws ConfigurationError when the configuration overrides are invalid */
    constructor(options: StudyAidPipelineOptions = {}) {
        this.config = resolveConfig(options.config);
        this.logger = options.logger ?? console;
        this.provider = options.provider ?? new HeuristicProvider(this.config);
        this.templates = options.templates ?? DEFAULT_PROMPT_TEMPLATES;
        this.extractor =
            options.extractor ??
            new PdfTextExtractor({ minPageChars: this.config.minPageChars, logger: this.logger });
    }

    /** Clean the extracted text, chunk it and select the slice to analyse */
    prepareContent(text: string): PreparedContent {
        const { chunkSize, overlap, minChunkChars, maxChars } = this.config;
        const chunks = chunkText(cleanText(text), chunkSize, overlap, minChunkChars);
        return { content: selectContent(chunks, maxChars), chunkCount: chunks.length };
    }

    async process(file: FileReference, onProgress?: ProgressCallback): Promise<StudyAidResult> {
        const fileName = path.basename(resolveFileReference(file));
        const report = (stage: PipelineStage, message: string) => {
            try {
                onProgress?.({ stage, percent: STAGE_PERCENT[stage], message });
            } catch (error) {
                this.logger.warn(`[StudyAidPipeline] Progress callback failed at ${stage}: ${errorMessage(error)}`);
            }
        };

        report("extracting", `Extracting text from ${fileName}…`);
        let document: PdfTextDocument;
        try {
            document = await this.extractor.extract(file);
        } catch (error) {
            return this.failure(error, fileName);
        }
        report("extracted", `Extracted ${document.pages.length} of ${document.pageCount} pages`);

        const { content, chunkCount } = this.prepareContent(document.text);
        report("processed", `Selected ${content.length} characters from ${chunkCount} chunks`);

        if (content.length < this.config.minContentLength) {
            const message = insufficientContentMessage("study aids", content.length, this.config.minContentLength);
            this.logger.warn(`[StudyAidPipeline] ${fileName}: ${message}`);
            return {
                success: false,
                code: "INSUFFICIENT_CONTENT",
                fileName,
                error: `${WARNING_MARKER} ${message}`,
                status: `${WARNING_MARKER} ${fileName} does not contain enough text to study from.`,
            };
        }

        const notes = await this.generate("notes", content);
        report("notes", "Study notes ready");
        const questions = await this.generate("questions", content);
        report("questions", "Practice questions ready");

        return {
            success: true,
            notes,
            questions,
            status:
                `✅ Processed ${fileName}: ${document.pages.length} of ${document.pageCount} pages used, ` +
                `${chunkCount} chunks, ${content.length} characters analysed.`,
            document: {
                documentId: document.documentId,
                fileName: document.fileName,
                filePath: document.filePath,
                pageCount: document.pageCount,
                skippedPages: document.skippedPages,
                failedPages: document.failedPages,
                metadata: document.metadata,
            },
            chunkCount,
            contentLength: content.length,
        };
    }

    private async generate(kind: StudyAidKind, content: string): Promise<string> {
        const prompt = fillPrompt(this.templates[kind], content);
        try {
            return kind === "notes"
                ? await this.provider.generateNotes(prompt, content)
                : await this.provider.generateQuestions(prompt, content);
        } catch (error) {
            const message = errorMessage(error);
            this.logger.error(`[StudyAidPipeline] ${this.provider.name} failed to generate ${kind}: ${message}`);
            return `${ERROR_MARKER} Error generating ${kind}: ${message}`;
        }
    }

    private failure(error: unknown, fileName: string): StudyAidResult {
        const code = failureCode(error);
        const marker = code === "NO_EXTRACTABLE_TEXT" ? WARNING_MARKER : ERROR_MARKER;
        const message = errorMessage(error);

        this.logger.error(`[StudyAidPipeline] ${fileName}: ${message}`);
        return {
            success: false,
            code,
            fileName,
            error: `${marker} ${message}`,
            status: `${marker} Could not process ${fileName}.`,
        };
    }
}

function failureCode(error: unknown): StudyAidFailureCode {
    if (error instanceof StudyAidError) {
        switch (error.code) {
            case "SOURCE_NOT_FOUND":
            case "NO_EXTRACTABLE_TEXT":
            case "PDF_READ_FAILED":
                return error.code;
            default:
                break;
        }
    }
    return "PDF_READ_FAILED";
}
