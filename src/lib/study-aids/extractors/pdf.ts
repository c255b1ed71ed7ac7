import { open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { PDFDocument } from "pdf-lib";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { v4 as uuidv4 } from "uuid";
import { DEFAULT_CONFIG } from "../config";
import { NoExtractableTextError, PdfReadError, SourceNotFoundError, errorMessage } from "../errors";
import type { DocumentMetadata, FileReference, Logger, PageText, PdfTextDocument } from "../types";

type PdfJsTextItem = { str?: string; hasEOL?: boolean; transform?: number[] };

interface PdfJsPage {
    pageNumber?: number;
    getTextContent(): Promise<{ items: PdfJsTextItem[] }>;
}

export interface PdfTextExtractorOptions {
    /** Pages with this many characters or fewer are skipped */
    minPageChars?: number;
    logger?: Logger;
}

/** Resolve a path or `{ path }` object to an absolute path */
export function resolveFileReference(file: FileReference): string {
    return path.resolve(typeof file === "string" ? file : file.path);
}

export class PdfTextExtractor {
    readonly name = "PdfTextExtractor";

    private readonly minPageChars: number;
    private readonly logger: Logger;

    constructor(options: PdfTextExtractorOptions = {}) {
        this.minPageChars = options.minPageChars ?? DEFAULT_CONFIG.minPageChars;
        this.logger = options.logger ?? console;
    }

    /**
     * Read the text layer of every page.
     *
     * @throws SourceNotFoundError when the path is not a readable file
     * @throws PdfReadError when the file cannot be parsed as a PDF
     * @throws NoExtractableTextError when no page carries enough text
     */
    async extract(file: FileReference): Promise<PdfTextDocument> {
        const filePath = resolveFileReference(file);
        const fileName = path.basename(filePath);
        const buffer = await this.readSource(filePath);

        const { pageCount, pageTexts, failedPages } = await this.extractTextPages(buffer, fileName);
        const metadata = await this.readMetadata(buffer, fileName);

        const pages: PageText[] = [];
        const skippedPages: number[] = [];
        for (let page = 1; page <= pageCount; page++) {
            const text = pageTexts.get(page);
            if (text === undefined) {
                continue;
            }
            if (text.length > this.minPageChars) {
                pages.push({ page, text });
            } else {
                skippedPages.push(page);
            }
        }

        if (skippedPages.length > 0) {
            this.logger.info(
                `[PdfTextExtractor] ${fileName}: skipped page(s) ${skippedPages.join(", ")} with too little text`
            );
        }

        const text = pages.map((page) => page.text).join("\n\n");
        if (!text.trim()) {
            throw new NoExtractableTextError(fileName, pageCount);
        }

        this.logger.info(`[PdfTextExtractor] ${fileName}: kept ${pages.length} of ${pageCount} pages`);

        return {
            documentId: uuidv4(),
            fileName,
            filePath,
            pageCount,
            pages,
            skippedPages,
            failedPages,
            metadata,
            text,
        };
    }

    private async readSource(filePath: string): Promise<Buffer> {
        let handle: FileHandle;
        try {
            handle = await open(filePath, "r");
        } catch {
            throw new SourceNotFoundError(filePath);
        }

        try {
            const stats = await handle.stat();
            if (!stats.isFile()) {
                throw new SourceNotFoundError(filePath);
            }
            return await handle.readFile();
        } finally {
            await handle.close();
        }
    }

    private async extractTextPages(
        buffer: Buffer,
        fileName: string
    ): Promise<{ pageCount: number; pageTexts: Map<number, string>; failedPages: number[] }> {
        const pageTexts = new Map<number, string>();
        const failedPages: number[] = [];
        let rendered = 0;

        let pageCount: number;
        try {
            const result = await pdfParse(buffer, {
                pagerender: async (pageData: unknown) => {
                    rendered += 1;
                    const pageNumber =
                        isPdfJsPage(pageData) && typeof pageData.pageNumber === "number"
                            ? pageData.pageNumber
                            : rendered;

                    try {
                        if (!isPdfJsPage(pageData)) {
                            throw new Error("page has no text layer");
                        }
                        const text = await this.renderPageText(pageData);
                        pageTexts.set(pageNumber, text);
                        return text;
                    } catch (error) {
                        failedPages.push(pageNumber);
                        this.logger.warn(
                            `[PdfTextExtractor] ${fileName}: skipping page ${pageNumber} (${errorMessage(error)})`
                        );
                        return "";
                    }
                },
                max: 0,
            });
            pageCount = result.numpages;
        } catch (error) {
            throw new PdfReadError(fileName, errorMessage(error));
        }

        // pdf-parse drops pages it cannot load without calling the renderer
        for (let page = 1; page <= pageCount; page++) {
            if (!pageTexts.has(page) && !failedPages.includes(page)) {
                failedPages.push(page);
                this.logger.warn(`[PdfTextExtractor] ${fileName}: page ${page} could not be loaded`);
            }
        }
        failedPages.sort((a, b) => a - b);

        return { pageCount, pageTexts, failedPages };
    }

    /** Join text items, starting a new line on end-of-line items or a baseline change */
    private async renderPageText(page: PdfJsPage): Promise<string> {
        const textContent = await page.getTextContent();
        let text = "";
        let lastY: number | undefined;

        for (const item of textContent.items) {
            const y = item.transform?.[5];
            if (item.str) {
                const newLine = lastY !== undefined && y !== undefined && y !== lastY;
                text += newLine ? `\n${item.str}` : ` ${item.str}`;
            }
            if (item.hasEOL) {
                text += "\n";
            }
            lastY = y ?? lastY;
        }

        return text
            .replace(/[ \t]+/g, " ")
            .replace(/ ?\n ?/g, "\n")
            .replace(/\n{3,}/g, "\n\n")
            .trim();
    }

    private async readMetadata(buffer: Buffer, fileName: string): Promise<DocumentMetadata> {
        try {
            const pdf = await PDFDocument.load(buffer, { ignoreEncryption: true, updateMetadata: false });
            const entries: Array<[string, string | undefined]> = [
                ["title", pdf.getTitle()],
                ["author", pdf.getAuthor()],
                ["subject", pdf.getSubject()],
                ["creator", pdf.getCreator()],
                ["producer", pdf.getProducer()],
            ];
            return Object.fromEntries(entries.filter(([, value]) => value !== undefined && value !== ""));
        } catch (error) {
            this.logger.warn(`[PdfTextExtractor] ${fileName}: unable to read metadata (${errorMessage(error)})`);
            return {};
        }
    }
}

function isPdfJsPage(value: unknown): value is PdfJsPage {
    return (
        typeof value === "object" &&
        value !== null &&
        "getTextContent" in value &&
        typeof value.getTextContent === "function"
    );
}
