/**
 * Study Aids — Errors
 *
 * Typed failures raised inside the pipeline. None of them crosses the
 * public boundary: `StudyAidPipeline.process` and the `generate*` helpers
 * turn them into display strings prefixed with a marker glyph.
 */

export type StudyAidErrorCode =
    | "SOURCE_NOT_FOUND"
    | "NO_EXTRACTABLE_TEXT"
    | "PDF_READ_FAILED"
    | "INSUFFICIENT_CONTENT"
    | "GENERATION_FAILED"
    | "INVALID_CONFIG";

/** Prefix of user-facing warnings */
export const WARNING_MARKER = "⚠️";
/** Prefix of user-facing errors */
export const ERROR_MARKER = "❌";

export class StudyAidError extends Error {
    readonly code: StudyAidErrorCode;

    constructor(code: StudyAidErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class SourceNotFoundError extends StudyAidError {
    readonly filePath: string;

    constructor(filePath: string) {
        super("SOURCE_NOT_FOUND", `PDF file not found: ${filePath}`);
        this.filePath = filePath;
    }
}

export class NoExtractableTextError extends StudyAidError {
    constructor(fileName: string, pageCount: number) {
        super(
            "NO_EXTRACTABLE_TEXT",
            `No extractable text found in ${fileName} (${pageCount} page${pageCount === 1 ? "" : "s"}). ` +
                "It may be a scanned, image-only PDF."
        );
    }
}

export class PdfReadError extends StudyAidError {
    constructor(fileName: string, reason: string) {
        super("PDF_READ_FAILED", `Unable to read PDF ${fileName}: ${reason}`);
    }
}

export class ConfigurationError extends StudyAidError {
    constructor(message: string) {
        super("INVALID_CONFIG", message);
    }
}

/** Render any thrown value as a message */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isWarning(text: string): boolean {
    return text.startsWith(WARNING_MARKER);
}

export function isError(text: string): boolean {
    return text.startsWith(ERROR_MARKER);
}
