/**
 * Study Aids — Type Definitions
 *
 * Shared types for the PDF-to-study-aid pipeline. Every value here is
 * created once and passed along; nothing is mutated after construction.
 */

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/** A PDF on disk, given either as a path or as an object carrying one */
export type FileReference = string | { path: string };

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/** Raw text layer of a single page */
export interface PageText {
  /** 1-indexed page number */
  page: number;
  text: string;
}

/** Arbitrary metadata bag attached to an extracted document */
export type DocumentMetadata = Record<string, unknown>;

/** Output of the PDF text extractor */
export interface PdfTextDocument {
  /** Unique document identifier (UUID v4) */
  documentId: string;
  fileName: string;
  /** Absolute path the document was read from */
  filePath: string;
  pageCount: number;
  /** Pages that carried enough text to be kept, in page order */
  pages: PageText[];
  /** Pages with too little text (likely image-only) */
  skippedPages: number[];
  /** Pages whose text layer could not be read */
  failedPages: number[];
  metadata: DocumentMetadata;
  /** Kept pages joined by a blank line, before cleaning */
  text: string;
}

// ---------------------------------------------------------------------------
// Heuristic analysis
// ---------------------------------------------------------------------------

export interface Definition {
  term: string;
  definition: string;
}

/** Everything the heuristic extractors found in one content slice */
export interface ContentAnalysis {
  topics: string[];
  keyPoints: string[];
  examples: string[];
  definitions: Definition[];
  numericData: string[];
  topicTerms: string[];
}

/** Per-extractor item caps */
export interface ExtractorLimits {
  topics: number;
  keyPoints: number;
  examples: number;
  definitions: number;
  numericData: number;
  topicTerms: number;
  /** Maximum number of generated questions */
  questions: number;
  /** Questions are padded with generic ones up to this count */
  minQuestions: number;
  /** Sentences kept by the informative-sentence fallback */
  informativeSentences: number;
}

// ---------------------------------------------------------------------------
// Generation results
// ---------------------------------------------------------------------------

export type StudyAidKind = "notes" | "questions";

export type GenerationErrorCode = "INSUFFICIENT_CONTENT" | "GENERATION_FAILED";

/** Composer outcome at internal boundaries */
export type GenerationResult =
  | { success: true; text: string }
  | { success: false; error: { code: GenerationErrorCode; message: string } };

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type PipelineStage = "extracting" | "extracted" | "processed" | "notes" | "questions";

export interface PipelineProgress {
  stage: PipelineStage;
  /** 0-100 overall percentage */
  percent: number;
  message: string;
}

export type ProgressCallback = (progress: PipelineProgress) => void;

export type StudyAidFailureCode =
  | "SOURCE_NOT_FOUND"
  | "NO_EXTRACTABLE_TEXT"
  | "PDF_READ_FAILED"
  | "INSUFFICIENT_CONTENT";

/** Top-level pipeline outcome, either both study aids or a display-ready failure */
export type StudyAidResult =
  | {
      success: true;
      notes: string;
      questions: string;
      status: string;
      document: Omit<PdfTextDocument, "text" | "pages">;
      chunkCount: number;
      contentLength: number;
    }
  | {
      success: false;
      code: StudyAidFailureCode;
      fileName: string;
      error: string;
      status: string;
    };

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/** The subset of `console` the pipeline writes diagnostics to */
export type Logger = Pick<Console, "info" | "warn" | "error">;
