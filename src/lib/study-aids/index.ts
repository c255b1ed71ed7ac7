/**
 * Study Aids — Public API
 *
 * Library entry for the CLI and for programmatic use.
 */

export { StudyAidPipeline } from "./pipeline";
export type { PreparedContent, StudyAidPipelineOptions } from "./pipeline";
export { PdfTextExtractor, resolveFileReference } from "./extractors/pdf";
export type { PdfTextExtractorOptions } from "./extractors/pdf";
export { cleanText, countWords } from "./normalize";
export { chunkText, selectContent, splitSentences } from "./chunker";
export {
    analyzeContent,
    extractDefinitions,
    extractExamples,
    extractKeyPoints,
    extractNumericData,
    extractTopicTerms,
    extractTopics,
} from "./heuristics";
export {
    composeNotes,
    composeQuestions,
    generateNotes,
    generateQuestions,
    renderGenerationResult,
    selectInformativeSentences,
} from "./composers";
export { DEFAULT_CONFIG, DEFAULT_LIMITS, resolveConfig } from "./config";
export type { StudyAidConfig, StudyAidConfigOverrides } from "./config";
export {
    ConfigurationError,
    ERROR_MARKER,
    NoExtractableTextError,
    PdfReadError,
    SourceNotFoundError,
    StudyAidError,
    WARNING_MARKER,
    isError,
    isWarning,
} from "./errors";
export type { StudyAidErrorCode } from "./errors";
export { DEFAULT_PROMPT_TEMPLATES, fillPrompt, loadPromptTemplates } from "./prompts";
export type { PromptTemplateOptions, PromptTemplates } from "./prompts";
export { HeuristicProvider, OpenAIStudyAidProvider, createDefaultProvider } from "./providers";
export type { DefaultProviderOptions, StudyAidProvider } from "./providers";
export type {
    ContentAnalysis,
    Definition,
    DocumentMetadata,
    ExtractorLimits,
    FileReference,
    GenerationResult,
    Logger,
    PageText,
    PdfTextDocument,
    PipelineProgress,
    ProgressCallback,
    StudyAidKind,
    StudyAidResult,
} from "./types";
