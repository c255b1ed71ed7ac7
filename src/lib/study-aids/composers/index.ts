export { composeNotes, generateNotes, NOTES_TITLE, REVIEW_PLACEHOLDER } from "./notes";
export { composeQuestions, generateQuestions, GENERIC_QUESTIONS, QUESTION_CATEGORIES, QUESTIONS_TITLE } from "./questions";
export { selectInformativeSentences, scoreSentence } from "./informative-sentences";
export { insufficientContentMessage, renderGenerationResult } from "./shared";
