/**
 * Study Aids — Heuristic Extractors
 *
 * Independent pattern scans over one content slice. Each returns at most
 * its configured number of items, deduplicated in first-seen order, and
 * an empty list when nothing matches.
 */

import { DEFAULT_LIMITS } from "../config";
import type { ContentAnalysis, ExtractorLimits } from "../types";
import { extractDefinitions } from "./definitions";
import { extractExamples } from "./examples";
import { extractKeyPoints } from "./key-points";
import { extractNumericData } from "./numeric-data";
import { extractTopicTerms } from "./topic-terms";
import { extractTopics } from "./topics";

export { extractDefinitions, extractExamples, extractKeyPoints, extractNumericData, extractTopicTerms, extractTopics };

/** Run every extractor over `content` */
export function analyzeContent(content: string, limits: ExtractorLimits = DEFAULT_LIMITS): ContentAnalysis {
    return {
        topics: extractTopics(content, limits.topics),
        keyPoints: extractKeyPoints(content, limits.keyPoints),
        examples: extractExamples(content, limits.examples),
        definitions: extractDefinitions(content, limits.definitions),
        numericData: extractNumericData(content, limits.numericData),
        topicTerms: extractTopicTerms(content, limits.topicTerms),
    };
}
