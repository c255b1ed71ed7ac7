import { describe, expect, test } from "vitest";
import {
    analyzeContent,
    extractDefinitions,
    extractExamples,
    extractKeyPoints,
    extractNumericData,
    extractTopicTerms,
    extractTopics,
} from "../src/lib/study-aids/heuristics";

describe("extractTopics", () => {
    const text = [
        "1. Introduction to Cells",
        "CELL MEMBRANE STRUCTURE",
        "Overview of transport",
        "The membrane controls what enters the cell.",
        "2.1 Active Transport",
    ].join("\n");

    test("finds numbered, all-caps and keyword headings in that order", () => {
        expect(extractTopics(text)).toEqual([
            "Introduction to Cells",
            "Active Transport",
            "CELL MEMBRANE STRUCTURE",
            "Overview of transport",
        ]);
    });

    test("respects the cap", () => {
        expect(extractTopics(text, 2)).toEqual(["Introduction to Cells", "Active Transport"]);
    });

    test("does not repeat a heading", () => {
        expect(extractTopics("SUMMARY OF RESULTS\nSummary of results")).toEqual([
            "SUMMARY OF RESULTS",
            "Summary of results",
        ]);
    });
});

describe("extractKeyPoints", () => {
    test("collects bullets, labelled lines and action-verb sentences", () => {
        const text = [
            "• Chlorophyll absorbs red and blue light.",
            "Important: Water is split during the light reactions.",
            "Fertilizers increase crop yield in poor soils. The sky is blue.",
        ].join("\n");

        expect(extractKeyPoints(text)).toEqual([
            "Chlorophyll absorbs red and blue light.",
            "Water is split during the light reactions.",
            "Fertilizers increase crop yield in poor soils.",
        ]);
    });

    test("skips bullets that are too short", () => {
        expect(extractKeyPoints("- Short one\n- This bullet is long enough to keep")).toEqual([
            "This bullet is long enough to keep",
        ]);
    });
});

describe("extractExamples", () => {
    test("captures 'for example' and 'such as' phrases", () => {
        const text =
            "Many organisms rely on photosynthesis. For example, algae in the ocean produce oxygen. " +
            "Plants store energy in forms such as starch and cellulose.";
        expect(extractExamples(text)).toEqual(["algae in the ocean produce oxygen", "starch and cellulose"]);
    });

    test("captures 'X uses Y' clauses whole", () => {
        expect(extractExamples("The Calvin cycle uses ATP to fix carbon.")).toEqual([
            "The Calvin cycle uses ATP to fix carbon",
        ]);
    });
});

describe("extractDefinitions", () => {
    test("finds copula, verb and colon definitions and skips pronouns and labels", () => {
        const text = [
            "Photosynthesis is the process by which plants convert light into chemical energy. It is a vital process. Osmosis refers to the movement of water across a membrane.",
            "Stomata: small pores on the leaf surface that regulate gas exchange",
            "Note: review this section before the exam",
        ].join("\n");

        expect(extractDefinitions(text)).toEqual([
            {
                term: "Photosynthesis",
                definition: "the process by which plants convert light into chemical energy",
            },
            { term: "Osmosis", definition: "the movement of water across a membrane" },
            { term: "Stomata", definition: "small pores on the leaf surface that regulate gas exchange" },
        ]);
    });

    test("keeps the first definition of a term", () => {
        const text = "Osmosis is the movement of water. Osmosis means diffusion of water through membranes.";
        expect(extractDefinitions(text)).toEqual([{ term: "Osmosis", definition: "the movement of water" }]);
    });
});

describe("extractNumericData", () => {
    const text = "Yields rose by 45% after 1998 when farmers applied 20 kg of nitrogen. E = mc^2 is unrelated.";

    test("orders percentages, measurements, years and formulas", () => {
        expect(extractNumericData(text, 4)).toEqual(["45%", "20 kg", "1998", "E = mc^2"]);
    });

    test("caps at three by default", () => {
        expect(extractNumericData(text)).toEqual(["45%", "20 kg", "1998"]);
    });
});

describe("extractTopicTerms", () => {
    test("returns capitalized phrases without leading stopwords", () => {
        const text =
            "The Calvin Cycle runs in the stroma. Electron Transport Chain proteins sit in the membrane. " +
            "This Chapter covers Light Reactions and the Calvin Cycle.";
        expect(extractTopicTerms(text)).toEqual(["Calvin Cycle", "Electron Transport Chain", "Light Reactions"]);
    });
});

describe("repeated matches", () => {
    test("each list extractor reports a repeat once", () => {
        const results = [
            extractTopics("CELL MEMBRANE STRUCTURE\nCELL MEMBRANE STRUCTURE"),
            extractKeyPoints("• Fertilizers increase crop yield.\n• Fertilizers increase crop yield."),
            extractExamples("For example, algae produce oxygen. For example, algae produce oxygen."),
            extractNumericData("It rose 45% and then 45% again."),
            extractTopicTerms("Calvin Cycle and Calvin Cycle."),
        ];

        expect(results).toEqual([
            ["CELL MEMBRANE STRUCTURE"],
            ["Fertilizers increase crop yield."],
            ["algae produce oxygen"],
            ["45%"],
            ["Calvin Cycle"],
        ]);
        for (const items of results) {
            expect(new Set(items).size).toBe(items.length);
        }
    });

    test("definitions report a repeated pair once", () => {
        expect(
            extractDefinitions("Osmosis is the movement of water. Osmosis is the movement of water.")
        ).toEqual([{ term: "Osmosis", definition: "the movement of water" }]);
    });
});

describe("analyzeContent", () => {
    test("returns empty lists for empty content", () => {
        expect(analyzeContent("")).toEqual({
            topics: [],
            keyPoints: [],
            examples: [],
            definitions: [],
            numericData: [],
            topicTerms: [],
        });
    });
});
