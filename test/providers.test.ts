import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { generateNotes, generateQuestions } from "../src/lib/study-aids/composers";
import {
    HeuristicProvider,
    OpenAIStudyAidProvider,
    createDefaultProvider,
} from "../src/lib/study-aids/providers";
import { silentLogger } from "./helpers/pdf-fixtures";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => ({
    default: class {
        responses = { create };
    },
}));

const CONTENT =
    "Calvin Cycle, Light Reactions, Electron Transport, Krebs Cycle and Stomatal Conductance " +
    "are covered here along with Carbon Fixation in detail.";

beforeEach(() => {
    create.mockReset();
});

afterEach(() => {
    vi.unstubAllEnvs();
});

describe("createDefaultProvider", () => {
    test("uses heuristics without an API key", () => {
        vi.stubEnv("OPENAI_API_KEY", "");
        expect(createDefaultProvider().name).toBe("heuristic");
    });

    test("treats placeholder keys as missing", () => {
        expect(createDefaultProvider({ apiKey: "your_api_key_here" }).name).toBe("heuristic");
    });

    test("uses OpenAI when a key is configured", () => {
        expect(createDefaultProvider({ apiKey: "test-key", logger: silentLogger() }).name).toBe("openai");
    });
});

describe("HeuristicProvider", () => {
    test("ignores the prompt", async () => {
        const provider = new HeuristicProvider();
        await expect(provider.generateNotes("anything", CONTENT)).resolves.toBe(generateNotes(CONTENT));
        await expect(provider.generateQuestions("anything", CONTENT)).resolves.toBe(generateQuestions(CONTENT));
    });
});

describe("OpenAIStudyAidProvider", () => {
    test("requires an API key", () => {
        vi.stubEnv("OPENAI_API_KEY", "");
        expect(() => new OpenAIStudyAidProvider()).toThrow("Missing OPENAI_API_KEY");
    });

    test("returns the trimmed model output", async () => {
        create.mockResolvedValueOnce({ output_text: "  • Remote note  " });
        const provider = new OpenAIStudyAidProvider({ apiKey: "test-key", model: "gpt-test", logger: silentLogger() });

        await expect(provider.generateNotes("Summarise this", CONTENT)).resolves.toBe("• Remote note");
        expect(create).toHaveBeenCalledWith({ model: "gpt-test", input: "Summarise this" });
    });

    test("falls back to heuristics when the request fails", async () => {
        create.mockRejectedValueOnce(new Error("network down"));
        const logger = silentLogger();
        const provider = new OpenAIStudyAidProvider({ apiKey: "test-key", model: "gpt-test", logger });

        await expect(provider.generateQuestions("Ask about this", CONTENT)).resolves.toBe(generateQuestions(CONTENT));
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test("falls back to heuristics on an empty response", async () => {
        create.mockResolvedValueOnce({ output_text: "   " });
        const logger = silentLogger();
        const provider = new OpenAIStudyAidProvider({ apiKey: "test-key", model: "gpt-test", logger });

        await expect(provider.generateNotes("Summarise this", CONTENT)).resolves.toBe(generateNotes(CONTENT));
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });
});
