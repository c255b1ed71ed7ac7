import { DEFAULT_LIMITS } from "../config";
import { collectMatches, finalize } from "./shared";

const NUMERIC_LENGTH = { min: 2, max: 60 };

const PERCENTAGE = /\b\d+(?:\.\d+)?[ \t]?%/g;
const MEASUREMENT =
    /\b\d+(?:\.\d+)?[ \t]?(?:km|cm|mm|kg|mg|m|g|s|ms|h|min|°C|°F|K|J|kJ|W|kW|V|A|Hz|kHz|MHz|GHz|KB|MB|GB|TB|L|mL|mol)(?![\p{L}\p{N}])/gu;
const YEAR = /\b(?:1[5-9]\d{2}|20\d{2})\b/g;
const FORMULA = /\b[A-Za-z]\w{0,10}[ \t]*=[ \t]*[\w^().]+(?:[ \t]*[-+*/×÷][ \t]*[\w^().]+)*/g;

/** Figures worth memorising: percentages, measurements, years and formulas */
export function extractNumericData(text: string, cap: number = DEFAULT_LIMITS.numericData): string[] {
    if (!text) {
        return [];
    }

    const matches = collectMatches(text, [PERCENTAGE, MEASUREMENT, YEAR, FORMULA], 0).map((match) =>
        match.replace(/[\s.]+$/, "")
    );
    return finalize(matches, NUMERIC_LENGTH, cap);
}
