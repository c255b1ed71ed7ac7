/**
 * Helpers shared by the heuristic extractors.
 */

export interface LengthRange {
    min: number;
    max: number;
}

/**
 * Run every (global) pattern over `text` in order and collect capture
 * group `group` of each match, or the whole match when the group is absent.
 */
export function collectMatches(text: string, patterns: RegExp[], group = 1): string[] {
    const matches: string[] = [];
    for (const pattern of patterns) {
        for (const match of text.matchAll(pattern)) {
            matches.push(match[group] ?? match[0]);
        }
    }
    return matches;
}

/** Collapse inner whitespace and trim */
export function tidy(item: string): string {
    return item.replace(/\s+/g, " ").trim();
}

export function withinLength(item: string, range: LengthRange): boolean {
    return item.length >= range.min && item.length <= range.max;
}

/** Deduplicate keeping the first occurrence of each key */
export function uniqueInOrder<T>(items: T[], key: (item: T) => string = String): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const item of items) {
        const id = key(item);
        if (!seen.has(id)) {
            seen.add(id);
            unique.push(item);
        }
    }
    return unique;
}

/** Tidy, length-filter, deduplicate and cap a list of raw matches */
export function finalize(items: string[], range: LengthRange, cap: number): string[] {
    const candidates = items.map(tidy).filter((item) => withinLength(item, range));
    return uniqueInOrder(candidates).slice(0, Math.max(0, cap));
}
