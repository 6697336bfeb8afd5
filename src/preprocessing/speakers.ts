import type { Dataset } from "../types";
import { readKey, requireColumns } from "../corpus/dataset";

// Separators between names in a shared speaker credit
const SPEAKER_SEPARATOR = /\s*(?:,|&|\band\b)\s*/;

/**
 * Split a speaker credit into individual speakers
 * e.g., "Amethyst, Ruby & Sapphire" → ["Amethyst", "Ruby", "Sapphire"]
 *       "Mr. Smiley and Jamie" → ["Mr. Smiley", "Jamie"]
 */
export function cleanSpeaker(credit: string): string[] {
    const speakers: string[] = [];
    for (const part of credit.split(SPEAKER_SEPARATOR)) {
        const name = part.trim();
        if (name !== "" && !speakers.includes(name)) {
            speakers.push(name);
        }
    }
    return speakers;
}

/**
 * List the distinct speaker groups credited in a dataset column, each as a
 * sorted list of names. Groups with the same members count once.
 */
export function listCleanSpeakers(dataset: Dataset, column: string): string[][] {
    requireColumns(dataset, [column]);

    const seen = new Set<string>();
    const groups: string[][] = [];

    for (const row of dataset.rows) {
        const credit = readKey(row[column]);
        if (credit === undefined) continue;

        const group = cleanSpeaker(credit);
        if (group.length === 0) continue;

        const sorted = [...group].sort();
        const key = JSON.stringify(sorted);
        if (!seen.has(key)) {
            seen.add(key);
            groups.push(sorted);
        }
    }

    return groups;
}
