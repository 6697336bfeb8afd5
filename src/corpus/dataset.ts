import { z } from "zod";
import type { CellValue, Dataset, DatasetRow } from "../types";
import { ConfigurationError } from "../errors";

const cellSchema = z.union([z.string(), z.number(), z.nan(), z.boolean(), z.null(), z.undefined()]);

const rowSchema = z.record(z.string(), cellSchema);

const datasetSchema = z.union([
    z.array(rowSchema),
    z.object({
        columns: z.array(z.string()).optional(),
        rows: z.array(rowSchema),
    }),
]);

/**
 * True for cells a tabular reader would report as absent:
 * null, undefined, NaN, or a blank string
 */
export function isMissing(value: CellValue): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === "number") return Number.isNaN(value);
    if (typeof value === "string") return value.trim() === "";
    return false;
}

/**
 * Read a cell as the string used for corpus and grouping keys, or undefined when missing
 */
export function readKey(value: CellValue): string | undefined {
    if (isMissing(value)) return undefined;
    return String(value);
}

/**
 * Build a dataset from rows. Columns default to every key seen, in first-seen order.
 */
export function createDataset(rows: readonly DatasetRow[], columns?: readonly string[]): Dataset {
    if (columns !== undefined) {
        return { columns: [...columns], rows };
    }

    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            seen.add(key);
        }
    }
    return { columns: [...seen], rows };
}

/**
 * Validate untyped input (an array of rows, or `{ columns?, rows }`) into a dataset
 */
export function parseDataset(input: unknown): Dataset {
    const parsed = datasetSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
        throw new ConfigurationError(`Invalid dataset: ${issues.join("; ")}`, { issues });
    }

    const data = parsed.data;
    if (Array.isArray(data)) {
        return createDataset(data);
    }
    return createDataset(data.rows, data.columns);
}

/**
 * Throw a ConfigurationError naming every referenced column the dataset lacks
 */
export function requireColumns(dataset: Dataset, columns: readonly string[]): void {
    const available = new Set(dataset.columns);
    const missing = columns.filter(column => !available.has(column));
    if (missing.length > 0) {
        throw new ConfigurationError(
            `Unknown column(s): ${missing.join(", ")} (available: ${dataset.columns.join(", ") || "none"})`,
            { missing, available: [...dataset.columns] }
        );
    }
}
