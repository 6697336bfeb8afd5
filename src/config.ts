import { z } from "zod";
import type { TokenizeOptions } from "./preprocessing/tokenize";
import { DEFAULT_HIERARCHY_COLUMNS, type HierarchyColumns } from "./corpus/build";
import type { LogLevel } from "./utils/logger";
import { ConfigurationError } from "./errors";

export interface SalienceConfig {
    /** Terms kept per document */
    topK?: number;
    tokenizer?: TokenizeOptions;
    /** Split shared speaker credits in hierarchical builds */
    splitSpeakers?: boolean;
    /** Column names for hierarchical builds */
    columns?: Partial<HierarchyColumns>;
    logLevel?: LogLevel;
    /** Record and print per-step timings */
    timing?: boolean;
    /** Log every document's top scored terms (implies logLevel "debug") */
    debug?: boolean;
}

export interface ResolvedConfig {
    topK: number;
    tokenizer: TokenizeOptions;
    splitSpeakers: boolean;
    columns: HierarchyColumns;
    logLevel: LogLevel;
    timing: boolean;
    debug: boolean;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
    topK: 10,
    tokenizer: {
        removeStopWords: false,
        applyStemming: false,
    },
    splitSpeakers: true,
    columns: DEFAULT_HIERARCHY_COLUMNS,
    logLevel: "info",
    timing: false,
    debug: false,
};

/**
 * Deep merge configuration objects
 */
export function mergeConfig(defaults: ResolvedConfig, overrides: SalienceConfig): ResolvedConfig {
    const debug = overrides.debug ?? defaults.debug;
    return {
        topK: overrides.topK ?? defaults.topK,
        tokenizer: { ...defaults.tokenizer, ...overrides.tokenizer },
        splitSpeakers: overrides.splitSpeakers ?? defaults.splitSpeakers,
        columns: { ...defaults.columns, ...overrides.columns },
        logLevel: debug ? "debug" : overrides.logLevel ?? defaults.logLevel,
        timing: overrides.timing ?? defaults.timing,
        debug,
    };
}

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(value => value === "true" || value === "1");

const envSchema = z.object({
    SALIENCE_TOP_K: z.string().trim().min(1).pipe(z.coerce.number().int().nonnegative()).optional(),
    SALIENCE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    SALIENCE_TIMING: booleanFlag.optional(),
    SALIENCE_DEBUG: booleanFlag.optional(),
});

/**
 * Read configuration overrides from environment variables
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): SalienceConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`, { issues });
    }

    const { SALIENCE_TOP_K, SALIENCE_LOG_LEVEL, SALIENCE_TIMING, SALIENCE_DEBUG } = parsed.data;
    return {
        ...(SALIENCE_TOP_K !== undefined && { topK: SALIENCE_TOP_K }),
        ...(SALIENCE_LOG_LEVEL !== undefined && { logLevel: SALIENCE_LOG_LEVEL }),
        ...(SALIENCE_TIMING !== undefined && { timing: SALIENCE_TIMING }),
        ...(SALIENCE_DEBUG !== undefined && { debug: SALIENCE_DEBUG }),
    };
}
