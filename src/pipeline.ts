import type { Corpus, Dataset, HierarchicalSalience, SalienceResult } from "./types";
import { buildCorpusFromTexts, buildComprehensiveCorpus, buildSimpleCorpus, type DroppedRows, type RowFilter, type TextSource } from "./corpus/build";
import { findMostSalient, rankHierarchicalCorpus, scoreDocument, sortByScore } from "./scoring/salience";
import { createFrequencyModel } from "./scoring/frequency";
import { DEFAULT_CONFIG, mergeConfig, type ResolvedConfig, type SalienceConfig } from "./config";
import Logger from "./utils/logger";

export interface DatasetSource {
    idColumn: string;
    docColumn: string;
    filter?: RowFilter;
}

export interface HierarchicalExtraction {
    terms: HierarchicalSalience;
    dropped: DroppedRows;
}

/**
 * Run one extraction with the logger configured for it. The level is only
 * changed when the caller asks for one, and is restored afterwards; timings
 * are printed and cleared at the end.
 */
function withLogger<T>(config: SalienceConfig, fn: (cfg: ResolvedConfig) => T): T {
    const cfg = mergeConfig(DEFAULT_CONFIG, config);
    const logger = Logger.getInstance();
    const previousLevel = logger.getLevel();
    const overridesLevel = config.logLevel !== undefined || cfg.debug;

    if (overridesLevel) {
        logger.setLevel(cfg.logLevel);
    }
    logger.setTimingEnabled(cfg.timing);

    try {
        const result = fn(cfg);
        if (cfg.timing) {
            logger.printTimings();
        }
        return result;
    } finally {
        logger.clearTimings();
        logger.setTimingEnabled(false);
        if (overridesLevel) {
            logger.setLevel(previousLevel);
        }
    }
}

/**
 * Log each document's top terms with their scores
 */
function logScores(corpus: Corpus, topK: number): void {
    const logger = Logger.getInstance();
    const model = createFrequencyModel(corpus);
    for (const [documentId, tokens] of corpus) {
        if (tokens.length === 0) {
            logger.debug(`${documentId}: (empty)`);
            continue;
        }
        const top = sortByScore(scoreDocument(documentId, model))
            .slice(0, topK)
            .map(s => `${s.term}=${s.score.toFixed(4)}`);
        logger.debug(`${documentId}: ${top.join(", ")}`);
    }
}

function rankCorpus(corpus: Corpus, cfg: ResolvedConfig): SalienceResult {
    const logger = Logger.getInstance();
    logger.debug(`Ranking ${corpus.size} document(s), top ${cfg.topK}`);

    const result = logger.time("2. Rank terms", () => findMostSalient(corpus, cfg.topK));

    if (cfg.debug) {
        logScores(corpus, cfg.topK);
    }
    return result;
}

/**
 * Rank the most salient terms of raw text documents keyed by identifier
 */
export function extractSalientTerms(documents: TextSource, config: SalienceConfig = {}): SalienceResult {
    return withLogger(config, cfg => {
        const logger = Logger.getInstance();
        const corpus = logger.time("1. Build corpus", () => buildCorpusFromTexts(documents, cfg.tokenizer));
        return rankCorpus(corpus, cfg);
    });
}

/**
 * Rank the most salient terms of a dataset grouped by an identifier column,
 * e.g. one document per speaker, or one per episode summary
 */
export function extractSalientTermsFromDataset(
    dataset: Dataset,
    source: DatasetSource,
    config: SalienceConfig = {}
): SalienceResult {
    return withLogger(config, cfg => {
        const logger = Logger.getInstance();
        const corpus = logger.time("1. Build corpus", () =>
            buildSimpleCorpus(dataset, { ...source, tokenizer: cfg.tokenizer })
        );
        return rankCorpus(corpus, cfg);
    });
}

/**
 * Rank the most salient terms of every speaker's episodes, season by season
 */
export function extractHierarchicalSalientTerms(
    transcripts: Dataset,
    episodes: Dataset,
    config: SalienceConfig = {}
): HierarchicalExtraction {
    return withLogger(config, cfg => {
        const logger = Logger.getInstance();
        const { corpus, dropped } = logger.time("1. Build hierarchical corpus", () =>
            buildComprehensiveCorpus(transcripts, episodes, {
                columns: cfg.columns,
                splitSpeakers: cfg.splitSpeakers,
                tokenizer: cfg.tokenizer,
            })
        );
        const terms = logger.time("2. Rank terms", () => rankHierarchicalCorpus(corpus, cfg.topK));

        if (cfg.debug) {
            for (const [speaker, node] of corpus) {
                for (const [season, seasonNode] of node.seasons) {
                    logger.debug(`${speaker} / ${season}:`);
                    logScores(seasonNode.episodes, cfg.topK);
                }
            }
        }

        return { terms, dropped };
    });
}
