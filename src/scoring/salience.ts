import type {
    Corpus,
    DocumentId,
    HierarchicalCorpus,
    HierarchicalSalience,
    SalienceResult,
    ScoredTerm,
    SeasonSalience,
} from "../types";
import { createFrequencyModel, type FrequencyModel } from "./frequency";
import { ConfigurationError, EmptyCorpusError } from "../errors";
import Logger from "../utils/logger";

function assertTopK(k: number): void {
    if (!Number.isInteger(k) || k < 0) {
        throw new ConfigurationError(`k must be a non-negative integer, got ${k}`, { k });
    }
}

/**
 * Score every distinct term of a document, in first-occurrence order.
 * The model computes the document's counts and modal count once.
 */
export function scoreDocument(documentId: DocumentId, model: FrequencyModel): ScoredTerm[] {
    const scored: ScoredTerm[] = [];

    for (const term of model.counts(documentId).keys()) {
        const tf = model.tf(term, documentId);
        const idf = model.idf(term);
        scored.push({ term, tf, idf, score: tf * idf });
    }

    return scored;
}

/**
 * Sort scored terms by score descending. Array.prototype.sort is stable,
 * so ties keep first-occurrence order.
 */
export function sortByScore(scored: readonly ScoredTerm[]): ScoredTerm[] {
    return [...scored].sort((a, b) => b.score - a.score);
}

/**
 * Top-k terms of one document of the model's corpus
 */
export function rankDocument(documentId: DocumentId, model: FrequencyModel, k: number): string[] {
    assertTopK(k);
    if (k === 0) return [];

    return sortByScore(scoreDocument(documentId, model))
        .slice(0, k)
        .map(s => s.term);
}

/**
 * Find the k most salient terms (highest TF-IDF) of every document in the corpus.
 * Output follows corpus order; empty documents map to an empty list.
 */
export function findMostSalient(corpus: Corpus, k: number): SalienceResult {
    assertTopK(k);
    if (corpus.size === 0) {
        throw new EmptyCorpusError("salience ranking");
    }

    const model = createFrequencyModel(corpus);
    const result: SalienceResult = new Map();

    for (const documentId of corpus.keys()) {
        result.set(documentId, rankDocument(documentId, model, k));
    }

    return result;
}

/**
 * Rank every season corpus of a hierarchical corpus independently.
 * A season that fails is reported as failed without affecting its siblings.
 */
export function rankHierarchicalCorpus(corpus: HierarchicalCorpus, k: number): HierarchicalSalience {
    assertTopK(k);
    const logger = Logger.getInstance();
    const result: HierarchicalSalience = new Map();

    for (const [speaker, node] of corpus) {
        const seasons = new Map<string, SeasonSalience>();

        for (const [season, seasonNode] of node.seasons) {
            try {
                seasons.set(season, { status: "ranked", terms: findMostSalient(seasonNode.episodes, k) });
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err));
                logger.error(`Ranking failed for ${speaker} / ${season}: ${error.message}`);
                seasons.set(season, { status: "failed", error });
            }
        }

        result.set(speaker, seasons);
    }

    return result;
}

/**
 * Convert a salience result to a plain object for serialization
 */
export function toRecord(result: SalienceResult): Record<string, string[]> {
    return Object.fromEntries(result);
}
