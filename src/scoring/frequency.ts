import type { Corpus, CorpusStats, Document, DocumentId, TermCounts, Token } from "../types";
import { countTerms, getUniqueTerms } from "../preprocessing/tokenize";
import { ConfigurationError, EmptyCorpusError, TermNotInCorpusError } from "../errors";

export interface FrequencyModel {
    /** Term counts of one document, computed once and reused */
    counts: (documentId: DocumentId) => TermCounts;
    /** Augmented term frequency of `term` in the given document */
    tf: (term: Token, documentId: DocumentId) => number;
    idf: (term: Token) => number;
    tfidf: (term: Token, documentId: DocumentId) => number;
    stats: CorpusStats;
}

/**
 * Highest count in a document, in a single pass. 0 for an empty document.
 */
export function maxTermCount(counts: TermCounts): number {
    let max = 0;
    for (const count of counts.values()) {
        if (count > max) max = count;
    }
    return max;
}

/**
 * Augmented term frequency: 0.5 + 0.5 * (count / modal count), or 0 when the
 * term is absent. Pass `maxCount` when scoring many terms of one document.
 */
export function termFrequency(term: Token, counts: TermCounts, maxCount?: number): number {
    if (counts.size === 0) return 0;

    const count = counts.get(term);
    if (count === undefined) return 0;

    const max = maxCount ?? maxTermCount(counts);
    return 0.5 + 0.5 * (count / max);
}

/**
 * Compute corpus statistics for IDF calculation
 */
export function computeCorpusStats(corpus: Corpus): CorpusStats {
    const docFrequency = new Map<Token, number>();

    for (const tokens of corpus.values()) {
        // Count unique terms per document
        for (const term of getUniqueTerms(tokens)) {
            docFrequency.set(term, (docFrequency.get(term) ?? 0) + 1);
        }
    }

    return {
        totalDocs: corpus.size,
        docFrequency,
    };
}

/**
 * Inverse document frequency: ln(N / df).
 * Throws instead of dividing when the corpus is empty or the term never occurs.
 */
export function inverseDocumentFrequency(term: Token, stats: CorpusStats): number {
    if (stats.totalDocs === 0) {
        throw new EmptyCorpusError("inverse document frequency");
    }

    const df = stats.docFrequency.get(term) ?? 0;
    if (df === 0) {
        throw new TermNotInCorpusError(term);
    }

    return Math.log(stats.totalDocs / df);
}

/**
 * TF-IDF of a term in one document's counts against corpus statistics
 */
export function termSalience(term: Token, counts: TermCounts, stats: CorpusStats, maxCount?: number): number {
    return termFrequency(term, counts, maxCount) * inverseDocumentFrequency(term, stats);
}

/**
 * Create a frequency model over a corpus. Corpus statistics are computed once;
 * per-document counts are computed on first use and reused.
 */
export function createFrequencyModel(corpus: Corpus): FrequencyModel {
    const stats = computeCorpusStats(corpus);
    const countsCache = new Map<DocumentId, { counts: TermCounts; maxCount: number }>();

    function documentCounts(documentId: DocumentId): { counts: TermCounts; maxCount: number } {
        const cached = countsCache.get(documentId);
        if (cached) return cached;

        const tokens: Document | undefined = corpus.get(documentId);
        if (tokens === undefined) {
            throw new ConfigurationError(`Unknown document "${documentId}"`, { documentId });
        }

        const termCounts = countTerms(tokens);
        const entry = { counts: termCounts, maxCount: maxTermCount(termCounts) };
        countsCache.set(documentId, entry);
        return entry;
    }

    function counts(documentId: DocumentId): TermCounts {
        return documentCounts(documentId).counts;
    }

    function tf(term: Token, documentId: DocumentId): number {
        const entry = documentCounts(documentId);
        return termFrequency(term, entry.counts, entry.maxCount);
    }

    function idf(term: Token): number {
        return inverseDocumentFrequency(term, stats);
    }

    function tfidf(term: Token, documentId: DocumentId): number {
        return tf(term, documentId) * idf(term);
    }

    return {
        counts,
        tf,
        idf,
        tfidf,
        stats,
    };
}
