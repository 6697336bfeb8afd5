import { describe, it, expect } from "vitest";
import {
    maxTermCount,
    termFrequency,
    computeCorpusStats,
    inverseDocumentFrequency,
    termSalience,
    createFrequencyModel,
} from "../frequency";
import { ConfigurationError, EmptyCorpusError, TermNotInCorpusError } from "../../errors";
import type { Corpus } from "../../types";

function createCorpus(documents: Record<string, string[]>): Corpus {
    return new Map(Object.entries(documents));
}

describe("maxTermCount", () => {
    it("returns the modal count", () => {
        expect(maxTermCount(new Map([["a", 3], ["b", 1]]))).toBe(3);
    });

    it("returns 0 for an empty document", () => {
        expect(maxTermCount(new Map())).toBe(0);
    });
});

describe("termFrequency", () => {
    const counts = new Map([["a", 3], ["b", 1]]);

    it("gives the modal term exactly 1", () => {
        expect(termFrequency("a", counts)).toBe(1.0);
    });

    it("augments less frequent terms", () => {
        // 0.5 + 0.5 * (1 / 3)
        expect(termFrequency("b", counts)).toBe(0.5 + 0.5 * (1 / 3));
        expect(termFrequency("b", counts)).toBeCloseTo(0.6667, 4);
    });

    it("returns 0 for absent terms", () => {
        expect(termFrequency("c", counts)).toBe(0);
    });

    it("returns 0 for every term of an empty document", () => {
        expect(termFrequency("a", new Map())).toBe(0);
    });

    it("uses a precomputed modal count when given", () => {
        expect(termFrequency("b", counts, 2)).toBe(0.75);
    });

    it("scores every present term at least 0.5", () => {
        const skewed = new Map([["common", 100], ["rare", 1]]);

        expect(termFrequency("rare", skewed)).toBeGreaterThanOrEqual(0.5);
    });
});

describe("computeCorpusStats", () => {
    it("counts each term once per document", () => {
        const stats = computeCorpusStats(createCorpus({
            d1: ["gem", "gem", "gem"],
            d2: ["gem", "fusion"],
            d3: ["donut"],
        }));

        expect(stats.totalDocs).toBe(3);
        expect(stats.docFrequency.get("gem")).toBe(2);
        expect(stats.docFrequency.get("fusion")).toBe(1);
        expect(stats.docFrequency.get("donut")).toBe(1);
    });

    it("handles empty corpus", () => {
        const stats = computeCorpusStats(new Map());

        expect(stats.totalDocs).toBe(0);
        expect(stats.docFrequency.size).toBe(0);
    });

    it("counts empty documents toward the corpus size", () => {
        const stats = computeCorpusStats(createCorpus({ d1: ["a"], d2: [] }));

        expect(stats.totalDocs).toBe(2);
    });
});

describe("inverseDocumentFrequency", () => {
    const stats = computeCorpusStats(createCorpus({
        d1: ["a", "b", "c", "d"],
        d2: ["b", "c", "d"],
        d3: ["c", "d"],
        d4: ["d"],
    }));

    it("computes ln(N / df)", () => {
        expect(inverseDocumentFrequency("b", stats)).toBe(Math.log(4 / 2));
        expect(inverseDocumentFrequency("b", stats)).toBeCloseTo(0.6931, 4);
    });

    it("is zero for a term in every document", () => {
        expect(inverseDocumentFrequency("d", stats)).toBe(0);
    });

    it("strictly decreases as document frequency grows", () => {
        const idfs = ["a", "b", "c", "d"].map(term => inverseDocumentFrequency(term, stats));

        for (let i = 1; i < idfs.length; i++) {
            expect(idfs[i]).toBeLessThan(idfs[i - 1] ?? Infinity);
        }
    });

    it("throws TermNotInCorpusError for an absent term", () => {
        expect(() => inverseDocumentFrequency("zircon", stats)).toThrow(TermNotInCorpusError);

        try {
            inverseDocumentFrequency("zircon", stats);
            expect.unreachable();
        } catch (err) {
            expect(err).toMatchObject({ code: "TERM_NOT_IN_CORPUS", term: "zircon" });
        }
    });

    it("throws EmptyCorpusError for an empty corpus", () => {
        const empty = computeCorpusStats(new Map());

        expect(() => inverseDocumentFrequency("a", empty)).toThrow(EmptyCorpusError);
    });
});

describe("termSalience", () => {
    it("multiplies tf by idf", () => {
        const stats = computeCorpusStats(createCorpus({ d1: ["a", "a", "b"], d2: ["b"] }));
        const counts = new Map([["a", 2], ["b", 1]]);

        expect(termSalience("a", counts, stats)).toBe(1 * Math.log(2));
        expect(termSalience("b", counts, stats)).toBe(0.75 * 0);
    });
});

describe("createFrequencyModel", () => {
    const model = createFrequencyModel(createCorpus({
        d1: ["a", "a", "b"],
        d2: ["b", "c"],
        d3: ["a", "c", "c"],
    }));

    it("exposes corpus statistics", () => {
        expect(model.stats.totalDocs).toBe(3);
        expect(model.stats.docFrequency.get("a")).toBe(2);
    });

    it("exposes each document's term counts", () => {
        expect([...model.counts("d1")]).toEqual([["a", 2], ["b", 1]]);
        expect(model.counts("d1")).toBe(model.counts("d1"));
    });

    it("computes tf per document", () => {
        expect(model.tf("a", "d1")).toBe(1);
        expect(model.tf("b", "d1")).toBe(0.75);
        expect(model.tf("c", "d1")).toBe(0);
    });

    it("computes idf over the corpus", () => {
        expect(model.idf("c")).toBe(Math.log(3 / 2));
    });

    it("computes tfidf as the product", () => {
        expect(model.tfidf("b", "d1")).toBe(0.75 * Math.log(3 / 2));
        expect(model.tfidf("c", "d3")).toBe(1 * Math.log(3 / 2));
    });

    it("returns the same value on repeated calls", () => {
        expect(model.tfidf("a", "d3")).toBe(model.tfidf("a", "d3"));
    });

    it("throws a ConfigurationError for an unknown document", () => {
        expect(() => model.tf("a", "d9")).toThrow(ConfigurationError);
    });

    it("throws TermNotInCorpusError for idf of an unseen term", () => {
        expect(() => model.tfidf("zircon", "d1")).toThrow(TermNotInCorpusError);
    });
});
