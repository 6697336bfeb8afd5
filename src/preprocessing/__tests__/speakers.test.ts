import { describe, it, expect } from "vitest";
import { cleanSpeaker, listCleanSpeakers } from "../speakers";
import { createDataset } from "../../corpus/dataset";
import { ConfigurationError } from "../../errors";

describe("cleanSpeaker", () => {
    it("splits comma and ampersand separated credits", () => {
        expect(cleanSpeaker("Amethyst, Ruby & Sapphire")).toEqual(["Amethyst", "Ruby", "Sapphire"]);
    });

    it("splits on a standalone 'and'", () => {
        expect(cleanSpeaker("Mr. Smiley and Jamie")).toEqual(["Mr. Smiley", "Jamie"]);
    });

    it("does not split names containing 'and'", () => {
        expect(cleanSpeaker("Roland")).toEqual(["Roland"]);
        expect(cleanSpeaker("Sandy and Andy")).toEqual(["Sandy", "Andy"]);
    });

    it("trims names and drops empty parts", () => {
        expect(cleanSpeaker("  Garnet &  ")).toEqual(["Garnet"]);
    });

    it("returns each speaker once", () => {
        expect(cleanSpeaker("Steven and Steven")).toEqual(["Steven"]);
    });

    it("returns a single speaker unchanged", () => {
        expect(cleanSpeaker("Steven")).toEqual(["Steven"]);
    });
});

describe("listCleanSpeakers", () => {
    it("lists distinct speaker groups regardless of order", () => {
        const dataset = createDataset([
            { speaker: "Steven" },
            { speaker: "Pearl, Garnet" },
            { speaker: "Garnet & Pearl" },
            { speaker: null },
            { speaker: "Steven" },
        ]);

        expect(listCleanSpeakers(dataset, "speaker")).toEqual([["Steven"], ["Garnet", "Pearl"]]);
    });

    it("throws for an unknown column", () => {
        const dataset = createDataset([{ speaker: "Steven" }]);

        expect(() => listCleanSpeakers(dataset, "character")).toThrow(ConfigurationError);
    });
});
