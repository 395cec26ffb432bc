import { describe, it, expect } from "vitest";
import {
    calculateIdf,
    computeDocumentStats,
    cosineSimilarity,
    fitVectorSpace,
    l2Normalize,
    vectorizeTokens,
} from "../tfidf";
import { buildPersonaProfile } from "../../profile/persona";
import { getDefaultLexicons } from "../../lexicons";
import { createTokenizer } from "../../preprocessing/tokenize";
import type { Section } from "../../types";

const plain = createTokenizer({ stopWords: getDefaultLexicons().stopWords, applyStemming: false });

function createSection(bodyText: string, ordinalIndex: number, options: Partial<Section> = {}): Section {
    return {
        documentId: "doc.txt",
        pageNumber: 1,
        bodyText,
        sectionType: "generic",
        ordinalIndex,
        ...options,
    };
}

describe("computeDocumentStats", () => {
    it("counts each term once per section", () => {
        const stats = computeDocumentStats([["gene", "gene"], ["gene", "cell"]]);

        expect(stats.totalDocs).toBe(2);
        expect(stats.docFrequency.get("gene")).toBe(2);
        expect(stats.docFrequency.get("cell")).toBe(1);
    });
});

describe("calculateIdf", () => {
    const stats = computeDocumentStats([["gene", "cell"], ["gene"], ["organ"]]);

    it("uses ln(N / (1 + df))", () => {
        expect(calculateIdf("gene", stats)).toBe(0);
        expect(calculateIdf("cell", stats)).toBeCloseTo(Math.log(3 / 2), 10);
    });

    it("gives unseen terms ln(N)", () => {
        expect(calculateIdf("tissue", stats)).toBeCloseTo(Math.log(3), 10);
    });

    it("is 0 for an empty corpus", () => {
        expect(calculateIdf("gene", computeDocumentStats([]))).toBe(0);
    });
});

describe("l2Normalize", () => {
    it("scales to unit length", () => {
        const v = l2Normalize(new Map([["x", 3], ["y", 4]]));

        expect(v.get("x")).toBeCloseTo(0.6, 10);
        expect(v.get("y")).toBeCloseTo(0.8, 10);
    });

    it("drops zero weights", () => {
        const v = l2Normalize(new Map([["x", 0], ["y", 2]]));
        expect([...v.entries()]).toEqual([["y", 1]]);
    });

    it("returns an empty vector for all-zero input", () => {
        expect(l2Normalize(new Map([["x", 0]])).size).toBe(0);
    });
});

describe("cosineSimilarity", () => {
    const v = l2Normalize(new Map([["x", 3], ["y", 4]]));

    it("is 1 for identical vectors", () => {
        expect(cosineSimilarity(v, v)).toBeCloseTo(1, 10);
    });

    it("is 0 when either vector is empty", () => {
        expect(cosineSimilarity(new Map(), v)).toBe(0);
        expect(cosineSimilarity(v, new Map())).toBe(0);
    });

    it("is 0 for disjoint vectors", () => {
        expect(cosineSimilarity(v, new Map([["z", 1]]))).toBe(0);
    });

    it("never exceeds 1", () => {
        const heavy = new Map([["x", 1.0000001]]);
        expect(cosineSimilarity(heavy, heavy)).toBe(1);
    });
});

describe("vectorizeTokens", () => {
    it("weights term frequency by IDF", () => {
        const v = vectorizeTokens(["gene", "gene", "cell"], () => 1);

        expect(v.get("gene")).toBeCloseTo(2 / Math.sqrt(5), 10);
        expect(v.get("cell")).toBeCloseTo(1 / Math.sqrt(5), 10);
    });

    it("returns an empty vector for no tokens", () => {
        expect(vectorizeTokens([], () => 1).size).toBe(0);
    });
});

describe("fitVectorSpace", () => {
    const sections = [
        createSection("gene expression in cells", 0),
        createSection("gene regulation networks", 1),
        createSection("market revenue growth", 2),
    ];
    const profile = buildPersonaProfile("geneticist", "gene regulation", { tokenizer: plain });
    const space = fitVectorSpace(sections, profile, plain);

    it("builds a sorted vocabulary including persona-only terms", () => {
        expect(space.vocabulary).toEqual([
            "cells", "expression", "gene", "geneticist", "growth",
            "market", "networks", "regulation", "revenue",
        ]);
    });

    it("gives persona-only terms the maximum IDF", () => {
        expect(space.idf("geneticist")).toBeCloseTo(Math.log(3), 10);
        expect(space.idf("gene")).toBe(0);
    });

    it("emits one vector per section", () => {
        expect(space.sectionVectors).toHaveLength(3);
        expect(space.sectionVectors[1]?.get("regulation")).toBeCloseTo(1 / Math.sqrt(2), 10);
    });

    it("weights the query by keyword weight times IDF", () => {
        const geneticist = 2 * Math.log(3);
        const regulation = Math.log(1.5);
        const norm = Math.sqrt(geneticist ** 2 + regulation ** 2);

        expect(space.queryVector.get("geneticist")).toBeCloseTo(geneticist / norm, 10);
        expect(space.queryVector.get("regulation")).toBeCloseTo(regulation / norm, 10);
        expect(space.queryVector.has("gene")).toBe(false);
    });

    it("scores only sections sharing weighted query terms", () => {
        const query = space.queryVector;
        const norm = Math.sqrt((2 * Math.log(3)) ** 2 + Math.log(1.5) ** 2);

        expect(cosineSimilarity(space.sectionVectors[1] ?? new Map(), query))
            .toBeCloseTo((1 / Math.sqrt(2)) * (Math.log(1.5) / norm), 10);
        expect(cosineSimilarity(space.sectionVectors[0] ?? new Map(), query)).toBe(0);
        expect(cosineSimilarity(space.sectionVectors[2] ?? new Map(), query)).toBe(0);
    });

    it("freezes the fitted space", () => {
        expect(Object.isFrozen(space)).toBe(true);
        expect(Object.isFrozen(space.vocabulary)).toBe(true);
    });
});
