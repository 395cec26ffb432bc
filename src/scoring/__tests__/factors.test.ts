import { describe, it, expect } from "vitest";
import {
    STRUCTURAL_IMPORTANCE,
    calculateDomainRelevance,
    calculateKeywordMatch,
    calculateObjectiveAlignment,
    calculateStructuralImportance,
    calculateTechnicalAlignment,
    computeFactorScores,
    createDefaultFactorTable,
    createFactorTable,
    inferSectionLevel,
    type ScoringContext,
    type SectionFeatures,
} from "../factors";
import { InvalidWeightsError } from "../../errors";
import { FACTOR_NAMES, type DomainTag, type PersonaProfile } from "../../types";

function createProfile(overrides: Partial<PersonaProfile> = {}): PersonaProfile {
    return {
        rawPersonaText: "",
        rawJobText: "",
        role: "generalist",
        domainTags: new Set<DomainTag>(),
        technicalLevel: "intermediate",
        keywordSet: new Map<string, number>(),
        jobObjectives: [],
        ...overrides,
    };
}

function createContext(overrides: Partial<ScoringContext> = {}): ScoringContext {
    return {
        profile: createProfile(),
        queryVector: new Map<string, number>(),
        maxKeywordOverlap: 0,
        domainTerms: new Map<DomainTag, string[][]>(),
        jargon: new Set<string>(),
        objectiveTokens: [],
        ...overrides,
    };
}

function createFeatures(tokens: string[], overrides: Partial<SectionFeatures> = {}): SectionFeatures {
    return {
        section: {
            documentId: "doc.txt",
            pageNumber: 1,
            bodyText: tokens.join(" "),
            sectionType: "generic",
            ordinalIndex: 0,
        },
        inputIndex: 0,
        tokens,
        tokenSet: new Set(tokens),
        vector: new Map<string, number>(),
        keywordOverlap: 0,
        ...overrides,
    };
}

function repeat(token: string, count: number): string[] {
    return Array.from({ length: count }, () => token);
}

describe("createFactorTable", () => {
    const one = () => 1;

    it("rejects an empty table", () => {
        expect(() => createFactorTable([])).toThrow(InvalidWeightsError);
    });

    it("rejects duplicate names", () => {
        expect(() => createFactorTable([
            { name: "similarity", weight: 0.5, compute: one },
            { name: "similarity", weight: 0.5, compute: one },
        ])).toThrow("Factor \"similarity\" appears more than once");
    });

    it("rejects negative weights", () => {
        expect(() => createFactorTable([
            { name: "similarity", weight: -0.5, compute: one },
            { name: "keywordMatch", weight: 1.5, compute: one },
        ])).toThrow("Factor \"similarity\" has invalid weight -0.5");
    });

    it("rejects weights that do not sum to 1", () => {
        expect(() => createFactorTable([
            { name: "similarity", weight: 0.5, compute: one },
            { name: "keywordMatch", weight: 0.4, compute: one },
        ])).toThrow("Factor weights sum to 0.900000, expected 1.0");
    });

    it("accepts a partial table that sums to 1", () => {
        const table = createFactorTable([
            { name: "similarity", weight: 0.6, compute: one },
            { name: "objectiveAlignment", weight: 0.4, compute: one },
        ]);
        expect(table.map(f => f.name)).toEqual(["similarity", "objectiveAlignment"]);
        expect(Object.isFrozen(table)).toBe(true);
    });
});

describe("createDefaultFactorTable", () => {
    it("lists the six factors in order with default weights", () => {
        const table = createDefaultFactorTable();

        expect(table.map(f => f.name)).toEqual([...FACTOR_NAMES]);
        expect(table.map(f => f.weight)).toEqual([0.25, 0.25, 0.20, 0.10, 0.10, 0.10]);
    });

    it("applies overrides that keep the sum at 1", () => {
        const table = createDefaultFactorTable({ similarity: 0.35, keywordMatch: 0.15 });
        expect(table[0]?.weight).toBe(0.35);
        expect(table[1]?.weight).toBe(0.15);
    });

    it("rejects overrides that break the sum", () => {
        expect(() => createDefaultFactorTable({ similarity: 0.5 }))
            .toThrow("Factor weights sum to 1.250000, expected 1.0");
    });
});

describe("inferSectionLevel", () => {
    const jargon = new Set(["gradient"]);

    it("maps jargon density to a level", () => {
        expect(inferSectionLevel(repeat("plain", 10), jargon)).toBe("beginner");
        expect(inferSectionLevel([...repeat("plain", 39), "gradient"], jargon)).toBe("intermediate");
        expect(inferSectionLevel([...repeat("plain", 37), ...repeat("gradient", 3)], jargon)).toBe("advanced");
        expect(inferSectionLevel([...repeat("plain", 9), "gradient"], jargon)).toBe("expert");
    });

    it("treats an empty section as beginner", () => {
        expect(inferSectionLevel([], jargon)).toBe("beginner");
    });
});

describe("factor functions", () => {
    it("normalizes keyword overlap by the corpus maximum", () => {
        const ctx = createContext({ maxKeywordOverlap: 3 });
        expect(calculateKeywordMatch(createFeatures([], { keywordOverlap: 1.5 }), ctx)).toBe(0.5);
        expect(calculateKeywordMatch(createFeatures([]), createContext())).toBe(0);
    });

    it("scores domain relevance as the share of persona tags present", () => {
        const ctx = createContext({
            profile: createProfile({ domainTags: new Set<DomainTag>(["academic", "business"]) }),
            domainTerms: new Map<DomainTag, string[][]>([
                ["academic", [["research"]]],
                ["business", [["revenue"]]],
            ]),
        });
        expect(calculateDomainRelevance(createFeatures(["research", "method"]), ctx)).toBe(0.5);
    });

    it("is neutral on domains when the persona has no tags", () => {
        expect(calculateDomainRelevance(createFeatures(["anything"]), createContext())).toBe(0.5);
    });

    it("looks up structural importance by section type", () => {
        const features = createFeatures([]);
        const abstract = { ...features, section: { ...features.section, sectionType: "abstract" as const } };

        expect(calculateStructuralImportance(abstract)).toBe(1);
        expect(calculateStructuralImportance(features)).toBe(STRUCTURAL_IMPORTANCE.generic);
    });

    it("penalizes distance between persona and section level", () => {
        const ctx = createContext({ profile: createProfile({ technicalLevel: "expert" }) });
        expect(calculateTechnicalAlignment(createFeatures(repeat("plain", 10)), ctx)).toBe(0);

        const beginner = createContext({ profile: createProfile({ technicalLevel: "beginner" }) });
        expect(calculateTechnicalAlignment(createFeatures(repeat("plain", 10)), beginner)).toBe(1);
    });

    it("takes the best single objective overlap", () => {
        const ctx = createContext({ objectiveTokens: [["graph", "neural"], ["datasets"]] });
        expect(calculateObjectiveAlignment(createFeatures(["graph", "model"]), ctx)).toBe(0.5);
        expect(calculateObjectiveAlignment(createFeatures(["graph"]), createContext())).toBe(0);
    });
});

describe("computeFactorScores", () => {
    it("clamps each factor and weights the composite", () => {
        const table = createFactorTable([
            { name: "similarity", weight: 0.5, compute: () => 2 },
            { name: "keywordMatch", weight: 0.5, compute: () => 0.4 },
        ]);

        const { factorScores, compositeScore } = computeFactorScores(createFeatures([]), createContext(), table);

        expect(factorScores.similarity).toBe(1);
        expect(factorScores.keywordMatch).toBe(0.4);
        expect(factorScores.domainRelevance).toBe(0);
        expect(compositeScore).toBeCloseTo(0.7, 10);
    });

    it("turns NaN factor values into 0", () => {
        const table = createFactorTable([{ name: "similarity", weight: 1, compute: () => Number.NaN }]);
        const { factorScores, compositeScore } = computeFactorScores(createFeatures([]), createContext(), table);

        expect(factorScores.similarity).toBe(0);
        expect(compositeScore).toBe(0);
    });
});
