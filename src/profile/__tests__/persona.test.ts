import { describe, it, expect } from "vitest";
import {
    buildKeywordSet,
    buildPersonaProfile,
    detectDomainTags,
    detectRole,
    detectTechnicalLevel,
    extractJobObjectives,
} from "../persona";
import { getDefaultLexicons } from "../../lexicons";
import { createTokenizer } from "../../preprocessing/tokenize";
import { InsufficientInputError, isAnalysisError } from "../../errors";

const lexicons = getDefaultLexicons();
const plain = createTokenizer({ stopWords: lexicons.stopWords, applyStemming: false });

describe("detectRole", () => {
    it("picks the first matching role", () => {
        expect(detectRole("PhD researcher in computational biology", lexicons))
            .toEqual({ role: "researcher", defaultLevel: "advanced" });
    });

    it("matches multi-word markers", () => {
        expect(detectRole("Senior Investment Analyst", lexicons).role).toBe("analyst");
    });

    it("falls back to the default role", () => {
        expect(detectRole("curious person", lexicons))
            .toEqual({ role: "generalist", defaultLevel: "intermediate" });
    });
});

describe("detectTechnicalLevel", () => {
    it("prefers the highest explicit marker", () => {
        expect(detectTechnicalLevel("PhD researcher", "advanced", lexicons)).toBe("expert");
    });

    it("reads seniority markers", () => {
        expect(detectTechnicalLevel("Senior Investment Analyst", "intermediate", lexicons)).toBe("advanced");
    });

    it("does not match markers inside longer words", () => {
        expect(detectTechnicalLevel("Undergraduate chemistry student", "beginner", lexicons)).toBe("intermediate");
    });

    it("uses the role default without markers", () => {
        expect(detectTechnicalLevel("Chemistry student", "beginner", lexicons)).toBe("beginner");
    });
});

describe("detectDomainTags", () => {
    it("tags every domain with at least one lexicon hit", () => {
        const tokens = new Set(plain.tokenize("PhD researcher in computational biology"));
        const tags = detectDomainTags(tokens, lexicons, plain);

        expect([...tags]).toEqual(["academic", "technical", "scientific"]);
    });

    it("returns an empty set without hits", () => {
        expect(detectDomainTags(new Set(["gardening"]), lexicons, plain).size).toBe(0);
    });
});

describe("buildKeywordSet", () => {
    it("weights persona terms above job-only terms", () => {
        const keywords = buildKeywordSet(["graph", "neural"], ["neural", "review"]);

        expect(keywords.get("graph")).toBe(2);
        expect(keywords.get("neural")).toBe(2);
        expect(keywords.get("review")).toBe(1);
        expect(keywords.size).toBe(3);
    });
});

describe("extractJobObjectives", () => {
    it("splits on punctuation and conjunctions", () => {
        const objectives = extractJobObjectives(
            "Prepare a literature review, focusing on methods and datasets.",
            lexicons,
            plain
        );
        expect(objectives).toEqual(["prepare a literature review", "focusing on methods", "datasets"]);
    });

    it("drops duplicate phrases", () => {
        expect(extractJobObjectives("Compare revenue; compare revenue", lexicons, plain))
            .toEqual(["compare revenue"]);
    });

    it("caps phrase length", () => {
        expect(extractJobObjectives("one two three four five", lexicons, plain, 3))
            .toEqual(["one two three"]);
    });

    it("skips phrases made only of stop words", () => {
        expect(extractJobObjectives("Summarize trends, and the", lexicons, plain))
            .toEqual(["summarize trends"]);
    });
});

describe("buildPersonaProfile", () => {
    it("builds a researcher profile", () => {
        const profile = buildPersonaProfile(
            "PhD researcher in computational biology",
            "Prepare a literature review on graph neural networks",
            { tokenizer: plain }
        );

        expect(profile.role).toBe("researcher");
        expect(profile.technicalLevel).toBe("expert");
        expect(profile.keywordSet.get("researcher")).toBe(2);
        expect(profile.keywordSet.get("literature")).toBe(1);
        expect([...profile.domainTags]).toEqual(["academic", "technical", "scientific"]);
        expect(profile.jobObjectives).toEqual(["prepare a literature review on graph neural networks"]);
    });

    it("accepts a job without a persona", () => {
        const profile = buildPersonaProfile("", "Summarize revenue trends", { tokenizer: plain });

        expect(profile.role).toBe("generalist");
        expect([...profile.keywordSet.values()]).toEqual([1, 1, 1]);
        expect(profile.domainTags.has("business")).toBe(true);
    });

    it("throws when both texts are blank", () => {
        expect(() => buildPersonaProfile("", "   ")).toThrow(InsufficientInputError);

        expect(() => buildPersonaProfile(" ", "")).toThrow("Persona and job descriptions are both empty");
    });

    it("carries the insufficient_input code", () => {
        const error = new InsufficientInputError();
        expect(isAnalysisError(error)).toBe(true);
        expect(error.code).toBe("insufficient_input");
    });

    it("returns a frozen profile", () => {
        const profile = buildPersonaProfile("Data analyst", "Review quarterly sales");

        expect(Object.isFrozen(profile)).toBe(true);
        expect(Object.isFrozen(profile.jobObjectives)).toBe(true);
        expect(Object.isFrozen(profile.domainTags)).toBe(true);
        expect(Object.isFrozen(profile.keywordSet)).toBe(true);
        expect("add" in profile.domainTags).toBe(false);
        expect("set" in profile.keywordSet).toBe(false);
        expect("delete" in profile.keywordSet).toBe(false);
    });

    it("keeps mixed-case persona terms with the default tokenizer", () => {
        const profile = buildPersonaProfile(
            "PhD Researcher in Computational Biology",
            "literature review focusing on methodologies"
        );

        expect(profile.technicalLevel).toBe("expert");
        expect(profile.keywordSet.get("phd")).toBe(2);
        expect(profile.domainTags.has("academic")).toBe(true);
    });
});
