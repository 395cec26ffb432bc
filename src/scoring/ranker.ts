import type { DomainTag, FactorScores, PersonaProfile, RankedSection, Section } from "../types";
import { getDefaultLexicons, type Lexicons } from "../lexicons";
import { createTokenizer, weightedKeywordOverlap, type Tokenizer } from "../preprocessing/tokenize";
import type { VectorSpace } from "./tfidf";
import {
    computeFactorScores,
    createDefaultFactorTable,
    createFactorTable,
    type FactorDefinition,
    type ScoringContext,
    type SectionFeatures,
} from "./factors";
import { sortByScoreThenOrdinal } from "../utils/shared";

export interface ScorerConfig {
    /** Overrides for the default factor weights; the result must still sum to 1.0 */
    weights?: Partial<FactorScores>;
    /** A complete replacement factor table (takes precedence over weights) */
    factors?: readonly FactorDefinition[];
    lexicons?: Lexicons;
    tokenizer?: Tokenizer;
}

/**
 * Build the corpus-level scoring context from the profile and lexicons
 */
export function prepareScoringContext(
    profile: PersonaProfile,
    space: VectorSpace,
    features: readonly SectionFeatures[],
    lexicons: Lexicons,
    tokenizer: Tokenizer
): ScoringContext {
    const domainTerms = new Map<DomainTag, string[][]>();
    for (const domain of lexicons.domains) {
        domainTerms.set(domain.tag, domain.terms.map(term => tokenizer.tokenize(term)));
    }

    const jargon = new Set<string>();
    for (const term of lexicons.jargon) {
        for (const token of tokenizer.tokenize(term)) {
            jargon.add(token);
        }
    }

    let maxKeywordOverlap = 0;
    for (const f of features) {
        maxKeywordOverlap = Math.max(maxKeywordOverlap, f.keywordOverlap);
    }

    return {
        profile,
        queryVector: space.queryVector,
        maxKeywordOverlap,
        domainTerms,
        jargon,
        objectiveTokens: profile.jobObjectives.map(o => tokenizer.tokenize(o)),
    };
}

/**
 * Tokenize heading and body once per section
 */
export function extractSectionFeatures(
    sections: readonly Section[],
    space: VectorSpace,
    profile: PersonaProfile,
    tokenizer: Tokenizer
): SectionFeatures[] {
    return sections.map((section, inputIndex) => {
        const tokens = tokenizer.tokenize(`${section.headingText ?? ""} ${section.bodyText}`);
        const tokenSet = new Set(tokens);
        return {
            section,
            inputIndex,
            tokens,
            tokenSet,
            vector: space.sectionVectors[inputIndex] ?? new Map<string, number>(),
            keywordOverlap: weightedKeywordOverlap(tokenSet, profile.keywordSet),
        };
    });
}

/**
 * Order scored sections: composite descending, ordinal index ascending, input order ascending.
 * Ranks are assigned 1..n in that order.
 */
export function orderRankedSections(
    scored: ReadonlyArray<Omit<RankedSection, "rank"> & { inputIndex?: number }>
): RankedSection[] {
    const sortable = scored.map((entry, i) => ({
        entry,
        score: entry.compositeScore,
        ordinalIndex: entry.section.ordinalIndex,
        inputIndex: entry.inputIndex ?? i,
    }));

    return sortByScoreThenOrdinal(sortable).map((s, i) => ({
        section: s.entry.section,
        compositeScore: s.entry.compositeScore,
        factorScores: s.entry.factorScores,
        rank: i + 1,
    }));
}

/**
 * Score every section against the persona and return the full ranking
 */
export function scoreSections(
    sections: readonly Section[],
    space: VectorSpace,
    profile: PersonaProfile,
    config: ScorerConfig = {}
): RankedSection[] {
    if (sections.length === 0) return [];

    const lexicons = config.lexicons ?? getDefaultLexicons();
    const tokenizer = config.tokenizer ?? createTokenizer({ stopWords: lexicons.stopWords });
    const table = config.factors !== undefined
        ? createFactorTable(config.factors)
        : createDefaultFactorTable(config.weights);

    const features = extractSectionFeatures(sections, space, profile, tokenizer);
    const ctx = prepareScoringContext(profile, space, features, lexicons, tokenizer);

    const scored = features.map(f => ({
        section: f.section,
        inputIndex: f.inputIndex,
        ...computeFactorScores(f, ctx, table),
    }));

    return orderRankedSections(scored);
}
