import {
    FACTOR_NAMES,
    TECHNICAL_LEVELS,
    type DomainTag,
    type FactorName,
    type FactorScores,
    type PersonaProfile,
    type Section,
    type SectionType,
    type TechnicalLevel,
    type TermVector,
} from "../types";
import { InvalidWeightsError } from "../errors";
import { containsTerm, termOverlapRatio } from "../preprocessing/tokenize";
import { cosineSimilarity } from "./tfidf";
import { clampUnit, safeRatio } from "../utils/shared";

/**
 * Per-section inputs, computed once before any factor runs
 */
export interface SectionFeatures {
    section: Section;
    inputIndex: number;
    /** Heading and body tokens */
    tokens: readonly string[];
    tokenSet: ReadonlySet<string>;
    vector: TermVector;
    /** Sum of persona keyword weights present in the section */
    keywordOverlap: number;
}

/**
 * Corpus-level inputs shared by every section
 */
export interface ScoringContext {
    profile: PersonaProfile;
    queryVector: TermVector;
    maxKeywordOverlap: number;
    /** Tokenized lexicon terms per domain */
    domainTerms: ReadonlyMap<DomainTag, readonly (readonly string[])[]>;
    jargon: ReadonlySet<string>;
    /** Tokenized job objectives, same order as profile.jobObjectives */
    objectiveTokens: readonly (readonly string[])[];
}

export type FactorFn = (features: SectionFeatures, ctx: ScoringContext) => number;

export interface FactorDefinition {
    name: FactorName;
    weight: number;
    compute: FactorFn;
}

export const DEFAULT_FACTOR_WEIGHTS: Readonly<FactorScores> = {
    similarity: 0.25,
    keywordMatch: 0.25,
    domainRelevance: 0.20,
    structuralImportance: 0.10,
    technicalAlignment: 0.10,
    objectiveAlignment: 0.10,
};

export const STRUCTURAL_IMPORTANCE: Readonly<Record<SectionType, number>> = {
    abstract: 1.0,
    summary: 1.0,
    conclusion: 0.8,
    results: 0.7,
    discussion: 0.7,
    methodology: 0.6,
    introduction: 0.4,
    generic: 0.2,
};

/** Jargon density cut-offs between beginner | intermediate | advanced | expert */
const JARGON_LEVEL_THRESHOLDS = [0.02, 0.05, 0.10] as const;

const NEUTRAL_DOMAIN_SCORE = 0.5;
const WEIGHT_SUM_TOLERANCE = 1e-6;

export function levelOrdinal(level: TechnicalLevel): number {
    return TECHNICAL_LEVELS.indexOf(level);
}

/**
 * Guess a section's level from the share of its tokens found in the jargon lexicon
 */
export function inferSectionLevel(tokens: readonly string[], jargon: ReadonlySet<string>): TechnicalLevel {
    let hits = 0;
    for (const token of tokens) {
        if (jargon.has(token)) hits++;
    }
    const density = safeRatio(hits, tokens.length);

    for (let i = 0; i < JARGON_LEVEL_THRESHOLDS.length; i++) {
        const threshold = JARGON_LEVEL_THRESHOLDS[i];
        if (threshold !== undefined && density < threshold) {
            return TECHNICAL_LEVELS[i] ?? "beginner";
        }
    }
    return "expert";
}

export function calculateSimilarity(features: SectionFeatures, ctx: ScoringContext): number {
    return cosineSimilarity(features.vector, ctx.queryVector);
}

/**
 * Weighted keyword overlap relative to the best-matching section in the corpus
 */
export function calculateKeywordMatch(features: SectionFeatures, ctx: ScoringContext): number {
    return safeRatio(features.keywordOverlap, ctx.maxKeywordOverlap);
}

export function calculateDomainRelevance(features: SectionFeatures, ctx: ScoringContext): number {
    const tags = ctx.profile.domainTags;
    if (tags.size === 0) return NEUTRAL_DOMAIN_SCORE;

    let matched = 0;
    for (const tag of tags) {
        const terms = ctx.domainTerms.get(tag) ?? [];
        if (terms.some(term => containsTerm(features.tokenSet, term))) {
            matched++;
        }
    }
    return matched / tags.size;
}

export function calculateStructuralImportance(features: SectionFeatures): number {
    return STRUCTURAL_IMPORTANCE[features.section.sectionType];
}

export function calculateTechnicalAlignment(features: SectionFeatures, ctx: ScoringContext): number {
    const levelRange = TECHNICAL_LEVELS.length - 1;
    const personaLevel = levelOrdinal(ctx.profile.technicalLevel);
    const sectionLevel = levelOrdinal(inferSectionLevel(features.tokens, ctx.jargon));
    return 1 - Math.abs(personaLevel - sectionLevel) / levelRange;
}

/**
 * Best share of any single objective's terms found in the section
 */
export function calculateObjectiveAlignment(features: SectionFeatures, ctx: ScoringContext): number {
    let best = 0;
    for (const objective of ctx.objectiveTokens) {
        best = Math.max(best, termOverlapRatio(objective, features.tokenSet));
    }
    return best;
}

const FACTOR_FUNCTIONS: Readonly<Record<FactorName, FactorFn>> = {
    similarity: calculateSimilarity,
    keywordMatch: calculateKeywordMatch,
    domainRelevance: calculateDomainRelevance,
    structuralImportance: calculateStructuralImportance,
    technicalAlignment: calculateTechnicalAlignment,
    objectiveAlignment: calculateObjectiveAlignment,
};

/**
 * Validate and freeze an ordered factor table.
 * Weights must be non-negative, names unique, and the sum 1.0.
 */
export function createFactorTable(entries: readonly FactorDefinition[]): readonly FactorDefinition[] {
    if (entries.length === 0) {
        throw new InvalidWeightsError("Factor table is empty");
    }

    const seen = new Set<FactorName>();
    let sum = 0;

    for (const entry of entries) {
        if (seen.has(entry.name)) {
            throw new InvalidWeightsError(`Factor "${entry.name}" appears more than once`);
        }
        if (!Number.isFinite(entry.weight) || entry.weight < 0) {
            throw new InvalidWeightsError(`Factor "${entry.name}" has invalid weight ${entry.weight}`);
        }
        seen.add(entry.name);
        sum += entry.weight;
    }

    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
        throw new InvalidWeightsError(`Factor weights sum to ${sum.toFixed(6)}, expected 1.0`);
    }

    return Object.freeze(entries.map(e => Object.freeze({ ...e })));
}

/**
 * The six standard factors with optional weight overrides
 */
export function createDefaultFactorTable(weights: Partial<FactorScores> = {}): readonly FactorDefinition[] {
    const w = { ...DEFAULT_FACTOR_WEIGHTS, ...weights };
    return createFactorTable(
        FACTOR_NAMES.map(name => ({ name, weight: w[name], compute: FACTOR_FUNCTIONS[name] }))
    );
}

/**
 * Run every factor in the table; factors missing from the table score 0
 */
export function computeFactorScores(
    features: SectionFeatures,
    ctx: ScoringContext,
    table: readonly FactorDefinition[]
): { factorScores: FactorScores; compositeScore: number } {
    const factorScores: FactorScores = {
        similarity: 0,
        keywordMatch: 0,
        domainRelevance: 0,
        structuralImportance: 0,
        technicalAlignment: 0,
        objectiveAlignment: 0,
    };

    let composite = 0;
    for (const factor of table) {
        const value = clampUnit(factor.compute(features, ctx));
        factorScores[factor.name] = value;
        composite += factor.weight * value;
    }

    return { factorScores, compositeScore: clampUnit(composite) };
}
