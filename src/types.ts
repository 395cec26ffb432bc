export const SECTION_TYPES = [
    "abstract",
    "summary",
    "introduction",
    "methodology",
    "results",
    "discussion",
    "conclusion",
    "generic",
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export interface Section {
    documentId: string;
    pageNumber: number;
    headingText?: string;
    bodyText: string;
    sectionType: SectionType;
    ordinalIndex: number; // corpus-wide, used as the ranking tie-break
}

export const TECHNICAL_LEVELS = ["beginner", "intermediate", "advanced", "expert"] as const;

export type TechnicalLevel = (typeof TECHNICAL_LEVELS)[number];

export const DOMAIN_TAGS = [
    "academic",
    "business",
    "technical",
    "educational",
    "scientific",
    "legal",
    "medical",
] as const;

export type DomainTag = (typeof DOMAIN_TAGS)[number];

export interface PersonaProfile {
    readonly rawPersonaText: string;
    readonly rawJobText: string;
    readonly role: string;
    readonly domainTags: ReadonlySet<DomainTag>;
    readonly technicalLevel: TechnicalLevel;
    readonly keywordSet: ReadonlyMap<string, number>; // term -> weight (2.0 persona, 1.0 job-only)
    readonly jobObjectives: readonly string[];
}

/** Sparse term -> weight mapping. An empty map is the all-zero vector. */
export type TermVector = ReadonlyMap<string, number>;

export const FACTOR_NAMES = [
    "similarity",
    "keywordMatch",
    "domainRelevance",
    "structuralImportance",
    "technicalAlignment",
    "objectiveAlignment",
] as const;

export type FactorName = (typeof FACTOR_NAMES)[number];

export type FactorScores = Record<FactorName, number>;

export interface RankedSection {
    section: Section;
    compositeScore: number;
    factorScores: FactorScores;
    rank: number; // 1-based
}

export type InsightTag = "quantitative" | "comparison" | "objective";

export interface ExcerptSentence {
    text: string;
    index: number; // position in the section's sentence sequence
    score: number;
    tags: InsightTag[];
}

export interface RefinedExcerpt {
    section: Section;
    rank: number;
    sentences: ExcerptSentence[];
    insightTags: InsightTag[];
    refinedText: string;
}

export type WarningCode =
    | "malformed_section"
    | "empty_corpus"
    | "duplicate_ordinal"
    | "document_skipped";

export interface AnalysisWarning {
    code: WarningCode;
    message: string;
    index?: number;
}

export interface TermFrequencyMap {
    [term: string]: number;
}
