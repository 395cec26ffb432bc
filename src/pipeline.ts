import type { AnalysisWarning, PersonaProfile, RankedSection, RefinedExcerpt } from "./types";
import { getDefaultLexicons, type Lexicons } from "./lexicons";
import { createTokenizer, type TokenizeOptions } from "./preprocessing/tokenize";
import { createSentenceSplitter } from "./preprocessing/sentences";
import { buildPersonaProfile } from "./profile/persona";
import { validateSections } from "./input/sections";
import { fitVectorSpace } from "./scoring/tfidf";
import { scoreSections, type ScorerConfig } from "./scoring/ranker";
import { refineSections, type RefinerConfig } from "./output/refine";
import { truncateText } from "./utils/shared";
import Logger from "./utils/logger";

export interface PipelineConfig {
    /** Number of top sections to refine */
    topK?: number;
    maxSentencesPerSection?: number;
    scorer?: Pick<ScorerConfig, "weights" | "factors">;
    refiner?: Pick<RefinerConfig, "minSentenceChars" | "objectiveTagThreshold">;
    tokenizer?: TokenizeOptions;
    lexicons?: Lexicons;
    debug?: boolean;
}

export interface PipelineDebugInfo {
    sectionCount: number;
    skippedCount: number;
    vocabularySize: number;
    topSections: Array<{
        documentId: string;
        heading: string;
        score: number;
    }>;
}

export interface AnalysisResult {
    profile: PersonaProfile;
    /** Every valid section, best first */
    ranked: RankedSection[];
    /** Refined excerpts for the first topK entries of ranked */
    excerpts: RefinedExcerpt[];
    warnings: AnalysisWarning[];
    debug?: PipelineDebugInfo;
}

type ResolvedConfig = Required<Omit<PipelineConfig, "lexicons">> & { lexicons: Lexicons };

export const DEFAULT_CONFIG = {
    topK: 5,
    maxSentencesPerSection: 5,
    scorer: {},
    refiner: {
        minSentenceChars: 20,
        objectiveTagThreshold: 0.5,
    },
    tokenizer: {
        applyStemming: true,
        minLength: 3,
    },
    debug: false,
} as const satisfies Omit<PipelineConfig, "lexicons">;

/**
 * Merge overrides into the defaults, one level deep per stage
 */
function mergeConfig(overrides: PipelineConfig): ResolvedConfig {
    return {
        topK: overrides.topK ?? DEFAULT_CONFIG.topK,
        maxSentencesPerSection: overrides.maxSentencesPerSection ?? DEFAULT_CONFIG.maxSentencesPerSection,
        scorer: { ...DEFAULT_CONFIG.scorer, ...overrides.scorer },
        refiner: { ...DEFAULT_CONFIG.refiner, ...overrides.refiner },
        tokenizer: { ...DEFAULT_CONFIG.tokenizer, ...overrides.tokenizer },
        lexicons: overrides.lexicons ?? getDefaultLexicons(),
        debug: overrides.debug ?? DEFAULT_CONFIG.debug,
    };
}

/**
 * Run the full analysis: profile, validate, vectorize, score, refine.
 * Throws InsufficientInputError before touching the corpus when persona and job are both blank.
 */
export function analyze(
    personaText: string,
    jobText: string,
    records: readonly unknown[],
    config: PipelineConfig = {}
): AnalysisResult {
    const cfg = mergeConfig(config);
    const logger = Logger.getInstance();

    const tokenizer = createTokenizer({ stopWords: cfg.lexicons.stopWords, ...cfg.tokenizer });
    const splitter = createSentenceSplitter(cfg.lexicons.abbreviations);

    // Step 1: Persona profile
    const profile = logger.time("1. Build persona profile", () =>
        buildPersonaProfile(personaText, jobText, { lexicons: cfg.lexicons, tokenizer })
    );

    // Step 2: Validate section records
    const { sections, warnings } = logger.time("2. Validate sections", () => validateSections(records));

    if (sections.length === 0) {
        warnings.push({ code: "empty_corpus", message: "No valid sections to rank" });
        return {
            profile,
            ranked: [],
            excerpts: [],
            warnings,
            ...(cfg.debug && {
                debug: {
                    sectionCount: 0,
                    skippedCount: records.length,
                    vocabularySize: 0,
                    topSections: [],
                },
            }),
        };
    }

    // Step 3: Shared vocabulary and vectors
    const space = logger.time("3. Fit vector space", () => fitVectorSpace(sections, profile, tokenizer));

    // Step 4: Score and rank
    const ranked = logger.time("4. Score sections", () =>
        scoreSections(sections, space, profile, { ...cfg.scorer, lexicons: cfg.lexicons, tokenizer })
    );

    // Step 5: Refine the top sections
    const excerpts = logger.time("5. Refine excerpts", () =>
        refineSections(
            ranked.slice(0, Math.max(0, cfg.topK)),
            profile,
            cfg.maxSentencesPerSection,
            { ...cfg.refiner, tokenizer, splitter }
        )
    );

    const result: AnalysisResult = { profile, ranked, excerpts, warnings };

    if (cfg.debug) {
        result.debug = {
            sectionCount: sections.length,
            skippedCount: records.length - sections.length,
            vocabularySize: space.vocabulary.length,
            topSections: ranked.slice(0, 10).map(r => ({
                documentId: r.section.documentId,
                heading: truncateText(r.section.headingText ?? r.section.bodyText, 60),
                score: r.compositeScore,
            })),
        };
    }

    return result;
}
