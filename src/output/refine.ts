import type { ExcerptSentence, InsightTag, PersonaProfile, RankedSection, RefinedExcerpt } from "../types";
import { getDefaultLexicons } from "../lexicons";
import {
    createTokenizer,
    termOverlapRatio,
    weightedKeywordOverlap,
    type Tokenizer,
} from "../preprocessing/tokenize";
import { createSentenceSplitter, type SentenceSplitter } from "../preprocessing/sentences";
import { safeRatio } from "../utils/shared";

export interface RefinerConfig {
    tokenizer?: Tokenizer;
    splitter?: SentenceSplitter;
    /** Shorter sentences are skipped unless nothing else is left */
    minSentenceChars?: number;
    /** Objective overlap at or above this marks a sentence with the "objective" tag */
    objectiveTagThreshold?: number;
}

const DEFAULT_CONFIG = {
    minSentenceChars: 20,
    objectiveTagThreshold: 0.5,
} as const;

const KEYWORD_SHARE = 0.5;
const OBJECTIVE_SHARE = 0.5;

const INSIGHT_TAG_ORDER: readonly InsightTag[] = ["quantitative", "comparison", "objective"];

const QUANTITY_PATTERN =
    /\d+(?:[.,]\d+)?\s?(?:%|percent\b|(?:ms|seconds?|minutes?|hours?|days?|weeks?|months?|years?|kg|mg|g|km|cm|mm|m|gb|mb|kb|tb|fold|x|million|billion|thousand|samples?|participants?|patients?|points?|users?)\b)/i;
const CURRENCY_PATTERN = /[$€£]\s?\d/;
const COMPARISON_PATTERN =
    /\b(?:compared\s+(?:to|with)\b|versus\b|vs\b|relative\s+to\b|in\s+contrast\b|outperform(?:s|ed|ing)?\b)/i;

interface CandidateSentence {
    text: string;
    index: number;
    keywordOverlap: number;
    objectiveOverlap: number;
}

/**
 * Pattern flags for one sentence, in fixed tag order
 */
export function detectInsightTags(
    text: string,
    objectiveOverlap: number,
    objectiveTagThreshold: number = DEFAULT_CONFIG.objectiveTagThreshold
): InsightTag[] {
    const tags: InsightTag[] = [];
    if (QUANTITY_PATTERN.test(text) || CURRENCY_PATTERN.test(text)) {
        tags.push("quantitative");
    }
    if (COMPARISON_PATTERN.test(text)) {
        tags.push("comparison");
    }
    if (objectiveOverlap > 0 && objectiveOverlap >= objectiveTagThreshold) {
        tags.push("objective");
    }
    return tags;
}

/**
 * Pick the best sentences of one ranked section and return them in reading order
 */
export function refineSection(
    ranked: RankedSection,
    profile: PersonaProfile,
    maxSentences: number,
    config: RefinerConfig = {}
): RefinedExcerpt {
    const {
        tokenizer = createTokenizer(),
        splitter = createSentenceSplitter(getDefaultLexicons().abbreviations),
        minSentenceChars = DEFAULT_CONFIG.minSentenceChars,
        objectiveTagThreshold = DEFAULT_CONFIG.objectiveTagThreshold,
    } = config;

    const objectiveTokens = profile.jobObjectives.map(o => tokenizer.tokenize(o));

    const all: CandidateSentence[] = splitter.split(ranked.section.bodyText).map((text, index) => {
        const tokenSet = new Set(tokenizer.tokenize(text));
        let objectiveOverlap = 0;
        for (const objective of objectiveTokens) {
            objectiveOverlap = Math.max(objectiveOverlap, termOverlapRatio(objective, tokenSet));
        }
        return {
            text,
            index,
            keywordOverlap: weightedKeywordOverlap(tokenSet, profile.keywordSet),
            objectiveOverlap,
        };
    });

    const longEnough = all.filter(c => c.text.length >= minSentenceChars);
    const candidates = longEnough.length > 0 ? longEnough : all;

    let maxKeywordOverlap = 0;
    for (const c of candidates) {
        maxKeywordOverlap = Math.max(maxKeywordOverlap, c.keywordOverlap);
    }

    const scored: ExcerptSentence[] = candidates.map(c => ({
        text: c.text,
        index: c.index,
        score: KEYWORD_SHARE * safeRatio(c.keywordOverlap, maxKeywordOverlap) + OBJECTIVE_SHARE * c.objectiveOverlap,
        tags: detectInsightTags(c.text, c.objectiveOverlap, objectiveTagThreshold),
    }));

    // Select by score (earlier sentence wins ties), then restore reading order
    const selected = [...scored]
        .sort((a, b) => {
            const d = b.score - a.score;
            if (d !== 0) return d;
            return a.index - b.index;
        })
        .slice(0, Math.max(0, maxSentences))
        .sort((a, b) => a.index - b.index);

    const tagSet = new Set(selected.flatMap(s => s.tags));

    return {
        section: ranked.section,
        rank: ranked.rank,
        sentences: selected,
        insightTags: INSIGHT_TAG_ORDER.filter(tag => tagSet.has(tag)),
        refinedText: selected.map(s => s.text).join(" "),
    };
}

/**
 * Refine each of the given ranked sections, keeping their order
 */
export function refineSections(
    ranked: readonly RankedSection[],
    profile: PersonaProfile,
    maxSentencesPerSection: number,
    config: RefinerConfig = {}
): RefinedExcerpt[] {
    return ranked.map(r => refineSection(r, profile, maxSentencesPerSection, config));
}
