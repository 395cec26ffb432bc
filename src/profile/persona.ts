import type { DomainTag, PersonaProfile, TechnicalLevel } from "../types";
import { getDefaultLexicons, type Lexicons } from "../lexicons";
import { InsufficientInputError } from "../errors";
import { containsPhrase, containsTerm, createTokenizer, normalizeText, type Tokenizer } from "../preprocessing/tokenize";
import { normalizeWhitespace, readonlyMap, readonlySet } from "../utils/shared";

export interface ProfileOptions {
    lexicons?: Lexicons;
    tokenizer?: Tokenizer;
    /** Objective phrases are cut to this many words */
    maxObjectiveWords?: number;
}

const PERSONA_KEYWORD_WEIGHT = 2.0;
const JOB_KEYWORD_WEIGHT = 1.0;
const DEFAULT_MAX_OBJECTIVE_WORDS = 12;

/**
 * First role, in lexicon priority order, with a marker in the persona text
 */
export function detectRole(
    personaText: string,
    lexicons: Lexicons
): { role: string; defaultLevel: TechnicalLevel } {
    const normalized = normalizeText(personaText);

    for (const entry of lexicons.roles) {
        if (entry.markers.some(marker => containsPhrase(normalized, marker))) {
            return { role: entry.role, defaultLevel: entry.defaultLevel };
        }
    }

    return { ...lexicons.defaultRole };
}

/**
 * Highest technical level with an explicit marker, else the role's default
 */
export function detectTechnicalLevel(
    personaText: string,
    roleDefault: TechnicalLevel,
    lexicons: Lexicons
): TechnicalLevel {
    const normalized = normalizeText(personaText);

    for (const entry of lexicons.technicalLevels) {
        if (entry.markers.some(marker => containsPhrase(normalized, marker))) {
            return entry.level;
        }
    }

    return roleDefault;
}

/**
 * Every domain whose lexicon shares at least one term with the given tokens
 */
export function detectDomainTags(
    tokens: ReadonlySet<string>,
    lexicons: Lexicons,
    tokenizer: Tokenizer
): Set<DomainTag> {
    const tags = new Set<DomainTag>();

    for (const domain of lexicons.domains) {
        const hit = domain.terms.some(term => containsTerm(tokens, tokenizer.tokenize(term)));
        if (hit) {
            tags.add(domain.tag);
        }
    }

    return tags;
}

/**
 * Persona terms weigh 2.0, job-only terms 1.0
 */
export function buildKeywordSet(personaTokens: string[], jobTokens: string[]): Map<string, number> {
    const keywords = new Map<string, number>();

    const add = (term: string, weight: number): void => {
        keywords.set(term, Math.max(keywords.get(term) ?? 0, weight));
    };

    for (const term of personaTokens) add(term, PERSONA_KEYWORD_WEIGHT);
    for (const term of jobTokens) add(term, JOB_KEYWORD_WEIGHT);

    return keywords;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split the job text into short objective phrases.
 * Separators are clause punctuation and the lexicon's coordinating conjunctions.
 */
export function extractJobObjectives(
    jobText: string,
    lexicons: Lexicons,
    tokenizer: Tokenizer,
    maxWords: number = DEFAULT_MAX_OBJECTIVE_WORDS
): string[] {
    const conjunctions = [...lexicons.objectiveSeparators]
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join("|");

    const conjunctionPart = conjunctions.length > 0 ? `|\\b(?:${conjunctions})\\b` : "";
    const separator = new RegExp(`\\s*(?:[,;:!?()\\[\\]]|\\.(?=\\s|$)${conjunctionPart})\\s*`, "i");

    const objectives: string[] = [];
    const seen = new Set<string>();

    for (const piece of normalizeWhitespace(jobText).split(separator)) {
        const phrase = piece.toLowerCase().trim().split(" ").slice(0, maxWords).join(" ");
        if (phrase.length === 0 || seen.has(phrase)) continue;
        if (tokenizer.tokenize(phrase).length === 0) continue;

        seen.add(phrase);
        objectives.push(phrase);
    }

    return objectives;
}

/**
 * Build the persona profile for a run.
 * Throws InsufficientInputError when both texts are blank.
 */
export function buildPersonaProfile(
    personaText: string,
    jobText: string,
    options: ProfileOptions = {}
): PersonaProfile {
    if (personaText.trim().length === 0 && jobText.trim().length === 0) {
        throw new InsufficientInputError();
    }

    const lexicons = options.lexicons ?? getDefaultLexicons();
    const tokenizer = options.tokenizer ?? createTokenizer({ stopWords: lexicons.stopWords });

    const personaTokens = tokenizer.tokenize(personaText);
    const jobTokens = tokenizer.tokenize(jobText);

    const { role, defaultLevel } = detectRole(personaText, lexicons);

    return Object.freeze({
        rawPersonaText: personaText,
        rawJobText: jobText,
        role,
        domainTags: readonlySet(detectDomainTags(new Set([...personaTokens, ...jobTokens]), lexicons, tokenizer)),
        technicalLevel: detectTechnicalLevel(personaText, defaultLevel, lexicons),
        keywordSet: readonlyMap(buildKeywordSet(personaTokens, jobTokens)),
        jobObjectives: Object.freeze(
            extractJobObjectives(jobText, lexicons, tokenizer, options.maxObjectiveWords)
        ),
    });
}
