import { stemmer } from "stemmer";
import type { TermFrequencyMap } from "../types";
import { getDefaultLexicons } from "../lexicons";

export interface TokenizeOptions {
    stopWords?: ReadonlySet<string>;
    applyStemming?: boolean;
    minLength?: number;
}

/**
 * Tokenization strategy shared by the profile builder, vector space, scorer and refiner.
 * Corpus and query must go through the same instance so their terms line up.
 */
export interface Tokenizer {
    tokenize(text: string): string[];
}

/**
 * Normalize text: lowercase, remove punctuation.
 * Mixed-case words such as "PhD" stay whole.
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, " ") // Remove non-alphanumeric (Unicode-aware)
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Whole-word phrase test against already-normalized text
 */
export function containsPhrase(normalizedText: string, phrase: string): boolean {
    const normalizedPhrase = normalizeText(phrase);
    if (normalizedPhrase.length === 0) return false;
    return ` ${normalizedText} `.includes(` ${normalizedPhrase} `);
}

/**
 * Tokenize text into normalized tokens.
 * Length and stop-word filters apply to the surface form, before stemming.
 */
export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    const {
        stopWords = getDefaultLexicons().stopWords,
        applyStemming = true,
        minLength = 3,
    } = options;

    const normalized = normalizeText(text);
    if (normalized.length === 0) return [];

    let tokens = normalized.split(" ").filter(t => t.length >= minLength && !stopWords.has(t));

    if (applyStemming) {
        tokens = tokens.map(stemmer);
    }

    return tokens;
}

/**
 * Build a tokenizer with fixed options
 */
export function createTokenizer(options: TokenizeOptions = {}): Tokenizer {
    return {
        tokenize: (text: string) => tokenize(text, options),
    };
}

/**
 * Build a term frequency map from tokens
 */
export function buildTermFrequencyMap(tokens: string[]): TermFrequencyMap {
    const tf: TermFrequencyMap = {};
    for (const token of tokens) {
        tf[token] = (tf[token] ?? 0) + 1;
    }
    return tf;
}

/**
 * Share of the distinct terms of A that also occur in B
 */
export function termOverlapRatio(tokensA: readonly string[], tokensB: ReadonlySet<string>): number {
    const setA = new Set(tokensA);
    if (setA.size === 0) return 0;

    let overlap = 0;
    for (const token of setA) {
        if (tokensB.has(token)) {
            overlap++;
        }
    }

    return overlap / setA.size;
}

/**
 * Sum of keyword weights whose term occurs in the token set
 */
export function weightedKeywordOverlap(
    tokens: ReadonlySet<string>,
    keywords: ReadonlyMap<string, number>
): number {
    let total = 0;
    for (const [term, weight] of keywords) {
        if (tokens.has(term)) {
            total += weight;
        }
    }
    return total;
}

/**
 * True when every token of the (tokenized) term is present
 */
export function containsTerm(tokens: ReadonlySet<string>, termTokens: readonly string[]): boolean {
    if (termTokens.length === 0) return false;
    return termTokens.every(t => tokens.has(t));
}
