import type { PersonaProfile, Section, TermVector } from "../types";
import { buildTermFrequencyMap, createTokenizer, type Tokenizer } from "../preprocessing/tokenize";

export interface DocumentStats {
    totalDocs: number;
    docFrequency: ReadonlyMap<string, number>; // How many sections contain each term
}

export interface VectorSpace {
    /** Sorted union of section terms and persona keyword terms */
    readonly vocabulary: readonly string[];
    readonly stats: DocumentStats;
    /** One vector per input section, same order */
    readonly sectionVectors: readonly TermVector[];
    readonly queryVector: TermVector;
    idf(term: string): number;
}

/**
 * Compute document frequencies over tokenized sections
 */
export function computeDocumentStats(sectionTokens: readonly string[][]): DocumentStats {
    const docFrequency = new Map<string, number>();

    for (const tokens of sectionTokens) {
        // Count unique terms per section
        for (const term of new Set(tokens)) {
            docFrequency.set(term, (docFrequency.get(term) ?? 0) + 1);
        }
    }

    return {
        totalDocs: sectionTokens.length,
        docFrequency,
    };
}

/**
 * IDF = ln(N / (1 + df)).
 * Terms absent from the corpus (df = 0) get ln(N), the largest value the formula yields.
 * Section and query weights share the IDF factor, so their products never go negative.
 */
export function calculateIdf(term: string, stats: DocumentStats): number {
    if (stats.totalDocs === 0) return 0;
    const df = stats.docFrequency.get(term) ?? 0;
    return Math.log(stats.totalDocs / (1 + df));
}

/**
 * Scale a sparse vector to unit length; a zero vector comes back empty
 */
export function l2Normalize(weights: ReadonlyMap<string, number>): TermVector {
    let sumSquares = 0;
    for (const w of weights.values()) {
        sumSquares += w * w;
    }

    const norm = Math.sqrt(sumSquares);
    const normalized = new Map<string, number>();
    if (norm === 0 || !Number.isFinite(norm)) return normalized;

    for (const [term, w] of weights) {
        if (w !== 0) {
            normalized.set(term, w / norm);
        }
    }
    return normalized;
}

/**
 * Dot product of two unit vectors. Returns 0 when either is all-zero.
 */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
    if (a.size === 0 || b.size === 0) return 0;

    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    let dot = 0;
    for (const [term, w] of small) {
        const other = large.get(term);
        if (other !== undefined) {
            dot += w * other;
        }
    }

    if (!Number.isFinite(dot)) return 0;
    return Math.min(1, dot);
}

/**
 * TF-IDF vector for one tokenized section: (count / length) × IDF, L2-normalized
 */
export function vectorizeTokens(tokens: readonly string[], idf: (term: string) => number): TermVector {
    if (tokens.length === 0) return new Map();

    const tf = buildTermFrequencyMap([...tokens]);
    const weights = new Map<string, number>();
    for (const [term, count] of Object.entries(tf)) {
        weights.set(term, (count / tokens.length) * idf(term));
    }
    return l2Normalize(weights);
}

/**
 * Build the shared vocabulary and IDF table, then the section and query vectors.
 * The table is complete before any vector is produced and is never updated afterwards.
 */
export function fitVectorSpace(
    sections: readonly Section[],
    profile: PersonaProfile,
    tokenizer: Tokenizer = createTokenizer()
): VectorSpace {
    const sectionTokens = sections.map(s => tokenizer.tokenize(s.bodyText));
    const stats = computeDocumentStats(sectionTokens);

    const vocabularySet = new Set<string>(stats.docFrequency.keys());
    for (const term of profile.keywordSet.keys()) {
        vocabularySet.add(term);
    }
    const vocabulary = Object.freeze([...vocabularySet].sort());

    const idfTable = new Map<string, number>();
    for (const term of vocabulary) {
        idfTable.set(term, calculateIdf(term, stats));
    }
    const idf = (term: string): number => idfTable.get(term) ?? 0;

    const sectionVectors = Object.freeze(sectionTokens.map(tokens => vectorizeTokens(tokens, idf)));

    const queryWeights = new Map<string, number>();
    for (const [term, weight] of profile.keywordSet) {
        queryWeights.set(term, weight * idf(term));
    }

    return Object.freeze({
        vocabulary,
        stats,
        sectionVectors,
        queryVector: l2Normalize(queryWeights),
        idf,
    });
}
