import { getDefaultLexicons } from "../lexicons";

/**
 * Sentence boundary strategy used by the refiner
 */
export interface SentenceSplitter {
    split(text: string): string[];
}

/**
 * Split text into sentences using regex heuristics.
 * A boundary is terminal punctuation followed by a space and an uppercase letter,
 * unless the word before the period is a known abbreviation.
 */
export function splitIntoSentences(
    text: string,
    abbreviations: ReadonlySet<string> = getDefaultLexicons().abbreviations
): string[] {
    if (text.length === 0) return [];

    // Normalize whitespace
    const normalized = text.replace(/\s+/g, " ").trim();

    const sentences: string[] = [];
    let current = "";
    let i = 0;

    while (i < normalized.length) {
        const char = normalized[i];
        current += char;

        if (char === "." || char === "!" || char === "?") {
            const nextChar = normalized[i + 1];
            const afterNext = normalized[i + 2];

            if (nextChar === " " && afterNext !== undefined && /\p{Lu}/u.test(afterNext)) {
                // "e.g." and "et al." keep their sentence going
                const wordMatch = char === "." ? current.match(/([\p{L}\p{N}.]+)\.$/u) : null;
                const word = wordMatch?.[1]?.toLowerCase() ?? "";

                if (!abbreviations.has(word)) {
                    const trimmed = current.trim();
                    if (trimmed.length > 0) {
                        sentences.push(trimmed);
                    }
                    current = "";
                    i++; // Skip the space
                }
            }
        }

        i++;
    }

    const trimmed = current.trim();
    if (trimmed.length > 0) {
        sentences.push(trimmed);
    }

    return sentences;
}

export function createSentenceSplitter(abbreviations?: ReadonlySet<string>): SentenceSplitter {
    return {
        split: (text: string) => splitIntoSentences(text, abbreviations),
    };
}
