import { z } from "zod";
import { DOMAIN_TAGS, TECHNICAL_LEVELS, type DomainTag, type TechnicalLevel } from "../types";
import defaultLexiconData from "./default.json";
import { readonlySet } from "../utils/shared";

export interface RoleEntry {
    readonly role: string;
    readonly markers: readonly string[];
    readonly defaultLevel: TechnicalLevel;
}

export interface LevelEntry {
    readonly level: TechnicalLevel;
    readonly markers: readonly string[];
}

export interface DomainEntry {
    readonly tag: DomainTag;
    readonly terms: readonly string[];
}

/**
 * Read-only word tables shared by the profile builder, scorer and refiner.
 * Built once and passed by reference; nothing downstream mutates them.
 */
export interface Lexicons {
    readonly stopWords: ReadonlySet<string>;
    /** Checked in order; the first role with a matching marker wins */
    readonly roles: readonly RoleEntry[];
    readonly defaultRole: Omit<RoleEntry, "markers">;
    /** Checked in order, highest level first */
    readonly technicalLevels: readonly LevelEntry[];
    readonly domains: readonly DomainEntry[];
    readonly jargon: readonly string[];
    readonly abbreviations: ReadonlySet<string>;
    readonly objectiveSeparators: readonly string[];
}

const wordList = z.array(z.string().trim().toLowerCase().min(1));

const LexiconSchema = z.object({
    stopWords: wordList,
    roles: z.array(z.object({
        role: z.string().min(1),
        markers: wordList.min(1),
        defaultLevel: z.enum(TECHNICAL_LEVELS),
    })),
    defaultRole: z.object({
        role: z.string().min(1),
        defaultLevel: z.enum(TECHNICAL_LEVELS),
    }),
    technicalLevels: z.array(z.object({
        level: z.enum(TECHNICAL_LEVELS),
        markers: wordList,
    })),
    domains: z.array(z.object({
        tag: z.enum(DOMAIN_TAGS),
        terms: wordList.min(1),
    })),
    jargon: wordList,
    abbreviations: wordList,
    objectiveSeparators: wordList,
});

export type LexiconInput = z.input<typeof LexiconSchema>;

/**
 * Validate raw lexicon data and freeze it into a Lexicons table
 * Throws a ZodError describing the first invalid entries
 */
export function createLexicons(raw: unknown): Lexicons {
    const data = LexiconSchema.parse(raw);

    return Object.freeze({
        stopWords: readonlySet(data.stopWords),
        roles: Object.freeze(data.roles.map(r => Object.freeze({ ...r, markers: Object.freeze(r.markers) }))),
        defaultRole: Object.freeze(data.defaultRole),
        technicalLevels: Object.freeze(data.technicalLevels.map(l => Object.freeze({ ...l, markers: Object.freeze(l.markers) }))),
        domains: Object.freeze(data.domains.map(d => Object.freeze({ ...d, terms: Object.freeze(d.terms) }))),
        jargon: Object.freeze(data.jargon),
        abbreviations: readonlySet(data.abbreviations),
        objectiveSeparators: Object.freeze(data.objectiveSeparators),
    });
}

let defaultLexicons: Lexicons | null = null;

/**
 * The bundled lexicon table, parsed on first use
 */
export function getDefaultLexicons(): Lexicons {
    if (defaultLexicons === null) {
        defaultLexicons = createLexicons(defaultLexiconData);
    }
    return defaultLexicons;
}
