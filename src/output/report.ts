import type { AnalysisResult } from "../pipeline";
import { FACTOR_NAMES, type InsightTag, type PersonaProfile, type Section } from "../types";

export interface ReportInput {
    personaText: string;
    jobText: string;
    result: AnalysisResult;
    /** Document names in load order; derived from the ranked sections when omitted */
    documents?: readonly string[];
    /** Cap on extracted_sections; defaults to the number of refined excerpts */
    topK?: number;
    timestamp?: Date;
    processingTimeMs?: number;
}

export interface ReportPayload {
    metadata: {
        input_documents: string[];
        persona: string;
        job_to_be_done: string;
        processing_timestamp: string;
        processing_time_ms?: number;
    };
    extracted_sections: Array<{
        document: string;
        section_title: string;
        importance_rank: number;
        page_number: number;
        score: number;
    }>;
    subsection_analysis: Array<{
        document: string;
        section_title: string;
        refined_text: string;
        page_number: number;
        insight_tags: InsightTag[];
    }>;
    warnings: string[];
}

function round(value: number, digits: number = 4): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

/**
 * Display title for a section; untitled sections are named by page
 */
export function sectionTitle(section: Section): string {
    const heading = section.headingText?.trim();
    return heading !== undefined && heading.length > 0 ? heading : `Page ${section.pageNumber}`;
}

function documentsInCorpusOrder(result: AnalysisResult): string[] {
    const sections = result.ranked.map(r => r.section).sort((a, b) => a.ordinalIndex - b.ordinalIndex);
    return [...new Set(sections.map(s => s.documentId))];
}

/**
 * Build the JSON result payload handed to callers
 */
export function buildReport(input: ReportInput): ReportPayload {
    const { result } = input;
    const topK = input.topK ?? result.excerpts.length;
    const timestamp = input.timestamp ?? new Date();

    return {
        metadata: {
            input_documents: input.documents !== undefined ? [...input.documents] : documentsInCorpusOrder(result),
            persona: input.personaText,
            job_to_be_done: input.jobText,
            processing_timestamp: timestamp.toISOString(),
            ...(input.processingTimeMs !== undefined && { processing_time_ms: Math.round(input.processingTimeMs) }),
        },
        extracted_sections: result.ranked.slice(0, Math.max(0, topK)).map(r => ({
            document: r.section.documentId,
            section_title: sectionTitle(r.section),
            importance_rank: r.rank,
            page_number: r.section.pageNumber,
            score: round(r.compositeScore),
        })),
        subsection_analysis: result.excerpts.map(e => ({
            document: e.section.documentId,
            section_title: sectionTitle(e.section),
            refined_text: e.refinedText,
            page_number: e.section.pageNumber,
            insight_tags: [...e.insightTags],
        })),
        warnings: result.warnings.map(w => w.message),
    };
}

/**
 * Format an analysis for terminal display
 */
export function formatReport(result: AnalysisResult, maxSections: number = 10): string {
    const lines: string[] = [];
    const { profile } = result;

    lines.push(`Role: ${profile.role} (${profile.technicalLevel})`);
    lines.push(`Domains: ${profile.domainTags.size > 0 ? [...profile.domainTags].join(", ") : "none"}`);
    lines.push(`Objectives: ${profile.jobObjectives.length > 0 ? profile.jobObjectives.join(" | ") : "none"}`);
    lines.push(`Sections ranked: ${result.ranked.length}`);
    lines.push("");

    for (const r of result.ranked.slice(0, maxSections)) {
        lines.push(`#${r.rank} ${r.section.documentId} p.${r.section.pageNumber} [${r.section.sectionType}] ${sectionTitle(r.section)}`);
        lines.push(`    score ${r.compositeScore.toFixed(3)} | ` +
            FACTOR_NAMES.map(name => `${name} ${r.factorScores[name].toFixed(2)}`).join(", "));
    }

    for (const e of result.excerpts) {
        lines.push("");
        const tags = e.insightTags.length > 0 ? ` {${e.insightTags.join(", ")}}` : "";
        lines.push(`--- Excerpt #${e.rank}: ${sectionTitle(e.section)}${tags} ---`);
        lines.push(e.refinedText);
    }

    if (result.warnings.length > 0) {
        lines.push("");
        lines.push("Warnings:");
        for (const w of result.warnings) {
            lines.push(`  [${w.code}] ${w.message}`);
        }
    }

    return lines.join("\n");
}

export interface ProfilePayload {
    role: string;
    technical_level: string;
    domain_tags: string[];
    keywords: Record<string, number>;
    job_objectives: string[];
}

/**
 * Plain JSON view of a persona profile
 */
export function profileToJson(profile: PersonaProfile): ProfilePayload {
    return {
        role: profile.role,
        technical_level: profile.technicalLevel,
        domain_tags: [...profile.domainTags],
        keywords: Object.fromEntries(profile.keywordSet),
        job_objectives: [...profile.jobObjectives],
    };
}
