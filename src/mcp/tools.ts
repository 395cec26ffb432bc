/**
 * Tool handlers behind the MCP server
 */

import { z } from "zod";
import { analyze } from "../pipeline";
import { loadDocuments } from "../input/documents";
import { buildReport, profileToJson } from "../output/report";
import { buildPersonaProfile } from "../profile/persona";
import { isAnalysisError } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const MAX_TOP_K = 50;
const MAX_SENTENCES = 20;

export const rankDocumentsShape = {
    persona: z.string().describe("Who is reading, e.g. \"PhD researcher in computational biology\""),
    job: z.string().describe("What they need to get done with the documents"),
    paths: z.array(z.string().min(1)).min(1).describe("Files or directories to analyze (.html, .txt, .md, .json)"),
    topK: z.number().int().min(1).max(MAX_TOP_K).optional().describe("Sections to refine (default: 5)"),
    maxSentences: z.number().int().min(1).max(MAX_SENTENCES).optional().describe("Sentences per refined excerpt (default: 5)"),
};

export const profileShape = {
    persona: z.string().describe("Persona description"),
    job: z.string().describe("Job-to-be-done description"),
};

export type RankDocumentsInput = z.infer<z.ZodObject<typeof rankDocumentsShape>>;
export type ProfileInput = z.infer<z.ZodObject<typeof profileShape>>;

export interface ToolResult {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

function textResult(text: string, isError: boolean = false): ToolResult {
    return {
        content: [{ type: "text", text }],
        ...(isError && { isError }),
    };
}

function errorResult(err: unknown): ToolResult {
    if (isAnalysisError(err)) {
        logger.warn(`Tool failed: [${err.code}] ${err.message}`);
        return textResult(`Error (${err.code}): ${err.message}`, true);
    }
    throw err;
}

/**
 * Rank sections of local documents for a persona and job
 */
export function rankDocuments(input: RankDocumentsInput): ToolResult {
    const start = performance.now();

    try {
        const loaded = loadDocuments(input.paths);
        const result = analyze(input.persona, input.job, loaded.records, {
            ...(input.topK !== undefined && { topK: input.topK }),
            ...(input.maxSentences !== undefined && { maxSentencesPerSection: input.maxSentences }),
        });
        result.warnings.unshift(...loaded.warnings);

        const payload = buildReport({
            personaText: input.persona,
            jobText: input.job,
            result,
            documents: loaded.documents.map(d => d.id),
            ...(input.topK !== undefined && { topK: input.topK }),
            processingTimeMs: performance.now() - start,
        });

        return textResult(JSON.stringify(payload, null, 2));
    } catch (err) {
        return errorResult(err);
    }
}

/**
 * Build the persona profile without touching any documents
 */
export function describeProfile(input: ProfileInput): ToolResult {
    try {
        const profile = buildPersonaProfile(input.persona, input.job);
        return textResult(JSON.stringify(profileToJson(profile), null, 2));
    } catch (err) {
        return errorResult(err);
    }
}
