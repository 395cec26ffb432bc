import * as fs from "fs";
import * as path from "path";
import { analyze } from "./pipeline";
import { loadDocuments, type LoadResult } from "./input/documents";
import { buildReport, formatReport, profileToJson } from "./output/report";
import { buildPersonaProfile } from "./profile/persona";
import { DocumentLoadError, isAnalysisError } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

export type OutputFormat = "json" | "text";

export interface RankArgs {
    persona: string;
    job: string;
    documents: string[];
    sectionsFile: string;
    outputFile: string;
    format: OutputFormat;
    topK: number;
    maxSentences: number;
    debug: boolean;
    timing: boolean;
}

const DEFAULT_TOP_K = 5;
const DEFAULT_MAX_SENTENCES = 5;

function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (value === undefined) return fallback;
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Parse flags for the rank and profile commands.
 * PERSONA_RANK_TOP_K supplies the --top default.
 */
export function parseRankArgs(args: string[], env: NodeJS.ProcessEnv = process.env): RankArgs {
    const parsed: RankArgs = {
        persona: "",
        job: "",
        documents: [],
        sectionsFile: "",
        outputFile: "",
        format: "json",
        topK: parsePositiveInt(env["PERSONA_RANK_TOP_K"], DEFAULT_TOP_K),
        maxSentences: DEFAULT_MAX_SENTENCES,
        debug: false,
        timing: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if ((arg === "--persona" || arg === "-p") && nextArg !== undefined) {
            parsed.persona = nextArg;
            i++;
        } else if ((arg === "--job" || arg === "-j") && nextArg !== undefined) {
            parsed.job = nextArg;
            i++;
        } else if ((arg === "--documents" || arg === "-d") && nextArg !== undefined) {
            parsed.documents.push(nextArg);
            i++;
        } else if (arg === "--sections" && nextArg !== undefined) {
            parsed.sectionsFile = nextArg;
            i++;
        } else if ((arg === "--output" || arg === "-o") && nextArg !== undefined) {
            parsed.outputFile = nextArg;
            i++;
        } else if (arg === "--format" && (nextArg === "json" || nextArg === "text")) {
            parsed.format = nextArg;
            i++;
        } else if (arg === "--top" && nextArg !== undefined) {
            parsed.topK = parsePositiveInt(nextArg, parsed.topK);
            i++;
        } else if (arg === "--sentences" && nextArg !== undefined) {
            parsed.maxSentences = parsePositiveInt(nextArg, parsed.maxSentences);
            i++;
        } else if (arg === "--debug") {
            parsed.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            parsed.timing = true;
        }
    }

    return parsed;
}

function readSectionsFile(filePath: string): unknown[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new DocumentLoadError(filePath, message);
    }
    if (!Array.isArray(parsed)) {
        throw new DocumentLoadError(filePath, "expected a JSON array of section records");
    }
    return parsed;
}

/**
 * rank command: load, analyze, report. Returns the process exit code.
 */
export function runRank(args: string[]): number {
    const opts = parseRankArgs(args);

    if (opts.documents.length === 0 && opts.sectionsFile === "") {
        logger.error("rank requires --documents or --sections");
        return 1;
    }

    if (opts.timing) {
        logger.setTimingEnabled(true);
    }

    const start = performance.now();

    try {
        const loaded: LoadResult = opts.sectionsFile !== ""
            ? { documents: [], records: readSectionsFile(opts.sectionsFile), warnings: [] }
            : logger.time("0. Load documents", () => loadDocuments(opts.documents));

        logger.log(`Loaded ${loaded.records.length} sections from ${loaded.documents.length || "pre-segmented"} document(s)`);

        const result = analyze(opts.persona, opts.job, loaded.records, {
            topK: opts.topK,
            maxSentencesPerSection: opts.maxSentences,
            debug: opts.debug,
        });
        result.warnings.unshift(...loaded.warnings);

        for (const warning of result.warnings) {
            logger.warn(`[${warning.code}] ${warning.message}`);
        }

        if (opts.debug && result.debug) {
            logger.debug(`Sections: ${result.debug.sectionCount} (skipped ${result.debug.skippedCount})`);
            logger.debug(`Vocabulary: ${result.debug.vocabularySize} terms`);
            for (const s of result.debug.topSections) {
                logger.debug(`  ${s.score.toFixed(3)} ${s.documentId}: ${s.heading}`);
            }
        }

        const payload = buildReport({
            personaText: opts.persona,
            jobText: opts.job,
            result,
            ...(loaded.documents.length > 0 && { documents: loaded.documents.map(d => d.id) }),
            topK: opts.topK,
            processingTimeMs: performance.now() - start,
        });

        if (opts.outputFile !== "") {
            fs.mkdirSync(path.dirname(path.resolve(opts.outputFile)), { recursive: true });
            fs.writeFileSync(opts.outputFile, JSON.stringify(payload, null, 2) + "\n", "utf8");
            logger.log(`Output saved to: ${opts.outputFile}`);
        }

        if (opts.timing) {
            logger.printTimings();
            logger.setTimingEnabled(false);
        }

        if (opts.format === "text") {
            console.log(formatReport(result));
        } else if (opts.outputFile === "") {
            console.log(JSON.stringify(payload, null, 2));
        }
        return 0;
    } catch (err) {
        if (isAnalysisError(err)) {
            logger.error(`[${err.code}] ${err.message}`);
            return 1;
        }
        throw err;
    }
}

/**
 * profile command: print the persona profile as JSON
 */
export function runProfile(args: string[]): number {
    const opts = parseRankArgs(args);

    try {
        const profile = buildPersonaProfile(opts.persona, opts.job);
        console.log(JSON.stringify(profileToJson(profile), null, 2));
        return 0;
    } catch (err) {
        if (isAnalysisError(err)) {
            logger.error(`[${err.code}] ${err.message}`);
            return 1;
        }
        throw err;
    }
}
