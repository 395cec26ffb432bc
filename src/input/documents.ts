import * as fs from "fs";
import * as path from "path";
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import type { AnalysisWarning, Section } from "../types";
import { DocumentLoadError } from "../errors";
import { normalizeWhitespace } from "../utils/shared";
import { classifySectionType } from "./sections";

export type DocumentFormat = "html" | "text" | "json";

export interface LoadedDocument {
    id: string;
    path: string;
    format: DocumentFormat;
    sectionCount: number;
}

export interface LoadResult {
    documents: LoadedDocument[];
    /** Section records in corpus order, validated later by the pipeline */
    records: unknown[];
    warnings: AnalysisWarning[];
}

export type DraftSection = Omit<Section, "ordinalIndex">;

const FORMAT_BY_EXTENSION: Readonly<Record<string, DocumentFormat>> = {
    ".html": "html",
    ".htm": "html",
    ".txt": "text",
    ".md": "text",
    ".json": "json",
};

const STRIP_SELECTORS = "script, style, noscript, template, nav, header, footer, aside";
const CONTENT_TAGS = new Set(["p", "li", "pre", "blockquote", "td", "th", "dd", "dt", "figcaption"]);
const HEADING_PATTERN = /^h[1-6]$/;

// =============================================================================
// HTML
// =============================================================================

interface OpenSection {
    heading: string | undefined;
    parts: string[];
}

function toDraft(open: OpenSection, documentId: string, pageNumber: number): DraftSection | null {
    if (open.parts.length === 0) return null;
    return {
        documentId,
        pageNumber,
        ...(open.heading !== undefined && { headingText: open.heading }),
        bodyText: open.parts.join("\n"),
        sectionType: classifySectionType(open.heading),
    };
}

/**
 * Walk the DOM; headings open sections, content blocks feed the open one
 */
function walk(
    $: cheerio.CheerioAPI,
    $node: cheerio.Cheerio<AnyNode>,
    onHeading: (text: string) => void,
    onContent: (text: string) => void
): void {
    const rawTag = $node.prop("tagName");
    const tagName = typeof rawTag === "string" ? rawTag.toLowerCase() : "";

    if (HEADING_PATTERN.test(tagName) || CONTENT_TAGS.has(tagName)) {
        const text = tagName === "pre"
            ? $node.text().trim()
            : normalizeWhitespace($node.text());

        if (text.length === 0) return;

        if (HEADING_PATTERN.test(tagName)) {
            onHeading(text);
        } else {
            onContent(text);
        }
        return;
    }

    $node.children().each((_, child) => {
        if (child.type === "tag") {
            walk($, $(child), onHeading, onContent);
        }
    });
}

/**
 * Split an HTML page into sections at its headings.
 * Content before the first heading is headed by the page title, if any.
 */
export function parseHtmlDocument(html: string, documentId: string): DraftSection[] {
    const $ = cheerio.load(html);
    const title = normalizeWhitespace($("title").first().text());
    $(STRIP_SELECTORS).remove();

    const drafts: DraftSection[] = [];
    let open: OpenSection = { heading: title.length > 0 ? title : undefined, parts: [] };

    walk(
        $,
        $("body"),
        heading => {
            const draft = toDraft(open, documentId, 1);
            if (draft !== null) drafts.push(draft);
            open = { heading, parts: [] };
        },
        text => {
            open.parts.push(text);
        }
    );

    const last = toDraft(open, documentId, 1);
    if (last !== null) drafts.push(last);

    return drafts;
}

// =============================================================================
// Plain text / Markdown
// =============================================================================

const HEADER_PATTERNS: RegExp[] = [
    /^\d+(?:\.\d+)*\.?\s+\p{Lu}[^.!?]*$/u,                                        // Numbered sections
    /^[\p{Lu}][\p{Lu}\s\d&,-]{2,}$/u,                                             // ALL CAPS headers
    /^(?:abstract|introduction|methodology|methods|results|discussion|conclusions?|references)$/i,
    /^(?:executive summary|background|analysis|findings|recommendations|summary|overview)$/i,
    /^(?:chapter|section|part)\s+\d+\b/i,
];

const MARKDOWN_HEADING = /^#{1,6}\s+(.+?)\s*#*$/;
const MAX_HEURISTIC_HEADER_WORDS = 8;

/**
 * Decide whether a trimmed line reads like a section header.
 * Short capitalized lines without terminal punctuation only count after a blank line.
 */
export function isSectionHeader(line: string, afterBlank: boolean): boolean {
    if (line.length < 3 || line.length > 100) return false;
    if (MARKDOWN_HEADING.test(line)) return true;
    if (HEADER_PATTERNS.some(p => p.test(line))) return true;

    return afterBlank &&
        /^\p{Lu}/u.test(line) &&
        !/[.,;:!?]$/.test(line) &&
        line.split(/\s+/).length <= MAX_HEURISTIC_HEADER_WORDS;
}

function headerText(line: string): string {
    const md = line.match(MARKDOWN_HEADING);
    return md?.[1] ?? line;
}

/**
 * Split plain text into sections. Form feeds separate pages; without any
 * detected header every non-empty page becomes its own section.
 */
export function parseTextDocument(text: string, documentId: string): DraftSection[] {
    const pages = text.split("\f");
    const drafts: DraftSection[] = [];
    let headerCount = 0;

    let open: OpenSection = { heading: undefined, parts: [] };
    let openPage = 1;

    pages.forEach((pageText, pageIndex) => {
        const pageNumber = pageIndex + 1;
        let afterBlank = true;

        for (const rawLine of pageText.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (line.length === 0) {
                afterBlank = true;
                continue;
            }

            if (isSectionHeader(line, afterBlank)) {
                headerCount++;
                const draft = toDraft(open, documentId, openPage);
                if (draft !== null) drafts.push(draft);
                open = { heading: headerText(line), parts: [] };
                openPage = pageNumber;
            } else {
                if (open.parts.length === 0 && open.heading === undefined) {
                    openPage = pageNumber;
                }
                open.parts.push(line);
            }
            afterBlank = false;
        }
    });

    const last = toDraft(open, documentId, openPage);
    if (last !== null) drafts.push(last);

    if (headerCount > 0) return drafts;

    // No structure found: one section per page
    return pages.flatMap((pageText, pageIndex) => {
        const body = pageText.trim();
        if (body.length === 0) return [];
        return [{
            documentId,
            pageNumber: pageIndex + 1,
            bodyText: body,
            sectionType: "generic" as const,
        }];
    });
}

// =============================================================================
// Loading
// =============================================================================

function detectFormat(filePath: string): DocumentFormat | undefined {
    return FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()];
}

function expandPaths(inputPaths: readonly string[]): string[] {
    const files: string[] = [];

    for (const inputPath of inputPaths) {
        if (!fs.existsSync(inputPath)) {
            throw new DocumentLoadError(inputPath, "no such file or directory");
        }

        if (fs.statSync(inputPath).isDirectory()) {
            const entries = fs.readdirSync(inputPath)
                .filter(name => !name.startsWith("."))
                .sort()
                .map(name => path.join(inputPath, name))
                .filter(p => fs.statSync(p).isFile());
            files.push(...entries);
        } else {
            files.push(inputPath);
        }
    }

    return files;
}

function parseFile(filePath: string, format: DocumentFormat, documentId: string): unknown[] {
    const content = fs.readFileSync(filePath, "utf8");

    switch (format) {
        case "html":
            return parseHtmlDocument(content, documentId);
        case "text":
            return parseTextDocument(content, documentId);
        case "json": {
            const parsed: unknown = JSON.parse(content);
            if (!Array.isArray(parsed)) {
                throw new Error("expected a JSON array of section records");
            }
            return parsed;
        }
    }
}

function sourceOrdinal(record: unknown, position: number): number {
    if (typeof record === "object" && record !== null && "ordinalIndex" in record) {
        const { ordinalIndex } = record;
        if (typeof ordinalIndex === "number" && Number.isFinite(ordinalIndex)) return ordinalIndex;
    }
    return position;
}

/**
 * A file's own ordinalIndex values only order records within that file
 */
function orderWithinFile(records: readonly unknown[]): unknown[] {
    return records
        .map((record, position) => ({ record, key: sourceOrdinal(record, position), position }))
        .sort((a, b) => a.key - b.key || a.position - b.position)
        .map(entry => entry.record);
}

function withOrdinal(record: unknown, ordinalIndex: number): unknown {
    if (typeof record !== "object" || record === null || Array.isArray(record)) {
        return record;
    }
    return { ...record, ordinalIndex };
}

/**
 * Load files and directories into section records with corpus-wide ordinal indices.
 * Ordinals always follow load order; ordinals inside a JSON file only sort that file.
 * Missing paths throw; unsupported or unreadable files are skipped with a warning.
 */
export function loadDocuments(inputPaths: readonly string[]): LoadResult {
    const documents: LoadedDocument[] = [];
    const records: unknown[] = [];
    const warnings: AnalysisWarning[] = [];

    for (const filePath of expandPaths(inputPaths)) {
        const documentId = path.basename(filePath);
        const format = detectFormat(filePath);

        if (format === undefined) {
            warnings.push({
                code: "document_skipped",
                message: `Skipped ${documentId}: unsupported file type`,
            });
            continue;
        }

        let parsed: unknown[];
        try {
            parsed = parseFile(filePath, format, documentId);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            warnings.push({
                code: "document_skipped",
                message: `Skipped ${documentId}: ${reason}`,
            });
            continue;
        }

        for (const record of orderWithinFile(parsed)) {
            records.push(withOrdinal(record, records.length));
        }
        documents.push({ id: documentId, path: filePath, format, sectionCount: parsed.length });
    }

    return { documents, records, warnings };
}
