import { z } from "zod";
import { SECTION_TYPES, type AnalysisWarning, type Section, type SectionType } from "../types";

/**
 * Heading patterns mapped to section types, checked in order
 */
const SECTION_TYPE_PATTERNS: ReadonlyArray<[SectionType, RegExp]> = [
    ["abstract", /\babstract\b/],
    ["summary", /\b(?:executive summary|summary|overview|synopsis|tl;?\s*dr|key takeaways)\b/],
    ["conclusion", /\b(?:conclusions?|concluding remarks|final remarks|future work)\b/],
    ["results", /\b(?:results?|findings|evaluation|experiments?)\b/],
    ["discussion", /\b(?:discussion|analysis|implications)\b/],
    ["methodology", /\b(?:methods?|methodology|approach|materials|experimental setup|study design)\b/],
    ["introduction", /\b(?:introduction|background|motivation|preface)\b/],
];

/**
 * Map a heading to a section type; unknown or missing headings are generic
 */
export function classifySectionType(heading: string | undefined): SectionType {
    if (heading === undefined) return "generic";

    const cleaned = heading
        .toLowerCase()
        // Drop leading numbering such as "2.1", "IV." or "Chapter 3:"
        .replace(/^\s*(?:(?:chapter|section|part)\s+)?(?:\d+(?:\.\d+)*[.):]?|[ivxlc]+[.):])\s+/, "")
        .trim();

    for (const [type, pattern] of SECTION_TYPE_PATTERNS) {
        if (pattern.test(cleaned)) return type;
    }
    return "generic";
}

export const SectionSchema = z.object({
    documentId: z.string().trim().min(1),
    pageNumber: z.number().int().min(0),
    headingText: z.string().optional(),
    bodyText: z.string(),
    sectionType: z.enum(SECTION_TYPES).optional(),
    ordinalIndex: z.number().int().min(0).optional(),
});

export type SectionInput = z.input<typeof SectionSchema>;

export interface SectionValidationResult {
    sections: Section[];
    warnings: AnalysisWarning[];
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => {
            const path = issue.path.length > 0 ? issue.path.join(".") : "record";
            return `${path}: ${issue.message}`;
        })
        .join("; ");
}

/**
 * Validate raw section records.
 * Malformed records are skipped with a warning; missing sectionType is inferred
 * from the heading and a missing ordinalIndex falls back to the record's position.
 */
export function validateSections(raw: readonly unknown[]): SectionValidationResult {
    const sections: Section[] = [];
    const warnings: AnalysisWarning[] = [];
    const seenOrdinals = new Set<number>();

    raw.forEach((record, index) => {
        const parsed = SectionSchema.safeParse(record);
        if (!parsed.success) {
            warnings.push({
                code: "malformed_section",
                message: `Skipped section ${index}: ${describeIssues(parsed.error)}`,
                index,
            });
            return;
        }

        const data = parsed.data;
        const ordinalIndex = data.ordinalIndex ?? index;

        if (seenOrdinals.has(ordinalIndex)) {
            warnings.push({
                code: "duplicate_ordinal",
                message: `Section ${index} reuses ordinal index ${ordinalIndex}; input order breaks the tie`,
                index,
            });
        }
        seenOrdinals.add(ordinalIndex);

        sections.push(Object.freeze({
            documentId: data.documentId,
            pageNumber: data.pageNumber,
            ...(data.headingText !== undefined && { headingText: data.headingText }),
            bodyText: data.bodyText,
            sectionType: data.sectionType ?? classifySectionType(data.headingText),
            ordinalIndex,
        }));
    });

    return { sections, warnings };
}
