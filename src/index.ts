export { analyze, DEFAULT_CONFIG } from "./pipeline";
export type { AnalysisResult, PipelineConfig, PipelineDebugInfo } from "./pipeline";

export { buildPersonaProfile } from "./profile/persona";
export type { ProfileOptions } from "./profile/persona";

export { fitVectorSpace, cosineSimilarity, calculateIdf, computeDocumentStats } from "./scoring/tfidf";
export type { DocumentStats, VectorSpace } from "./scoring/tfidf";

export { scoreSections } from "./scoring/ranker";
export type { ScorerConfig } from "./scoring/ranker";
export { createFactorTable, createDefaultFactorTable, DEFAULT_FACTOR_WEIGHTS } from "./scoring/factors";
export type { FactorDefinition, FactorFn, ScoringContext, SectionFeatures } from "./scoring/factors";

export { refineSections } from "./output/refine";
export type { RefinerConfig } from "./output/refine";
export { buildReport, formatReport, profileToJson } from "./output/report";
export type { ProfilePayload, ReportInput, ReportPayload } from "./output/report";

export { loadDocuments, parseHtmlDocument, parseTextDocument } from "./input/documents";
export type { LoadResult, LoadedDocument } from "./input/documents";
export { validateSections, classifySectionType, SectionSchema } from "./input/sections";

export { createLexicons, getDefaultLexicons } from "./lexicons";
export type { Lexicons } from "./lexicons";
export { createTokenizer } from "./preprocessing/tokenize";
export type { Tokenizer, TokenizeOptions } from "./preprocessing/tokenize";
export { createSentenceSplitter } from "./preprocessing/sentences";
export type { SentenceSplitter } from "./preprocessing/sentences";

export {
    AnalysisError,
    InsufficientInputError,
    InvalidWeightsError,
    DocumentLoadError,
    isAnalysisError,
} from "./errors";

export * from "./types";
