export type AnalysisErrorCode =
    | "insufficient_input"
    | "invalid_weights"
    | "document_load_failed";

/**
 * Base class for failures that stop an analysis run.
 * Recoverable problems (bad records, skipped files) are reported as warnings instead.
 */
export class AnalysisError extends Error {
    public readonly code: AnalysisErrorCode;

    constructor(code: AnalysisErrorCode, message: string) {
        super(message);
        this.name = "AnalysisError";
        this.code = code;
    }
}

export class InsufficientInputError extends AnalysisError {
    constructor() {
        super("insufficient_input", "Persona and job descriptions are both empty");
        this.name = "InsufficientInputError";
    }
}

export class InvalidWeightsError extends AnalysisError {
    constructor(message: string) {
        super("invalid_weights", message);
        this.name = "InvalidWeightsError";
    }
}

export class DocumentLoadError extends AnalysisError {
    public readonly path: string;

    constructor(path: string, message: string) {
        super("document_load_failed", `${path}: ${message}`);
        this.name = "DocumentLoadError";
        this.path = path;
    }
}

export function isAnalysisError(err: unknown): err is AnalysisError {
    return err instanceof AnalysisError;
}
