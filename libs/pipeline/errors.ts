import type { Tm2Field } from "../validation/dto";

/** Batch-wide failure: the orchestrator marks the batch failed and returns no partial result. */
export class BatchError extends Error {
    readonly details?: unknown;

    constructor(message: string, details?: unknown) {
        super(message);
        this.name = "BatchError";
        this.details = details;
    }
}

export type RecordErrorKind = "missing_field" | "invalid_date" | "duplicate" | "malformed_row";

/** A row rejected by the cleaner. Kept for traceability, never thrown. */
export interface RecordError {
    row: number;
    kind: RecordErrorKind;
    fields: Tm2Field[];
    message: string;
    patientId?: string;
    duplicateOf?: number;
}

/** A cleaned row the graph builder could not turn into EMR entities. */
export interface ConversionError {
    row: number;
    patientId: string;
    message: string;
    issues: string[];
}
