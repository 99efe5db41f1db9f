import { BatchError, type RecordError } from "../pipeline/errors";
import type { TermNormalizer, TranslationRecorder } from "../translation/normalizer";
import { TranslationTally, type TranslationSummary } from "../translation/tally";
import {
    REQUIRED_FIELDS,
    TM2_COLUMNS,
    Tm2RowSchema,
    Tm2RowsSchema,
    type CleanedRecord,
    type RawRecord,
    type Tm2Field,
    type Tm2Row,
} from "../validation/dto";
import { parseDiagnosisDate } from "./dates";
import { dataQualityScore, fieldCompleteness, type FieldCompleteness } from "./quality";

/** A row that passed structural validation; required fields are trimmed, the rest untouched. */
export interface ValidatedRecord {
    row: number;
    patientId: string;
    tm2Code: string;
    conditionName: string;
    diagnosisDate: string;
    systemType?: string;
    severity?: string;
    practitionerId?: string;
}

export interface CleaningStatistics {
    totalRecords: number;
    cleanedRecords: number;
    duplicatesRemoved: number;
    invalidRecordsRemoved: number;
    fieldCompleteness: FieldCompleteness;
    dataQualityScore: number;
    severityDistribution: Record<string, number>;
    systemTypeDistribution: Record<string, number>;
    dateRange: { earliest: string; latest: string } | null;
    translation: TranslationSummary;
}

export interface CleaningResult {
    records: CleanedRecord[];
    statistics: CleaningStatistics;
    errors: RecordError[];
}

const text = (v: string | undefined): string | undefined => {
    const t = v?.trim();
    return t ? t : undefined;
};

function cell(row: Tm2Row, field: Tm2Field): string | undefined {
    const v = row[TM2_COLUMNS[field]] ?? row[field];
    return v === null || v === undefined ? undefined : String(v);
}

/**
 * Coerces loosely-typed rows (CSV records, JSON bodies) into RawRecords.
 * Accepts the snake_case TM2 column names or the camelCase field names.
 * Throws BatchError only when the input is not a list; an element that is not an
 * object of scalar cells comes back flagged `malformed` and is rejected in validation.
 */
export function toRawRecords(rows: unknown): RawRecord[] {
    const parsed = Tm2RowsSchema.safeParse(rows);
    if (!parsed.success) {
        throw new BatchError(
            "input is not a list of TM2 rows",
            parsed.error.issues.map((i) => `${i.path.join(".") || "/"} ${i.message}`),
        );
    }
    return parsed.data.map((item, index): RawRecord => {
        const rowParse = Tm2RowSchema.safeParse(item);
        if (!rowParse.success) {
            return {
                row: index,
                malformed: rowParse.error.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; "),
            };
        }
        const row = rowParse.data;
        return {
            row: index,
            patientId: cell(row, "patientId"),
            tm2Code: cell(row, "tm2Code"),
            conditionName: cell(row, "conditionName"),
            systemType: cell(row, "systemType"),
            severity: cell(row, "severity"),
            diagnosisDate: cell(row, "diagnosisDate"),
            practitionerId: cell(row, "practitionerId"),
        };
    });
}

export function validateRecords(records: readonly RawRecord[]): { valid: ValidatedRecord[]; errors: RecordError[] } {
    const valid: ValidatedRecord[] = [];
    const errors: RecordError[] = [];

    for (const raw of records) {
        if (raw.malformed !== undefined) {
            errors.push({ row: raw.row, kind: "malformed_row", fields: [], message: `malformed row (${raw.malformed})` });
            continue;
        }

        const patientId = text(raw.patientId);
        const tm2Code = text(raw.tm2Code);
        const conditionName = text(raw.conditionName);
        const dateText = text(raw.diagnosisDate);
        const diagnosisDate = dateText === undefined ? null : parseDiagnosisDate(dateText);

        if (patientId && tm2Code && conditionName && diagnosisDate) {
            valid.push({
                row: raw.row,
                patientId,
                tm2Code,
                conditionName,
                diagnosisDate,
                systemType: raw.systemType,
                severity: raw.severity,
                practitionerId: raw.practitionerId,
            });
            continue;
        }

        const missing: Tm2Field[] = REQUIRED_FIELDS.filter((f) => text(raw[f]) === undefined);
        const badDate = dateText !== undefined && diagnosisDate === null;
        const parts: string[] = [];
        if (missing.length > 0) parts.push(`missing ${missing.join(", ")}`);
        if (badDate) parts.push(`unparseable diagnosisDate "${dateText}"`);

        errors.push({
            row: raw.row,
            kind: missing.length > 0 ? "missing_field" : "invalid_date",
            fields: badDate ? [...missing, "diagnosisDate"] : missing,
            message: parts.join("; "),
            ...(patientId ? { patientId } : {}),
        });
    }

    return { valid, errors };
}

/** First occurrence wins; later rows with the same patient/code/date/practitioner are dropped. */
export function dedupeRecords(records: readonly ValidatedRecord[]): { unique: ValidatedRecord[]; errors: RecordError[] } {
    const seen = new Map<string, number>();
    const unique: ValidatedRecord[] = [];
    const errors: RecordError[] = [];

    for (const r of records) {
        const key = JSON.stringify([r.patientId, r.tm2Code, r.diagnosisDate, text(r.practitionerId) ?? ""]);
        const first = seen.get(key);
        if (first === undefined) {
            seen.set(key, r.row);
            unique.push(r);
            continue;
        }
        errors.push({
            row: r.row,
            kind: "duplicate",
            fields: ["patientId", "tm2Code", "diagnosisDate", "practitionerId"],
            message: `duplicate of row ${first}`,
            patientId: r.patientId,
            duplicateOf: first,
        });
    }

    return { unique, errors };
}

/** Trims every field; blank optional fields become absent. */
export function normalizeRecords(records: readonly ValidatedRecord[]): CleanedRecord[] {
    return records.map((r) => {
        const systemType = text(r.systemType);
        const severity = text(r.severity);
        return {
            row: r.row,
            patientId: r.patientId,
            tm2Code: r.tm2Code,
            conditionName: r.conditionName,
            systemType,
            severity,
            diagnosisDate: r.diagnosisDate,
            practitionerId: text(r.practitionerId),
            original: { conditionName: r.conditionName, systemType, severity },
        };
    });
}

export function translateRecords(
    records: readonly CleanedRecord[],
    normalizer: TermNormalizer,
    recorder?: TranslationRecorder,
): CleanedRecord[] {
    return records.map((r) => ({
        ...r,
        conditionName: normalizer.translate(r.original.conditionName, "condition", recorder) || r.original.conditionName,
        systemType: r.original.systemType === undefined
            ? undefined
            : text(normalizer.translate(r.original.systemType, "systemType", recorder)),
        severity: r.original.severity === undefined
            ? undefined
            : text(normalizer.translate(r.original.severity, "severity", recorder)),
    }));
}

function distribution(values: readonly (string | undefined)[]): Record<string, number> {
    const out: Record<string, number> = {};
    for (const v of values) {
        if (v !== undefined) out[v] = (out[v] ?? 0) + 1;
    }
    return out;
}

export function summarizeCleaning(input: {
    totalRecords: number;
    records: readonly CleanedRecord[];
    errors: readonly RecordError[];
    translation: TranslationSummary;
}): CleaningStatistics {
    const { records, errors } = input;
    const duplicatesRemoved = errors.filter((e) => e.kind === "duplicate").length;
    const invalidRecordsRemoved = errors.length - duplicatesRemoved;
    const completeness = fieldCompleteness(records);

    let dateRange: CleaningStatistics["dateRange"] = null;
    for (const { diagnosisDate } of records) {
        if (!dateRange) dateRange = { earliest: diagnosisDate, latest: diagnosisDate };
        else if (diagnosisDate < dateRange.earliest) dateRange.earliest = diagnosisDate;
        else if (diagnosisDate > dateRange.latest) dateRange.latest = diagnosisDate;
    }

    return {
        totalRecords: input.totalRecords,
        cleanedRecords: records.length,
        duplicatesRemoved,
        invalidRecordsRemoved,
        fieldCompleteness: completeness,
        dataQualityScore: dataQualityScore(completeness, records.length, invalidRecordsRemoved),
        severityDistribution: distribution(records.map((r) => r.severity)),
        systemTypeDistribution: distribution(records.map((r) => r.systemType)),
        dateRange,
        translation: input.translation,
    };
}

/** Validate, dedupe, trim and translate one batch. Malformed rows are tallied, never thrown. */
export function clean(records: readonly RawRecord[], normalizer: TermNormalizer): CleaningResult {
    const validated = validateRecords(records);
    const deduped = dedupeRecords(validated.valid);
    const tally = new TranslationTally();
    const cleaned = translateRecords(normalizeRecords(deduped.unique), normalizer, tally);
    const errors = [...validated.errors, ...deduped.errors].sort((a, b) => a.row - b.row);

    return {
        records: cleaned,
        statistics: summarizeCleaning({
            totalRecords: records.length,
            records: cleaned,
            errors,
            translation: tally.summary(),
        }),
        errors,
    };
}
