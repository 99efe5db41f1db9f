import type { CleanedRecord, Tm2Field } from "../validation/dto";

export type FieldCompleteness = Record<Tm2Field, number>;

const round2 = (n: number) => Math.round(n * 100) / 100;

export function fieldCompleteness(records: readonly CleanedRecord[]): FieldCompleteness {
    const pct = (field: Tm2Field): number => {
        if (records.length === 0) return 0;
        const filled = records.filter((r) => (r[field] ?? "").trim() !== "").length;
        return round2((filled / records.length) * 100);
    };
    return {
        patientId: pct("patientId"),
        tm2Code: pct("tm2Code"),
        conditionName: pct("conditionName"),
        systemType: pct("systemType"),
        severity: pct("severity"),
        diagnosisDate: pct("diagnosisDate"),
        practitionerId: pct("practitionerId"),
    };
}

/**
 * Mean field completeness scaled by the share of non-duplicate rows that passed validation.
 *
 * Duplicates are not penalised: the kept copy carries the same key, so dropping the
 * others loses nothing. Removing a complete record, blanking a field or adding an
 * invalid row can only lower the score.
 */
export function dataQualityScore(completeness: FieldCompleteness, valid: number, invalid: number): number {
    if (valid === 0) return 0;
    const values = Object.values(completeness);
    const meanCompleteness = values.reduce((acc, v) => acc + v, 0) / values.length;
    return round2(meanCompleteness * (valid / (valid + invalid)));
}
