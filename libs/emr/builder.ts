import { BatchError, type ConversionError } from "../pipeline/errors";
import type { CleanedRecord } from "../validation/dto";
import {
    EmrConditionSchema,
    type EmrCondition,
    type EmrEncounter,
    type EmrGraph,
    type EmrObservation,
    type EmrPatient,
} from "../validation/emr";
import { conditionId, conditionKey, encounterId, observationId } from "./ids";

export const DEFAULT_ENCOUNTER_TYPE = "traditional_medicine_consultation";
export const SEVERITY_CONCEPT = "Severity";
export const DEFAULT_SOURCE_SYSTEM = "csv:tm2";

export interface EmrStatistics {
    totalRecordsProcessed: number;
    patientsCreated: number;
    conditionsCreated: number;
    encountersCreated: number;
    observationsCreated: number;
    conversionErrors: number;
    // inherited from cleaning, never recomputed here
    dataQualityScore: number;
    processingTimeSeconds: number;
}

export interface ConvertOptions {
    dataQualityScore: number;
    processingId?: string;
    sourceSystem?: string;
    /** Derive a "Severity" observation for each condition that has a severity. Default true. */
    deriveSeverityObservations?: boolean;
    now?: () => Date;
}

export interface ConversionResult {
    graph: EmrGraph;
    statistics: EmrStatistics;
    errors: ConversionError[];
}

export function emptyGraph(opts: { sourceSystem?: string; processingId?: string; now?: () => Date } = {}): EmrGraph {
    return {
        patients: [],
        conditions: [],
        encounters: [],
        observations: [],
        metadata: {
            schemaVersion: 1,
            generatedAt: (opts.now?.() ?? new Date()).toISOString(),
            sourceSystem: opts.sourceSystem ?? DEFAULT_SOURCE_SYSTEM,
            ...(opts.processingId ? { processingId: opts.processingId } : {}),
        },
    };
}

/**
 * Builds the Patient / Condition / Encounter / Observation graph for one batch.
 *
 * One condition per record, one patient per patientId, one encounter per
 * (patient, date, practitioner). A record that violates an EMR constraint is
 * reported as a ConversionError and skipped; the rest of the batch carries on.
 */
export function convert(records: readonly CleanedRecord[], options: ConvertOptions): ConversionResult {
    const t0 = Date.now();
    const deriveObservations = options.deriveSeverityObservations ?? true;

    const graph = emptyGraph(options);
    const patients = new Map<string, EmrPatient>();
    const encounters = new Map<string, EmrEncounter>();
    const conditionKeys = new Map<string, string>();
    const conditions: EmrCondition[] = [];
    const observations: EmrObservation[] = [];
    const errors: ConversionError[] = [];

    for (const record of records) {
        const practitionerId = record.practitionerId ?? "";
        const encId = encounterId(record.patientId, record.diagnosisDate, practitionerId);

        const parsed = EmrConditionSchema.safeParse({
            conditionId: conditionId(record),
            patientId: record.patientId,
            encounterId: encId,
            conditionName: record.conditionName,
            tm2Code: record.tm2Code,
            systemType: record.systemType,
            severity: record.severity,
            diagnosisDate: record.diagnosisDate,
            practitionerId,
            status: "active",
        });
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
            errors.push({ row: record.row, patientId: record.patientId, message: "invalid EMR condition", issues });
            continue;
        }
        const condition = parsed.data;

        const key = JSON.stringify(conditionKey(record));
        const seenKey = conditionKeys.get(condition.conditionId);
        if (seenKey !== undefined && seenKey !== key) {
            throw new BatchError("condition identifier collision", { conditionId: condition.conditionId, keys: [seenKey, key] });
        }
        if (seenKey !== undefined) {
            errors.push({
                row: record.row,
                patientId: record.patientId,
                message: "condition already created in this batch",
                issues: [`conditionId: ${condition.conditionId}`],
            });
            continue;
        }
        conditionKeys.set(condition.conditionId, key);

        if (!patients.has(record.patientId)) {
            patients.set(record.patientId, { patientId: record.patientId });
        }

        let encounter = encounters.get(encId);
        if (!encounter) {
            encounter = {
                encounterId: encId,
                patientId: record.patientId,
                encounterType: DEFAULT_ENCOUNTER_TYPE,
                encounterDate: record.diagnosisDate,
                practitionerId: condition.practitionerId,
                conditionIds: [],
                observationIds: [],
            };
            encounters.set(encId, encounter);
        }
        encounter.conditionIds.push(condition.conditionId);

        if (deriveObservations && condition.severity) {
            const observation: EmrObservation = {
                observationId: observationId(condition.conditionId, SEVERITY_CONCEPT),
                patientId: condition.patientId,
                encounterId: encId,
                conditionId: condition.conditionId,
                concept: SEVERITY_CONCEPT,
                value: condition.severity,
                observationDate: condition.diagnosisDate,
                practitionerId: condition.practitionerId,
            };
            observations.push(observation);
            encounter.observationIds.push(observation.observationId);
        }

        conditions.push(Object.freeze(condition));
    }

    graph.patients = [...patients.values()];
    graph.conditions = conditions;
    graph.encounters = [...encounters.values()];
    graph.observations = observations;

    return {
        graph,
        statistics: {
            totalRecordsProcessed: records.length,
            patientsCreated: graph.patients.length,
            conditionsCreated: conditions.length,
            encountersCreated: graph.encounters.length,
            observationsCreated: observations.length,
            conversionErrors: errors.length,
            dataQualityScore: options.dataQualityScore,
            processingTimeSeconds: (Date.now() - t0) / 1000,
        },
        errors,
    };
}
