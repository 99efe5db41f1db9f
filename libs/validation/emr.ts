import { z } from "zod";
import { IsoDateSchema } from "./dto";

const id = (prefix: string) => z.string().regex(new RegExp(`^${prefix}-[0-9a-f]{24}$`), `expected ${prefix}-<hash>`);

export const EmrPatientSchema = z.object({
    patientId: z.string().min(1),
    givenName: z.string().min(1).optional(),
    familyName: z.string().min(1).optional(),
    gender: z.enum(["male", "female", "other", "unknown"]).optional(),
    birthDate: IsoDateSchema.optional(),
    address: z.string().min(1).optional(),
    phoneNumber: z.string().min(1).optional(),
});

export const EmrConditionSchema = z.object({
    conditionId: id("COND"),
    patientId: z.string().min(1),
    encounterId: id("ENC"),
    conditionName: z.string().min(1),
    icdCode: z.string().min(1).optional(),
    tm2Code: z.string().min(1),
    systemType: z.string().min(1).optional(),
    severity: z.string().min(1).optional(),
    diagnosisDate: IsoDateSchema,
    practitionerId: z.string().min(1, "practitionerId is required for an EMR condition"),
    status: z.enum(["active", "inactive", "resolved"]),
    notes: z.string().optional(),
});

export const EmrEncounterSchema = z.object({
    encounterId: id("ENC"),
    patientId: z.string().min(1),
    encounterType: z.string().min(1),
    encounterDate: IsoDateSchema,
    practitionerId: z.string().min(1),
    location: z.string().min(1).optional(),
    conditionIds: z.array(id("COND")),
    observationIds: z.array(id("OBS")),
});

export const EmrObservationSchema = z.object({
    observationId: id("OBS"),
    patientId: z.string().min(1),
    encounterId: id("ENC").optional(),
    conditionId: id("COND").optional(),
    concept: z.string().min(1),
    value: z.union([z.string().min(1), z.number()]),
    units: z.string().min(1).optional(),
    observationDate: IsoDateSchema,
    practitionerId: z.string().min(1),
});

export type EmrPatient = z.infer<typeof EmrPatientSchema>;
export type EmrCondition = z.infer<typeof EmrConditionSchema>;
export type EmrEncounter = z.infer<typeof EmrEncounterSchema>;
export type EmrObservation = z.infer<typeof EmrObservationSchema>;

export interface EmrGraphMetadata {
    schemaVersion: 1;
    generatedAt: string;
    sourceSystem: string;
    processingId?: string;
}

export interface EmrGraph {
    patients: EmrPatient[];
    conditions: EmrCondition[];
    encounters: EmrEncounter[];
    observations: EmrObservation[];
    metadata: EmrGraphMetadata;
}

/** Per-patient view of a graph, the shape clinical systems ingest one patient at a time. */
export interface EmrPatientRecord {
    patient: EmrPatient;
    conditions: EmrCondition[];
    encounters: EmrEncounter[];
    observations: EmrObservation[];
}
