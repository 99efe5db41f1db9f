import { z } from "zod";

export const TM2_FIELDS = [
    "patientId",
    "tm2Code",
    "conditionName",
    "systemType",
    "severity",
    "diagnosisDate",
    "practitionerId",
] as const;

export type Tm2Field = (typeof TM2_FIELDS)[number];

// Wire (CSV header / JSON key) name of each field
export const TM2_COLUMNS: Readonly<Record<Tm2Field, string>> = {
    patientId: "patient_id",
    tm2Code: "tm2_code",
    conditionName: "condition_name",
    systemType: "system_type",
    severity: "severity",
    diagnosisDate: "diagnosis_date",
    practitionerId: "practitioner_id",
};

export const REQUIRED_FIELDS = ["patientId", "tm2Code", "conditionName", "diagnosisDate"] as const satisfies readonly Tm2Field[];

const Cell = z.union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()]);

export const Tm2RowSchema = z.record(z.string(), Cell);
// rows are checked one by one so a bad row costs only itself
export const Tm2RowsSchema = z.array(z.unknown());

export type Tm2Row = z.infer<typeof Tm2RowSchema>;

export const RawRecordSchema = z.object({
    row: z.number().int().nonnegative(),
    patientId: z.string().optional(),
    tm2Code: z.string().optional(),
    conditionName: z.string().optional(),
    systemType: z.string().optional(),
    severity: z.string().optional(),
    diagnosisDate: z.string().optional(),
    practitionerId: z.string().optional(),
    // set when the row is not an object of scalar cells
    malformed: z.string().optional(),
});

export type RawRecord = z.infer<typeof RawRecordSchema>;

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const CleanedRecordSchema = z.object({
    row: z.number().int().nonnegative(),
    patientId: z.string().min(1),
    tm2Code: z.string().min(1),
    conditionName: z.string().min(1),
    systemType: z.string().min(1).optional(),
    severity: z.string().min(1).optional(),
    diagnosisDate: IsoDateSchema,
    practitionerId: z.string().min(1).optional(),
    // untranslated, trimmed source terms
    original: z.object({
        conditionName: z.string(),
        systemType: z.string().optional(),
        severity: z.string().optional(),
    }),
});

export type CleanedRecord = z.infer<typeof CleanedRecordSchema>;
