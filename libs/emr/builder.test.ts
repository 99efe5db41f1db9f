import type { CleanedRecord } from "../validation/dto";
import { convert, DEFAULT_ENCOUNTER_TYPE, SEVERITY_CONCEPT } from "./builder";
import { findDanglingReferences, toPatientRecords } from "./graph";
import { conditionId, encounterId, stableId } from "./ids";

const fixedNow = () => new Date("2024-05-01T08:00:00.000Z");

function rec(overrides: Partial<CleanedRecord> = {}): CleanedRecord {
    return {
        row: 0,
        patientId: "PAT001",
        tm2Code: "TM2.A01.01",
        conditionName: "Insomnia",
        systemType: "Ayurveda",
        severity: "Moderate",
        diagnosisDate: "2024-01-15",
        practitionerId: "DOC123",
        original: { conditionName: "अनिद्रा", systemType: "आयुर्वेद", severity: "मध्यम" },
        ...overrides,
    };
}

test("stable ids are prefixed SHA-256 digests of the natural key", () => {
    expect(stableId("COND", "a", "b")).toMatch(/^COND-[0-9a-f]{24}$/);
    expect(stableId("COND", "a", "b")).toBe(stableId("COND", "a", "b"));
    expect(stableId("COND", "a", "b")).not.toBe(stableId("COND", "ab", ""));
});

test("records of one visit share a patient and an encounter", () => {
    const { graph, statistics, errors } = convert(
        [rec(), rec({ row: 1, tm2Code: "TM2.B02.03", conditionName: "Digestive Disorders", severity: "Mild" })],
        { dataQualityScore: 97.5, processingId: "run-1", now: fixedNow },
    );

    expect(errors).toEqual([]);
    expect(graph.patients).toEqual([{ patientId: "PAT001" }]);
    expect(graph.conditions).toHaveLength(2);
    expect(graph.encounters).toHaveLength(1);

    const encounter = graph.encounters[0];
    expect(encounter.encounterId).toBe(encounterId("PAT001", "2024-01-15", "DOC123"));
    expect(encounter.encounterType).toBe(DEFAULT_ENCOUNTER_TYPE);
    expect(encounter.conditionIds).toEqual(graph.conditions.map((c) => c.conditionId));
    expect(encounter.observationIds).toEqual(graph.observations.map((o) => o.observationId));

    expect(graph.observations.map((o) => [o.concept, o.value])).toEqual([
        [SEVERITY_CONCEPT, "Moderate"],
        [SEVERITY_CONCEPT, "Mild"],
    ]);
    expect(findDanglingReferences(graph)).toEqual([]);
    expect(graph.metadata).toEqual({
        schemaVersion: 1,
        generatedAt: "2024-05-01T08:00:00.000Z",
        sourceSystem: "csv:tm2",
        processingId: "run-1",
    });
    expect(statistics).toMatchObject({
        totalRecordsProcessed: 2,
        patientsCreated: 1,
        conditionsCreated: 2,
        encountersCreated: 1,
        observationsCreated: 2,
        conversionErrors: 0,
        dataQualityScore: 97.5,
    });
});

test("conditions carry the translated terms and active status", () => {
    const { graph } = convert([rec()], { dataQualityScore: 100 });
    expect(graph.conditions[0]).toEqual({
        conditionId: conditionId(rec()),
        patientId: "PAT001",
        encounterId: encounterId("PAT001", "2024-01-15", "DOC123"),
        conditionName: "Insomnia",
        tm2Code: "TM2.A01.01",
        systemType: "Ayurveda",
        severity: "Moderate",
        diagnosisDate: "2024-01-15",
        practitionerId: "DOC123",
        status: "active",
    });
});

test("converting the same records twice yields the same identifiers", () => {
    const records = [rec(), rec({ row: 1, patientId: "PAT002", diagnosisDate: "2024-02-20" })];
    const a = convert(records, { dataQualityScore: 100 }).graph;
    const b = convert(records, { dataQualityScore: 100 }).graph;
    expect(b.conditions.map((c) => c.conditionId)).toEqual(a.conditions.map((c) => c.conditionId));
    expect(b.encounters.map((e) => e.encounterId)).toEqual(a.encounters.map((e) => e.encounterId));
    expect(b.observations.map((o) => o.observationId)).toEqual(a.observations.map((o) => o.observationId));
});

test("different practitioners on the same day get separate encounters", () => {
    const { graph } = convert([rec(), rec({ row: 1, tm2Code: "TM2.X", practitionerId: "DOC999" })], { dataQualityScore: 100 });
    expect(graph.patients).toHaveLength(1);
    expect(graph.encounters).toHaveLength(2);
});

test("a record without a practitioner is a conversion error and creates nothing", () => {
    const { graph, errors, statistics } = convert([rec({ row: 4, practitionerId: undefined })], { dataQualityScore: 80 });
    expect(errors).toEqual([
        {
            row: 4,
            patientId: "PAT001",
            message: "invalid EMR condition",
            issues: ["practitionerId: practitionerId is required for an EMR condition"],
        },
    ]);
    expect(graph.patients).toEqual([]);
    expect(graph.encounters).toEqual([]);
    expect(statistics.conversionErrors).toBe(1);
    expect(statistics.conditionsCreated).toBe(0);
});

test("the same condition key twice is reported once as a conversion error", () => {
    const { graph, errors } = convert([rec(), rec({ row: 1 })], { dataQualityScore: 100 });
    expect(graph.conditions).toHaveLength(1);
    expect(errors).toEqual([
        {
            row: 1,
            patientId: "PAT001",
            message: "condition already created in this batch",
            issues: [`conditionId: ${conditionId(rec())}`],
        },
    ]);
});

test("severity observations can be turned off", () => {
    const { graph } = convert([rec()], { dataQualityScore: 100, deriveSeverityObservations: false });
    expect(graph.observations).toEqual([]);
    expect(graph.encounters[0].observationIds).toEqual([]);
});

test("records without a severity derive no observation", () => {
    const { graph } = convert([rec({ severity: undefined })], { dataQualityScore: 100 });
    expect(graph.observations).toEqual([]);
});

test("empty input converts to an empty graph", () => {
    const { graph, statistics } = convert([], { dataQualityScore: 0, sourceSystem: "csv:test" });
    expect(graph.patients).toEqual([]);
    expect(graph.conditions).toEqual([]);
    expect(graph.encounters).toEqual([]);
    expect(graph.observations).toEqual([]);
    expect(graph.metadata.sourceSystem).toBe("csv:test");
    expect(statistics.totalRecordsProcessed).toBe(0);
    expect(statistics.patientsCreated).toBe(0);
});

test("dangling references are listed", () => {
    const { graph } = convert([rec()], { dataQualityScore: 100 });
    const cond = graph.conditions[0];
    const broken = { ...graph, patients: [] };
    expect(findDanglingReferences(broken)).toContain(`condition ${cond.conditionId} -> patient PAT001`);
    expect(findDanglingReferences({ ...graph, patients: [...graph.patients, ...graph.patients] })).toEqual([
        "patients: duplicate patientId",
    ]);
});

test("patient records group entities by patient", () => {
    const { graph } = convert(
        [rec(), rec({ row: 1, patientId: "PAT002", diagnosisDate: "2024-02-20" }), rec({ row: 2, tm2Code: "TM2.Z" })],
        { dataQualityScore: 100 },
    );
    const records = toPatientRecords(graph);
    expect(records.map((r) => [r.patient.patientId, r.conditions.length, r.encounters.length, r.observations.length])).toEqual([
        ["PAT001", 2, 1, 2],
        ["PAT002", 1, 1, 1],
    ]);
});
