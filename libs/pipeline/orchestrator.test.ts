import { InMemoryRunStore } from "../store/run-store";
import type { EmrSubmitter } from "../submission/sqs-submitter";
import { TermNormalizer } from "../translation/normalizer";
import { Tm2Pipeline, type BatchResult, type CompletedBatch, type FailedBatch, type PipelineDeps } from "./orchestrator";

const insomnia = {
    patient_id: "PAT001",
    tm2_code: "TM2.A01.01",
    condition_name: "अनिद्रा",
    system_type: "आयुर्वेद",
    severity: "मध्यम",
    diagnosis_date: "2024-01-15",
    practitioner_id: "DOC123",
};

function setup(overrides: Partial<PipelineDeps> = {}) {
    const submit = jest.fn<ReturnType<EmrSubmitter["submit"]>, Parameters<EmrSubmitter["submit"]>>();
    submit.mockResolvedValue({ messageIds: ["msg-1"] });
    const runStore = new InMemoryRunStore();
    let n = 0;
    const pipeline = new Tm2Pipeline({
        normalizer: new TermNormalizer(),
        submitter: { submit },
        runStore,
        config: { sourceSystem: "csv:test", previewMaxRows: 5 },
        newId: () => `run-${++n}`,
        ...overrides,
    });
    return { pipeline, submit, runStore };
}

function completed(result: BatchResult): CompletedBatch {
    if (result.status !== "completed") throw new Error(`expected completed, got failed at ${result.failedStage}`);
    return result;
}

function failed(result: BatchResult): FailedBatch {
    if (result.status !== "failed") throw new Error("expected failed batch");
    return result;
}

test("a row and its duplicate become one patient with one translated condition", async () => {
    const { pipeline, submit, runStore } = setup();
    const result = completed(await pipeline.process([insomnia, { ...insomnia }], { filename: "clinic.csv" }));

    expect(result.processingId).toBe("run-1");
    expect(result.filename).toBe("clinic.csv");
    expect(result.summary.duplicatesRemoved).toBe(1);
    expect(result.summary.invalidRecordsRemoved).toBe(0);
    expect(result.emr.patients).toEqual([{ patientId: "PAT001" }]);
    expect(result.emr.conditions).toHaveLength(1);
    expect(result.emr.conditions[0]).toMatchObject({
        conditionName: "Insomnia",
        systemType: "Ayurveda",
        severity: "Moderate",
    });
    expect(result.emr.metadata).toMatchObject({ sourceSystem: "csv:test", processingId: "run-1" });
    expect(result.transitions.map((t) => t.stage)).toEqual([
        "received",
        "validating",
        "cleaning",
        "translating",
        "converting",
        "completed",
    ]);

    expect(submit).toHaveBeenCalledTimes(1);
    expect(submit).toHaveBeenCalledWith(result.emr, { processingId: "run-1" });
    expect(result.submission).toEqual({ ok: true, messageIds: ["msg-1"] });
    expect(result.persistence).toEqual({ ok: true, processingId: "run-1" });

    const [run] = runStore.all();
    expect(run).toMatchObject({ processingId: "run-1", filename: "clinic.csv", status: "completed", submittedMessages: 1 });
    expect(run.summary).toEqual(result.summary);
    expect(pipeline.cumulativeStatistics()).toMatchObject({ batchesCompleted: 1, recordsReceived: 2, duplicatesRemoved: 1 });
});

test("an empty batch completes with an empty graph and zero statistics", async () => {
    const { pipeline } = setup();
    const result = completed(await pipeline.process([]));
    expect(result.emr.patients).toEqual([]);
    expect(result.emr.conditions).toEqual([]);
    expect(result.summary).toMatchObject({
        recordsReceived: 0,
        recordsCleaned: 0,
        conditionsCreated: 0,
        dataQualityScore: 0,
    });
    expect(result.recordErrors).toEqual([]);
});

test("input that is not a batch fails in validation and is still recorded", async () => {
    const { pipeline, submit, runStore } = setup();
    const result = failed(await pipeline.process({ rows: "nope" }));

    expect(result.failedStage).toBe("validating");
    expect(result.error.name).toBe("BatchError");
    expect(result.error.message).toBe("input is not a list of TM2 rows");
    expect(result.transitions.map((t) => t.stage)).toEqual(["received", "validating", "failed"]);
    expect(submit).not.toHaveBeenCalled();
    expect(runStore.all()).toEqual([
        expect.objectContaining({ processingId: "run-1", status: "failed", failedStage: "validating" }),
    ]);
    expect(pipeline.cumulativeStatistics()).toMatchObject({ batchesCompleted: 0, batchesFailed: 1 });
});

test("malformed rows are rejected without failing the batch", async () => {
    const { pipeline, submit } = setup();
    const result = completed(
        await pipeline.process([insomnia, null, { ...insomnia, patient_id: "PAT002", severity: { level: "x" } }]),
    );

    expect(result.emr.conditions.map((c) => c.patientId)).toEqual(["PAT001"]);
    expect(result.recordErrors.map((e) => [e.row, e.kind])).toEqual([
        [1, "malformed_row"],
        [2, "malformed_row"],
    ]);
    expect(result.summary).toMatchObject({ recordsReceived: 3, invalidRecordsRemoved: 2, dataQualityScore: 33.33 });
    expect(submit).toHaveBeenCalledTimes(1);
});

test("a batch with thousands of partial matches still fits in one run item", async () => {
    jest.spyOn(console, "info").mockImplementation(() => undefined);
    const { pipeline, runStore } = setup();
    const rows = Array.from({ length: 5000 }, (_, i) => ({
        ...insomnia,
        patient_id: `PAT${i}`,
        condition_name: `chronic fever variant ${i}`,
    }));

    const result = completed(await pipeline.process(rows));
    expect(result.persistence).toEqual({ ok: true, processingId: "run-1" });
    expect(result.summary.translation.partialMatchCount).toBe(5000);
    expect(result.summary.translation.partialMatches).toHaveLength(100);

    const [run] = runStore.all();
    expect(Buffer.byteLength(JSON.stringify(run))).toBeLessThan(400 * 1024);
    jest.restoreAllMocks();
});

test("csv bytes run through the whole pipeline", async () => {
    const { pipeline } = setup();
    const csv = Buffer.from(
        "Patient ID,TM2 Code,Condition Name,System Type,Severity,Diagnosis Date,Practitioner ID\n" +
        "PAT010,TM2.C01,ज्वर,सिद्ध,तीव्र,20/02/2024,DOC9\n" +
        "PAT011,TM2.C02,कास,,,2024-02-21,\n",
    );
    const result = completed(await pipeline.processCsv(csv, "feb.csv"));
    expect(result.emr.conditions.map((c) => [c.patientId, c.conditionName, c.systemType, c.diagnosisDate])).toEqual([
        ["PAT010", "Fever", "Siddha", "2024-02-20"],
    ]);
    expect(result.conversionErrors).toEqual([
        expect.objectContaining({ row: 1, patientId: "PAT011", message: "invalid EMR condition" }),
    ]);
    expect(result.summary.conversionErrors).toBe(1);
});

test("a csv without the required columns fails before validation", async () => {
    const { pipeline } = setup();
    const result = failed(await pipeline.processCsv(Buffer.from("patient_id,severity\nPAT001,Mild\n"), "bad.csv"));
    expect(result.failedStage).toBe("received");
    expect(result.error.message).toBe("CSV is missing required columns: tm2_code, condition_name, diagnosis_date");
});

test("preview runs the bundled sample without side effects", async () => {
    const { pipeline, submit, runStore } = setup();
    const result = completed(await pipeline.preview());

    expect(result.emr.patients.map((p) => p.patientId)).toEqual(["PAT001", "PAT002"]);
    expect(result.emr.conditions.map((c) => c.conditionName)).toEqual(["Insomnia", "Digestive Disorders"]);
    expect(result.summary.translation.partialMatches).toHaveLength(1);
    expect(result.submission).toBeUndefined();
    expect(result.persistence).toBeUndefined();
    expect(submit).not.toHaveBeenCalled();
    expect(runStore.all()).toEqual([]);
    expect(pipeline.cumulativeStatistics().batchesCompleted).toBe(0);
});

test("preview rejects more rows than allowed", async () => {
    const { pipeline, runStore } = setup({ config: { sourceSystem: "csv:test", previewMaxRows: 1 } });
    const result = failed(await pipeline.preview([insomnia, insomnia]));
    expect(result.failedStage).toBe("received");
    expect(result.error.message).toBe("preview accepts at most 1 rows, got 2");
    expect(runStore.all()).toEqual([]);
    expect(pipeline.cumulativeStatistics().batchesFailed).toBe(0);
});

test("a failed submission is reported without failing the batch", async () => {
    const { pipeline, submit, runStore } = setup();
    submit.mockRejectedValueOnce(new Error("queue unavailable"));
    const result = completed(await pipeline.process([insomnia]));

    expect(result.submission).toEqual({ ok: false, error: "queue unavailable" });
    expect(result.persistence).toEqual({ ok: true, processingId: "run-1" });
    expect(runStore.all()[0].submissionError).toBe("queue unavailable");
    expect(pipeline.cumulativeStatistics().batchesCompleted).toBe(1);
});

test("a failed save is reported without failing the batch", async () => {
    const runStore = new InMemoryRunStore();
    jest.spyOn(runStore, "saveRun").mockRejectedValue(new Error("table missing"));
    const { pipeline } = setup({ runStore });
    const result = completed(await pipeline.process([insomnia]));
    expect(result.persistence).toEqual({ ok: false, error: "table missing" });
    expect(pipeline.cumulativeStatistics().batchesCompleted).toBe(1);
});

test("errors other than BatchError propagate", async () => {
    const normalizer = new TermNormalizer();
    jest.spyOn(normalizer, "translate").mockImplementation(() => {
        throw new RangeError("dictionary corrupted");
    });
    const { pipeline } = setup({ normalizer });
    await expect(pipeline.process([insomnia])).rejects.toThrow(RangeError);
});
