import { SendMessageCommand } from "@aws-sdk/client-sqs";
import { convert } from "../emr/builder";
import type { CleanedRecord } from "../validation/dto";
import { SqsEmrSubmitter } from "./sqs-submitter";

const rec = (row: number, patientId: string): CleanedRecord => ({
    row,
    patientId,
    tm2Code: "TM2.A01.01",
    conditionName: "Insomnia",
    severity: "Moderate",
    diagnosisDate: "2024-01-15",
    practitionerId: "DOC123",
    original: { conditionName: "अनिद्रा", severity: "मध्यम" },
});

const submittedAt = () => new Date("2024-05-01T09:00:00.000Z");

function sent(send: jest.Mock, call: number): SendMessageCommand {
    const cmd: unknown = send.mock.calls[call][0];
    if (!(cmd instanceof SendMessageCommand)) throw new Error("expected SendMessageCommand");
    return cmd;
}

test("one validated message is published per patient", async () => {
    const send = jest.fn().mockResolvedValueOnce({ MessageId: "m-1" }).mockResolvedValueOnce({ MessageId: "m-2" });
    const submitter = new SqsEmrSubmitter({ send }, "https://sqs.test/queue", "csv:test", submittedAt);
    const { graph } = convert([rec(0, "PAT001"), rec(1, "PAT002")], { dataQualityScore: 100, processingId: "run-1" });

    await expect(submitter.submit(graph, { processingId: "run-1" })).resolves.toEqual({ messageIds: ["m-1", "m-2"] });
    expect(send).toHaveBeenCalledTimes(2);

    const first = sent(send, 0);
    expect(first.input.QueueUrl).toBe("https://sqs.test/queue");
    expect(first.input.MessageAttributes).toEqual({
        schema: { DataType: "String", StringValue: "emr.submission.v1" },
        processingId: { DataType: "String", StringValue: "run-1" },
    });
    const body: unknown = JSON.parse(first.input.MessageBody ?? "");
    expect(body).toMatchObject({
        schema: "emr.submission.v1",
        metadata: {
            processingId: "run-1",
            submittedAt: "2024-05-01T09:00:00.000Z",
            sourceSystem: "csv:test",
            patientId: "PAT001",
            part: { index: 0, total: 2 },
        },
        data: { graph: { patients: [{ patientId: "PAT001" }] } },
    });
    expect(body).toHaveProperty("data.fhir.entry.length", 4);
    expect(body).toHaveProperty("data.graph.conditions.length", 1);
});

test("an empty graph publishes nothing", async () => {
    const send = jest.fn();
    const submitter = new SqsEmrSubmitter({ send }, "https://sqs.test/queue", "csv:test");
    const { graph } = convert([], { dataQualityScore: 0 });
    await expect(submitter.submit(graph, { processingId: "run-2" })).resolves.toEqual({ messageIds: [] });
    expect(send).not.toHaveBeenCalled();
});

test("an invalid FHIR resource stops the whole submission before sending", async () => {
    const send = jest.fn().mockResolvedValue({ MessageId: "m-1" });
    const submitter = new SqsEmrSubmitter({ send }, "https://sqs.test/queue", "csv:test");
    const { graph } = convert([rec(0, "PAT001"), rec(1, "PAT002")], { dataQualityScore: 100 });
    const broken = {
        ...graph,
        conditions: graph.conditions.map((c) => (c.patientId === "PAT002" ? { ...c, diagnosisDate: "2024-02-30" } : c)),
    };

    await expect(submitter.submit(broken, { processingId: "run-3" })).rejects.toThrow("FHIR bundle for patient PAT002 is invalid");
    expect(send).not.toHaveBeenCalled();
});

test("a send without a message id is an error", async () => {
    const send = jest.fn().mockResolvedValue({});
    const submitter = new SqsEmrSubmitter({ send }, "https://sqs.test/queue", "csv:test");
    const { graph } = convert([rec(0, "PAT001")], { dataQualityScore: 100 });
    await expect(submitter.submit(graph, { processingId: "run-4" })).rejects.toThrow("queue returned no MessageId for patient PAT001");
});
