import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs";
import type { EmrSubmissionV1 } from "../contracts/src/types";
import { validate } from "../contracts/src/validate";
import { toPatientRecords } from "../emr/graph";
import { emrGraphToFhirBundle, validateFhirBundle } from "../mappers/fhir";
import type { EmrGraph } from "../validation/emr";

export interface SubmissionReceipt {
    messageIds: string[];
}

/** Receives each completed batch's graph. Called at most once per batch. */
export interface EmrSubmitter {
    submit(graph: EmrGraph, ctx: { processingId: string }): Promise<SubmissionReceipt>;
}

export class SqsEmrSubmitter implements EmrSubmitter {
    constructor(
        private readonly sqs: Pick<SQSClient, "send">,
        private readonly queueUrl: string,
        private readonly sourceSystem: string,
        private readonly now: () => Date = () => new Date(),
    ) {}

    static fromQueueUrl(queueUrl: string, sourceSystem: string): SqsEmrSubmitter {
        return new SqsEmrSubmitter(new SQSClient({}), queueUrl, sourceSystem);
    }

    /**
     * Publishes one emr.submission.v1 message per patient record. Every message is
     * built and validated before the first send, so an invalid record publishes nothing.
     */
    async submit(graph: EmrGraph, { processingId }: { processingId: string }): Promise<SubmissionReceipt> {
        const records = toPatientRecords(graph);
        const submittedAt = this.now().toISOString();

        const messages = records.map((record, index): EmrSubmissionV1 => {
            const slice: EmrGraph = {
                patients: [record.patient],
                conditions: record.conditions,
                encounters: record.encounters,
                observations: record.observations,
                metadata: graph.metadata,
            };
            const fhir = emrGraphToFhirBundle(slice);
            const invalid = validateFhirBundle(fhir);
            if (invalid.length > 0) {
                throw new Error(`FHIR bundle for patient ${record.patient.patientId} is invalid: ${invalid.join("; ")}`);
            }
            const message: EmrSubmissionV1 = {
                schema: "emr.submission.v1",
                metadata: {
                    processingId,
                    submittedAt,
                    sourceSystem: this.sourceSystem,
                    patientId: record.patient.patientId,
                    part: { index, total: records.length },
                },
                data: { graph: slice, fhir },
            };
            validate<EmrSubmissionV1>("emr.submission.v1", message);
            return message;
        });

        const messageIds: string[] = [];
        for (const message of messages) {
            const out = await this.sqs.send(
                new SendMessageCommand({
                    QueueUrl: this.queueUrl,
                    MessageBody: JSON.stringify(message),
                    MessageAttributes: {
                        schema: { DataType: "String", StringValue: message.schema },
                        processingId: { DataType: "String", StringValue: processingId },
                    },
                }),
            );
            if (!out.MessageId) throw new Error(`queue returned no MessageId for patient ${message.metadata.patientId}`);
            messageIds.push(out.MessageId);
        }
        return { messageIds };
    }
}
