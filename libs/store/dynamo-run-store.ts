import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { PIPELINE_STAGES } from "../pipeline/state";
import type { BatchSummary } from "../stats/aggregator";
import { TERM_CATEGORIES } from "../translation/normalizer";
import type { RunRecord, RunStatus, RunStore } from "./run-store";

const count = z.number().int().nonnegative();
const tally = z.object({
    exact: count,
    caseInsensitive: count,
    partial: count,
    unmatched: count,
    blank: count,
    confidence: z.number(),
});

const BatchSummarySchema: z.ZodType<BatchSummary> = z.object({
    recordsReceived: count,
    recordsCleaned: count,
    duplicatesRemoved: count,
    invalidRecordsRemoved: count,
    patientsCreated: count,
    conditionsCreated: count,
    encountersCreated: count,
    observationsCreated: count,
    conversionErrors: count,
    dataQualityScore: z.number(),
    fieldCompleteness: z.object({
        patientId: z.number(),
        tm2Code: z.number(),
        conditionName: z.number(),
        systemType: z.number(),
        severity: z.number(),
        diagnosisDate: z.number(),
        practitionerId: z.number(),
    }),
    severityDistribution: z.record(count),
    systemTypeDistribution: z.record(count),
    dateRange: z.object({ earliest: z.string(), latest: z.string() }).nullable(),
    translation: z.object({
        categories: z.object({ condition: tally, systemType: tally, severity: tally }),
        partialMatches: z.array(z.object({ category: z.enum(TERM_CATEGORIES), input: z.string(), matchedKey: z.string(), value: z.string() })),
        partialMatchCount: z.number(),
    }),
    conversionTimeSeconds: z.number(),
});

const RunItemSchema: z.ZodType<RunRecord> = z.object({
    processingId: z.string(),
    filename: z.string().optional(),
    status: z.enum(["completed", "failed"]),
    startedAt: z.string(),
    finishedAt: z.string(),
    processingTimeSeconds: z.number(),
    summary: BatchSummarySchema.optional(),
    submittedMessages: count.optional(),
    submissionError: z.string().optional(),
    failedStage: z.enum(PIPELINE_STAGES).optional(),
    error: z.object({ name: z.string(), message: z.string() }).optional(),
});

const pk = (status: RunStatus) => `RUNS#${status}`;

/**
 * Run history in the single table: PK RUNS#<status>, SK RUN#<startedAt>#<processingId>.
 * ISO timestamps sort lexically, so the newest run is the first item of a descending query.
 */
export class DynamoRunStore implements RunStore {
    constructor(private readonly ddb: Pick<DynamoDBDocumentClient, "send">, private readonly tableName: string) {}

    static fromTableName(tableName: string): DynamoRunStore {
        const ddb = DynamoDBDocumentClient.from(new DynamoDBClient({}), {
            marshallOptions: { removeUndefinedValues: true },
        });
        return new DynamoRunStore(ddb, tableName);
    }

    async saveRun(run: RunRecord): Promise<void> {
        await this.ddb.send(
            new PutCommand({
                TableName: this.tableName,
                Item: { PK: pk(run.status), SK: `RUN#${run.startedAt}#${run.processingId}`, ...run },
                ConditionExpression: "attribute_not_exists(PK)",
            }),
        );
    }

    async latestRun(status: RunStatus): Promise<RunRecord | null> {
        const out = await this.ddb.send(
            new QueryCommand({
                TableName: this.tableName,
                KeyConditionExpression: "PK = :pk AND begins_with(SK, :run)",
                ExpressionAttributeValues: { ":pk": pk(status), ":run": "RUN#" },
                ScanIndexForward: false,
                Limit: 1,
            }),
        );
        const item = out.Items?.[0];
        if (!item) return null;
        // key attributes are stripped by the schema
        const parsed = RunItemSchema.safeParse(item);
        if (!parsed.success) {
            throw new Error(`stored run is malformed: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`);
        }
        return parsed.data;
    }
}
