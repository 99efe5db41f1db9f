import type { APIGatewayProxyEventV2WithJWTAuthorizer, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { loadConfig, type Config } from "../../libs/config";
import type { MappingRequestV1, PreviewRequestV1 } from "../../libs/contracts/src/types";
import { ContractError, validate } from "../../libs/contracts/src/validate";
import { Tm2Pipeline, type BatchResult } from "../../libs/pipeline/orchestrator";
import { DynamoRunStore } from "../../libs/store/dynamo-run-store";
import type { RunStore } from "../../libs/store/run-store";
import { SqsEmrSubmitter } from "../../libs/submission/sqs-submitter";
import { TermNormalizer } from "../../libs/translation/normalizer";

export type ApiEvent = APIGatewayProxyEventV2WithJWTAuthorizer;
export type ApiResult = APIGatewayProxyStructuredResultV2;

export interface ApiDeps {
    pipeline: Tm2Pipeline;
    normalizer: TermNormalizer;
    runStore: RunStore;
    config: Pick<Config, "serviceName" | "serviceVersion">;
    startedAt?: number;
}

class BadRequest extends Error {}

const json = (statusCode: number, body: unknown): ApiResult => ({
    statusCode,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
});

const batchResponse = (result: BatchResult) =>
    result.status === "completed" ? json(200, { ok: true, ...result }) : json(422, { ok: false, ...result });

function groups(event: ApiEvent): string[] {
    const raw = event.requestContext.authorizer?.jwt?.claims?.["cognito:groups"];
    if (Array.isArray(raw)) return raw;
    // HTTP API flattens list claims to "[admin editor]"
    if (typeof raw === "string") return raw.replace(/^\[|\]$/g, "").split(/[,\s]+/).filter(Boolean);
    return [];
}

function jsonBody(event: ApiEvent): unknown {
    if (!event.body) return {};
    const text = event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
    try {
        return JSON.parse(text);
    } catch {
        throw new BadRequest("Malformed JSON body");
    }
}

export function createHandler(deps: ApiDeps) {
    const startedAt = deps.startedAt ?? Date.now();

    return async (event: ApiEvent): Promise<ApiResult> => {
        const route = event.routeKey === "$default"
            ? `${event.requestContext.http.method} ${event.rawPath}`
            : event.routeKey;
        try {
            switch (route) {
                case "POST /ingest/trigger": {
                    const filename = event.queryStringParameters?.filename ?? event.headers["x-filename"];
                    if (!filename || !filename.toLowerCase().endsWith(".csv")) {
                        return json(400, { ok: false, error: "Only CSV files are supported" });
                    }
                    const buf = Buffer.from(event.body ?? "", event.isBase64Encoded ? "base64" : "utf8");
                    return batchResponse(await deps.pipeline.processCsv(buf, filename));
                }
                case "GET /status":
                    return json(200, {
                        ok: true,
                        service: deps.config.serviceName,
                        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
                        statistics: deps.pipeline.cumulativeStatistics(),
                        translation: deps.normalizer.stats(),
                    });
                case "GET /health":
                    return json(200, {
                        status: "healthy",
                        service: deps.config.serviceName,
                        version: deps.config.serviceVersion,
                        timestamp: new Date().toISOString(),
                    });
                case "GET /data/cleanup-stats": {
                    const run = await deps.runStore.latestRun("completed");
                    if (!run?.summary) return json(404, { ok: false, error: "No completed runs yet" });
                    const s = run.summary;
                    return json(200, {
                        ok: true,
                        processingId: run.processingId,
                        ...(run.filename ? { filename: run.filename } : {}),
                        lastUpdated: run.finishedAt,
                        cleanupStatistics: {
                            recordsProcessed: s.recordsReceived,
                            recordsCleaned: s.recordsCleaned,
                            duplicatesRemoved: s.duplicatesRemoved,
                            invalidRecordsRemoved: s.invalidRecordsRemoved,
                            dataQualityScore: s.dataQualityScore,
                            fieldCompleteness: s.fieldCompleteness,
                            severityDistribution: s.severityDistribution,
                            systemTypeDistribution: s.systemTypeDistribution,
                            dateRange: s.dateRange,
                        },
                    });
                }
                case "POST /emr/preview": {
                    const body = jsonBody(event);
                    validate<PreviewRequestV1>("tm2.preview.request.v1", body);
                    return batchResponse(await deps.pipeline.preview(body.rows));
                }
                case "POST /mappings": {
                    if (!groups(event).includes("admin")) return json(403, { ok: false, error: "Forbidden" });
                    const body = jsonBody(event);
                    validate<MappingRequestV1>("tm2.mapping.request.v1", body);
                    const outcome = deps.normalizer.register(body.category, body.nativeTerm, body.englishTerm);
                    return json(200, { ok: true, outcome, translation: deps.normalizer.stats() });
                }
                default:
                    return json(404, { ok: false, error: `No route for ${route}` });
            }
        } catch (err) {
            if (err instanceof ContractError) return json(400, { ok: false, error: err.message, details: err.details });
            if (err instanceof BadRequest) return json(400, { ok: false, error: err.message });
            console.error("api-error", { route, error: err instanceof Error ? err.stack : String(err) });
            return json(500, { ok: false, error: "Internal Error" });
        }
    };
}

function productionDeps(): ApiDeps {
    const config = loadConfig();
    if (!config.runsTableName || !config.submissionQueueUrl) {
        throw new Error("RUNS_TABLE_NAME and SUBMISSION_QUEUE_URL must be set");
    }
    const normalizer = new TermNormalizer();
    const runStore = DynamoRunStore.fromTableName(config.runsTableName);
    const submitter = SqsEmrSubmitter.fromQueueUrl(config.submissionQueueUrl, config.sourceSystem);
    return {
        normalizer,
        runStore,
        config,
        pipeline: new Tm2Pipeline({ normalizer, submitter, runStore, config }),
    };
}

// built on first invocation; module state lives as long as the container
let handler: ReturnType<typeof createHandler> | undefined;

export const main = async (event: ApiEvent): Promise<ApiResult> => {
    handler ??= createHandler(productionDeps());
    return handler(event);
};
