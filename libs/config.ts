import { z } from "zod";

const optionalText = z.string().trim().min(1).optional();

const EnvSchema = z.object({
    SERVICE_NAME: z.string().min(1).default("tm2-emr-pipeline"),
    SERVICE_VERSION: z.string().min(1).default("1.0.0"),
    SOURCE_SYSTEM: z.string().min(1).default("csv:tm2"),
    PREVIEW_MAX_ROWS: z.coerce.number().int().positive().default(50),
    RUNS_TABLE_NAME: optionalText,
    SUBMISSION_QUEUE_URL: optionalText,
    METRICS_NS: optionalText,
    AUDIT_FN_ARN: optionalText,
});

export interface Config {
    serviceName: string;
    serviceVersion: string;
    sourceSystem: string;
    previewMaxRows: number;
    runsTableName?: string;
    submissionQueueUrl?: string;
    metricsNamespace?: string;
    auditFnArn?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;
    return {
        serviceName: e.SERVICE_NAME,
        serviceVersion: e.SERVICE_VERSION,
        sourceSystem: e.SOURCE_SYSTEM,
        previewMaxRows: e.PREVIEW_MAX_ROWS,
        runsTableName: e.RUNS_TABLE_NAME,
        submissionQueueUrl: e.SUBMISSION_QUEUE_URL,
        metricsNamespace: e.METRICS_NS,
        auditFnArn: e.AUDIT_FN_ARN,
    };
}
