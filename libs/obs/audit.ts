import { LambdaClient, InvokeCommand } from "@aws-sdk/client-lambda";
import { loadConfig } from "../config";

const lambda = new LambdaClient({});
const AUDIT_FN_ARN = loadConfig().auditFnArn;

export interface AuditEvent {
    type: string;
    source: string;
    traceId: string;
    [key: string]: unknown;
}

export async function auditFireAndForget(event: AuditEvent) {
    if (!AUDIT_FN_ARN) return;
    try {
        await lambda.send(
            new InvokeCommand({
                FunctionName: AUDIT_FN_ARN,
                InvocationType: "Event",
                Payload: Buffer.from(JSON.stringify(event)),
            })
        );
    } catch (e) {
        console.warn("audit-invoke-failed", e instanceof Error ? e.message : String(e));
    }
}
