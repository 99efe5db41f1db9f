import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { randomUUID } from "crypto";
import { z } from "zod";

const AuditEnvelopeSchema = z
    .object({
        type: z.string().default("unknown"),
        source: z.string().default("unknown"),
        traceId: z.string().optional(),
    })
    .passthrough();

export type PutLine = (key: string, body: string) => Promise<void>;

/** One JSONL object per audit event, partitioned by source, date and hour (UTC). */
export function createAuditHandler(put: PutLine, now: () => Date = () => new Date(), newId: () => string = randomUUID) {
    return async (event: unknown) => {
        const parsed = AuditEnvelopeSchema.safeParse(event);
        const envelope = parsed.success ? parsed.data : { type: "unknown", source: "unknown" };
        const at = now();
        const date = at.toISOString().slice(0, 10); // YYYY-MM-DD
        const hour = String(at.getUTCHours()).padStart(2, "0");
        const source = envelope.source.replace(/[^A-Za-z0-9:._-]/g, "_");
        const key = `source=${source}/date=${date}/hour=${hour}/${newId()}.jsonl`;

        const line = JSON.stringify({
            at: at.toISOString(),
            type: envelope.type,
            source: envelope.source,
            traceId: envelope.traceId,
            payload: event,
        }) + "\n";

        await put(key, line);
        return { ok: true, key };
    };
}

const s3 = new S3Client({});

export const handler = createAuditHandler(async (key, body) => {
    const bucket = process.env.AUDIT_BUCKET;
    if (!bucket) throw new Error("AUDIT_BUCKET is not set");
    await s3.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: "application/x-ndjson" }));
});
