import { createHash } from "crypto";

export type IdPrefix = "PAT" | "COND" | "ENC" | "OBS";

/** `<prefix>-<24 hex>` from a SHA-256 of the natural key; same key, same id, every run. */
export function stableId(prefix: IdPrefix, ...key: string[]): string {
    const digest = createHash("sha256").update(JSON.stringify(key)).digest("hex");
    return `${prefix}-${digest.slice(0, 24)}`;
}

export function conditionKey(r: { patientId: string; tm2Code: string; diagnosisDate: string; practitionerId?: string }): string[] {
    return [r.patientId, r.tm2Code, r.diagnosisDate, r.practitionerId ?? ""];
}

export const conditionId = (r: Parameters<typeof conditionKey>[0]) => stableId("COND", ...conditionKey(r));

export const encounterId = (patientId: string, diagnosisDate: string, practitionerId: string) =>
    stableId("ENC", patientId, diagnosisDate, practitionerId);

export const observationId = (conditionIdValue: string, concept: string) => stableId("OBS", conditionIdValue, concept);
