import type { EmrGraph, EmrPatientRecord } from "../validation/emr";

/** Every dangling reference in the graph, as "<entity> <id> -> <missing ref>". Empty when consistent. */
export function findDanglingReferences(graph: EmrGraph): string[] {
    const patients = new Set(graph.patients.map((p) => p.patientId));
    const conditions = new Set(graph.conditions.map((c) => c.conditionId));
    const encounters = new Set(graph.encounters.map((e) => e.encounterId));
    const observations = new Set(graph.observations.map((o) => o.observationId));
    const out: string[] = [];

    if (patients.size !== graph.patients.length) out.push("patients: duplicate patientId");

    for (const c of graph.conditions) {
        if (!patients.has(c.patientId)) out.push(`condition ${c.conditionId} -> patient ${c.patientId}`);
        if (!encounters.has(c.encounterId)) out.push(`condition ${c.conditionId} -> encounter ${c.encounterId}`);
    }
    for (const e of graph.encounters) {
        if (!patients.has(e.patientId)) out.push(`encounter ${e.encounterId} -> patient ${e.patientId}`);
        for (const id of e.conditionIds) {
            if (!conditions.has(id)) out.push(`encounter ${e.encounterId} -> condition ${id}`);
        }
        for (const id of e.observationIds) {
            if (!observations.has(id)) out.push(`encounter ${e.encounterId} -> observation ${id}`);
        }
    }
    for (const o of graph.observations) {
        if (!patients.has(o.patientId)) out.push(`observation ${o.observationId} -> patient ${o.patientId}`);
        if (o.encounterId !== undefined && !encounters.has(o.encounterId)) {
            out.push(`observation ${o.observationId} -> encounter ${o.encounterId}`);
        }
        if (o.conditionId !== undefined && !conditions.has(o.conditionId)) {
            out.push(`observation ${o.observationId} -> condition ${o.conditionId}`);
        }
    }
    return out;
}

/** Regroups the flat graph into one record per patient, in patient order. */
export function toPatientRecords(graph: EmrGraph): EmrPatientRecord[] {
    const byPatient = new Map<string, EmrPatientRecord>();
    for (const patient of graph.patients) {
        byPatient.set(patient.patientId, { patient, conditions: [], encounters: [], observations: [] });
    }
    for (const c of graph.conditions) byPatient.get(c.patientId)?.conditions.push(c);
    for (const e of graph.encounters) byPatient.get(e.patientId)?.encounters.push(e);
    for (const o of graph.observations) byPatient.get(o.patientId)?.observations.push(o);
    return [...byPatient.values()];
}
