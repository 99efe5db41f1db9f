import { stableId } from "../emr/ids";
import { validateFhirResource } from "../validation/fhir-ajv";
import type { EmrCondition, EmrEncounter, EmrGraph, EmrObservation, EmrPatient } from "../validation/emr";

export const TM2_PATIENT_SYSTEM = "urn:tm2:patient";
export const TM2_PRACTITIONER_SYSTEM = "urn:tm2:practitioner";
export const TM2_CODE_SYSTEM = "urn:who:icd11:tm2";

const CLINICAL_STATUS_SYSTEM = "http://terminology.hl7.org/CodeSystem/condition-clinical";
const ACT_CODE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ActCode";
const FHIR_ID = /^[A-Za-z0-9\-.]{1,64}$/;

/** Source patient ids are used as FHIR ids when they fit the id grammar, hashed otherwise. */
export function fhirPatientId(patientId: string): string {
    return FHIR_ID.test(patientId) ? patientId : stableId("PAT", patientId);
}

const patientRef = (patientId: string) => ({ reference: `Patient/${fhirPatientId(patientId)}` });
const practitioner = (practitionerId: string) => ({ identifier: { system: TM2_PRACTITIONER_SYSTEM, value: practitionerId } });

export function patientToFhir(p: EmrPatient) {
    return {
        resourceType: "Patient" as const,
        id: fhirPatientId(p.patientId),
        identifier: [{ system: TM2_PATIENT_SYSTEM, value: p.patientId }],
        ...(p.givenName || p.familyName
            ? { name: [{ ...(p.givenName ? { given: [p.givenName] } : {}), ...(p.familyName ? { family: p.familyName } : {}) }] }
            : {}),
        ...(p.gender ? { gender: p.gender } : {}),
        ...(p.birthDate ? { birthDate: p.birthDate } : {}),
        ...(p.address ? { address: [{ text: p.address }] } : {}),
        ...(p.phoneNumber ? { telecom: [{ system: "phone", value: p.phoneNumber }] } : {}),
    };
}

export function conditionToFhir(c: EmrCondition) {
    return {
        resourceType: "Condition" as const,
        id: c.conditionId,
        clinicalStatus: { coding: [{ system: CLINICAL_STATUS_SYSTEM, code: c.status }] },
        ...(c.systemType ? { category: [{ text: c.systemType }] } : {}),
        ...(c.severity ? { severity: { text: c.severity } } : {}),
        code: {
            coding: [{ system: TM2_CODE_SYSTEM, code: c.tm2Code, display: c.conditionName }],
            text: c.conditionName,
        },
        subject: patientRef(c.patientId),
        encounter: { reference: `Encounter/${c.encounterId}` },
        recordedDate: c.diagnosisDate,
        asserter: practitioner(c.practitionerId),
    };
}

export function encounterToFhir(e: EmrEncounter) {
    return {
        resourceType: "Encounter" as const,
        id: e.encounterId,
        status: "finished",
        class: { system: ACT_CODE_SYSTEM, code: "AMB", display: "ambulatory" },
        type: [{ text: e.encounterType }],
        subject: patientRef(e.patientId),
        participant: [{ individual: practitioner(e.practitionerId) }],
        period: { start: e.encounterDate },
        diagnosis: e.conditionIds.map((id) => ({ condition: { reference: `Condition/${id}` } })),
    };
}

export function observationToFhir(o: EmrObservation) {
    return {
        resourceType: "Observation" as const,
        id: o.observationId,
        status: "final",
        code: { text: o.concept },
        subject: patientRef(o.patientId),
        ...(o.encounterId ? { encounter: { reference: `Encounter/${o.encounterId}` } } : {}),
        ...(o.conditionId ? { focus: [{ reference: `Condition/${o.conditionId}` }] } : {}),
        effectiveDateTime: o.observationDate,
        ...(typeof o.value === "number"
            ? {
                valueQuantity: {
                    value: o.value,
                    ...(o.units ? { unit: o.units, system: "http://unitsofmeasure.org", code: o.units } : {}),
                },
            }
            : { valueString: o.value }),
        performer: [practitioner(o.practitionerId)],
    };
}

export type FhirResource =
    | ReturnType<typeof patientToFhir>
    | ReturnType<typeof conditionToFhir>
    | ReturnType<typeof encounterToFhir>
    | ReturnType<typeof observationToFhir>;

export interface FhirBundleEntry {
    resource: FhirResource;
    request: { method: "PUT"; url: string };
}

export interface FhirBundle {
    resourceType: "Bundle";
    type: "transaction";
    entry: FhirBundleEntry[];
}

/** Transaction bundle of PUTs keyed by the graph's stable ids, so resubmitting upserts. */
export function emrGraphToFhirBundle(graph: EmrGraph): FhirBundle {
    const resources: FhirResource[] = [
        ...graph.patients.map(patientToFhir),
        ...graph.encounters.map(encounterToFhir),
        ...graph.conditions.map(conditionToFhir),
        ...graph.observations.map(observationToFhir),
    ];
    return {
        resourceType: "Bundle",
        type: "transaction",
        entry: resources.map((resource) => ({
            resource,
            request: { method: "PUT", url: `${resource.resourceType}/${resource.id}` },
        })),
    };
}

export function validateFhirBundle(bundle: FhirBundle): string[] {
    return bundle.entry.flatMap(({ resource }) => {
        const v = validateFhirResource(resource);
        return v.ok ? [] : v.errors;
    });
}
