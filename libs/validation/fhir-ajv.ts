import Ajv from "ajv";
import addFormats from "ajv-formats";
import patientSchema from "../contracts/schemas/fhir/Patient.r4.min.json";
import conditionSchema from "../contracts/schemas/fhir/Condition.r4.min.json";
import encounterSchema from "../contracts/schemas/fhir/Encounter.r4.min.json";
import observationSchema from "../contracts/schemas/fhir/Observation.r4.min.json";

const ajv = new Ajv({ strict: false, allErrors: true });
addFormats(ajv);

const validators = {
    Patient: ajv.compile(patientSchema),
    Condition: ajv.compile(conditionSchema),
    Encounter: ajv.compile(encounterSchema),
    Observation: ajv.compile(observationSchema),
};

export type FhirResourceType = keyof typeof validators;

export function validateFhirResource(resource: { resourceType: FhirResourceType }): { ok: true } | { ok: false; errors: string[] } {
    const type = resource.resourceType;
    const validate = validators[type];
    if (validate(resource)) return { ok: true };
    const errors = (validate.errors ?? []).map((e) => `${type}${e.instancePath} ${e.message}`);
    return { ok: false, errors };
}
