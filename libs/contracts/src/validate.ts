import Ajv2020, { type ErrorObject, type ValidateFunction } from "ajv/dist/2020";
import addFormats from "ajv-formats";

// Schemas
import previewRequest from "../schemas/tm2.preview.request.v1.json";
import mappingRequest from "../schemas/tm2.mapping.request.v1.json";
import submission from "../schemas/emr.submission.v1.json";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compile validators once (cold start cost only)
const validators = {
    "tm2.preview.request.v1": ajv.compile(previewRequest),
    "tm2.mapping.request.v1": ajv.compile(mappingRequest),
    "emr.submission.v1": ajv.compile(submission),
} satisfies Record<string, ValidateFunction>;

export type SchemaName = keyof typeof validators;

export class ContractError extends Error {
    constructor(readonly schemaName: SchemaName, readonly details: ErrorObject[]) {
        super(`Schema validation failed for ${schemaName}: ${details.map((e) => `${e.instancePath || "/"} ${e.message}`).join("; ")}`);
        this.name = "ContractError";
    }
}

export function validate<T>(schemaName: SchemaName, data: unknown): asserts data is T {
    const v = validators[schemaName];
    if (!v(data)) {
        throw new ContractError(schemaName, v.errors ?? []);
    }
}
