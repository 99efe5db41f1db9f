import type { TermCategory } from "../../translation/normalizer";
import type { EmrGraph } from "../../validation/emr";
import type { FhirBundle } from "../../mappers/fhir";

export interface PreviewRequestV1 {
    rows?: Array<Record<string, string | number | boolean | null>>;
}

export interface MappingRequestV1 {
    category: TermCategory;
    nativeTerm: string;
    englishTerm: string;
}

export interface EmrSubmissionV1 {
    schema: "emr.submission.v1";
    metadata: {
        processingId: string;
        submittedAt: string;
        sourceSystem: string;
        patientId: string;
        part: { index: number; total: number };
    };
    data: {
        graph: EmrGraph;
        fhir: FhirBundle;
    };
}
