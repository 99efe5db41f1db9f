import { BatchError } from "../../pipeline/errors";
import { normalizeHeader, parseTm2Csv } from "./tm2";

test("parse TM2 csv to rows keyed by snake_case column", () => {
    const csv = Buffer.from(
        "\uFEFFPatient ID,tm2-code,Condition Name,diagnosis_date\n" +
        "PAT001,TM2.A01.01,अनिद्रा,2024-01-15\n" +
        "\n" +
        "PAT002,TM2.B02.03,\"Digestive, chronic\",2024-02-20\n",
    );
    expect(parseTm2Csv(csv)).toEqual([
        { patient_id: "PAT001", tm2_code: "TM2.A01.01", condition_name: "अनिद्रा", diagnosis_date: "2024-01-15" },
        { patient_id: "PAT002", tm2_code: "TM2.B02.03", condition_name: "Digestive, chronic", diagnosis_date: "2024-02-20" },
    ]);
});

test("short rows keep the cells they have", () => {
    const csv = Buffer.from("patient_id,tm2_code,condition_name,diagnosis_date,severity\nPAT001,TM2.A,ज्वर\n");
    expect(parseTm2Csv(csv)).toEqual([{ patient_id: "PAT001", tm2_code: "TM2.A", condition_name: "ज्वर" }]);
});

test("empty input yields no rows", () => {
    expect(parseTm2Csv(Buffer.from(""))).toEqual([]);
});

test("header only yields no rows", () => {
    expect(parseTm2Csv(Buffer.from("patient_id,tm2_code,condition_name,diagnosis_date\n"))).toEqual([]);
});

test("missing required columns fail the batch", () => {
    expect(() => parseTm2Csv(Buffer.from("patient_id,condition_name\nPAT001,ज्वर\n"))).toThrow(BatchError);
    expect(() => parseTm2Csv(Buffer.from("patient_id,condition_name\nPAT001,ज्वर\n"))).toThrow(
        "CSV is missing required columns: tm2_code, diagnosis_date",
    );
});

test("malformed quoting fails the batch", () => {
    const csv = Buffer.from('patient_id,tm2_code,condition_name,diagnosis_date\nPAT001,"TM2.A,ज्वर,2024-01-15\n');
    expect(() => parseTm2Csv(csv)).toThrow(BatchError);
});

test("header names are normalized", () => {
    expect(normalizeHeader("  Practitioner-ID ")).toBe("practitioner_id");
    expect(normalizeHeader("System  Type")).toBe("system_type");
});
