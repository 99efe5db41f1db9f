import { CsvError, parse } from "csv-parse/sync";
import { z } from "zod";
import { BatchError } from "../../pipeline/errors";
import { REQUIRED_FIELDS, TM2_COLUMNS, type Tm2Row } from "../../validation/dto";

const ParsedRowsSchema = z.array(z.record(z.string(), z.string()));

export const normalizeHeader = (h: string) => h.trim().toLowerCase().replace(/[\s-]+/g, "_");

/**
 * TM2 export (UTF-8, header row) → rows keyed by snake_case column name.
 * Short rows keep only the cells they have; extra cells are dropped.
 */
export function parseTm2Csv(buf: Buffer): Tm2Row[] {
    let headers: string[] | undefined;
    let parsed: unknown;
    try {
        parsed = parse(buf, {
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
            columns: (header: string[]) => {
                headers = header.map(normalizeHeader);
                return headers;
            },
        });
    } catch (e) {
        if (e instanceof CsvError) {
            throw new BatchError(`CSV could not be parsed: ${e.message}`, { code: e.code });
        }
        throw e;
    }

    if (!headers) return [];

    const present = new Set(headers);
    const missing = REQUIRED_FIELDS.map((f) => TM2_COLUMNS[f]).filter((c) => !present.has(c));
    if (missing.length > 0) {
        throw new BatchError(`CSV is missing required columns: ${missing.join(", ")}`, { missing, headers });
    }

    const rows = ParsedRowsSchema.safeParse(parsed);
    if (!rows.success) {
        throw new BatchError("CSV rows have an unexpected shape", rows.error.issues);
    }
    return rows.data;
}
