const pad2 = (n: number) => String(n).padStart(2, "0");

function calendarDate(year: number, month: number, day: number): string | null {
    if (year < 1000 || month < 1 || month > 12 || day < 1) return null;
    // day 0 of the following month is the last day of this one
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day > daysInMonth) return null;
    return `${year}-${pad2(month)}-${pad2(day)}`;
}

// YYYY-MM-DD or YYYY/MM/DD, optionally followed by a time of day
const YEAR_FIRST = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
// DD-MM-YYYY, DD/MM/YYYY, DD.MM.YYYY
const DAY_FIRST = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/;

/**
 * Parses a TM2 diagnosis date into a calendar date (`YYYY-MM-DD`).
 * Date-times keep their calendar date as written; no timezone shift is applied.
 * Returns null when the value is not a real date.
 */
export function parseDiagnosisDate(value: string): string | null {
    const v = value.trim();

    const ymd = YEAR_FIRST.exec(v);
    if (ymd) return calendarDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

    const dmy = DAY_FIRST.exec(v);
    if (dmy) return calendarDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));

    return null;
}
