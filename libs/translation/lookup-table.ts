export interface LookupSnapshot {
    readonly version: number;
    readonly entries: ReadonlyMap<string, string>;
    // lowercase key -> first registered entry folding to it
    readonly folded: ReadonlyMap<string, readonly [string, string]>;
}

export type RegisterOutcome = "added" | "replaced" | "unchanged";

function fold(entries: ReadonlyMap<string, string>): Map<string, readonly [string, string]> {
    const folded = new Map<string, readonly [string, string]>();
    for (const [key, value] of entries) {
        const lower = key.toLowerCase();
        if (!folded.has(lower)) folded.set(lower, [key, value]);
    }
    return folded;
}

/**
 * Versioned native-term -> English-term table.
 *
 * Registration is copy-on-write: the new snapshot is built aside and swapped in
 * with one assignment, so a reader holding `snapshot()` never sees a half-written table.
 */
export class LookupTable {
    private current: LookupSnapshot;

    constructor(seed: Iterable<readonly [string, string]> = []) {
        const entries = new Map<string, string>();
        for (const [native, english] of seed) {
            const key = native.trim();
            const value = english.trim();
            if (key && value && !entries.has(key)) entries.set(key, value);
        }
        this.current = Object.freeze({ version: 1, entries, folded: fold(entries) });
    }

    static fromRecord(record: Readonly<Record<string, string>>): LookupTable {
        return new LookupTable(Object.entries(record));
    }

    snapshot(): LookupSnapshot {
        return this.current;
    }

    get version(): number {
        return this.current.version;
    }

    get size(): number {
        return this.current.entries.size;
    }

    register(nativeTerm: string, englishTerm: string): RegisterOutcome {
        const key = nativeTerm.trim();
        const value = englishTerm.trim();
        if (!key || !value) {
            throw new TypeError("nativeTerm and englishTerm must be non-blank");
        }

        const prev = this.current;
        const existing = prev.entries.get(key);
        if (existing === value) return "unchanged";

        const entries = new Map(prev.entries);
        entries.set(key, value);
        this.current = Object.freeze({ version: prev.version + 1, entries, folded: fold(entries) });
        return existing === undefined ? "added" : "replaced";
    }
}
