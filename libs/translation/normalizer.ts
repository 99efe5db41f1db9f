import conditionTerms from "./dictionaries/condition.json";
import systemTypeTerms from "./dictionaries/system-type.json";
import severityTerms from "./dictionaries/severity.json";
import { LookupTable, type RegisterOutcome } from "./lookup-table";

export const TERM_CATEGORIES = ["condition", "systemType", "severity"] as const;
export type TermCategory = (typeof TERM_CATEGORIES)[number];

export type MatchTier = "exact" | "caseInsensitive" | "partial" | "unmatched" | "blank";

export interface Translation {
    value: string;
    tier: MatchTier;
    matchedKey?: string;
}

export interface TranslationRecorder {
    record(category: TermCategory, input: string, result: Translation): void;
}

export type TermTables = Record<TermCategory, LookupTable>;

export interface TranslationStats {
    conditionMappings: number;
    systemTypeMappings: number;
    severityMappings: number;
    totalMappings: number;
    versions: Record<TermCategory, number>;
}

/** Fresh tables seeded from the bundled AYUSH/NAMASTE dictionaries. */
export function defaultTables(): TermTables {
    return {
        condition: LookupTable.fromRecord(conditionTerms),
        systemType: LookupTable.fromRecord(systemTypeTerms),
        severity: LookupTable.fromRecord(severityTerms),
    };
}

/**
 * Dictionary-backed translator for native-language TM2 vocabulary.
 *
 * Tiers, first hit wins: exact, case-insensitive, substring either way
 * (conditions only), otherwise the input comes back untouched. Blank input is "".
 */
export class TermNormalizer {
    constructor(private readonly tables: TermTables = defaultTables()) {}

    translate(term: string, category: TermCategory, recorder?: TranslationRecorder): string {
        return this.lookup(term, category, recorder).value;
    }

    translateCondition(term: string, recorder?: TranslationRecorder): string {
        return this.translate(term, "condition", recorder);
    }

    translateSystemType(term: string, recorder?: TranslationRecorder): string {
        return this.translate(term, "systemType", recorder);
    }

    translateSeverity(term: string, recorder?: TranslationRecorder): string {
        return this.translate(term, "severity", recorder);
    }

    lookup(term: string, category: TermCategory, recorder?: TranslationRecorder): Translation {
        const result = this.match(term, category);
        recorder?.record(category, term, result);
        if (result.tier === "partial") {
            console.info("translation-partial-match", {
                category,
                original: term,
                matched: result.matchedKey,
                translated: result.value,
            });
        }
        return result;
    }

    register(category: TermCategory, nativeTerm: string, englishTerm: string): RegisterOutcome {
        const outcome = this.tables[category].register(nativeTerm, englishTerm);
        if (outcome !== "unchanged") {
            console.info("translation-mapping-registered", {
                category,
                native: nativeTerm.trim(),
                english: englishTerm.trim(),
                outcome,
                version: this.tables[category].version,
            });
        }
        return outcome;
    }

    stats(): TranslationStats {
        const { condition, systemType, severity } = this.tables;
        return {
            conditionMappings: condition.size,
            systemTypeMappings: systemType.size,
            severityMappings: severity.size,
            totalMappings: condition.size + systemType.size + severity.size,
            versions: {
                condition: condition.version,
                systemType: systemType.version,
                severity: severity.version,
            },
        };
    }

    private match(term: string, category: TermCategory): Translation {
        const trimmed = term.trim();
        if (!trimmed) return { value: "", tier: "blank" };

        // one snapshot per lookup so a concurrent register can't change the table mid-match
        const table = this.tables[category].snapshot();

        const exact = table.entries.get(trimmed);
        if (exact !== undefined) return { value: exact, tier: "exact", matchedKey: trimmed };

        const lower = trimmed.toLowerCase();
        const folded = table.folded.get(lower);
        if (folded) return { value: folded[1], tier: "caseInsensitive", matchedKey: folded[0] };

        if (category === "condition") {
            for (const [key, value] of table.entries) {
                const k = key.toLowerCase();
                if (lower.includes(k) || k.includes(lower)) {
                    return { value, tier: "partial", matchedKey: key };
                }
            }
        }

        return { value: term, tier: "unmatched" };
    }
}
