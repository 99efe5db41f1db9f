import type { MatchTier, TermCategory, Translation, TranslationRecorder } from "./normalizer";

export interface CategoryTally {
    exact: number;
    caseInsensitive: number;
    partial: number;
    unmatched: number;
    blank: number;
    // share of non-blank lookups resolved by exact or case-insensitive match, percent; 0 without lookups
    confidence: number;
}

export interface PartialMatch {
    category: TermCategory;
    input: string;
    matchedKey: string;
    value: string;
}

export interface TranslationSummary {
    categories: Record<TermCategory, CategoryTally>;
    // first MAX_PARTIAL_MATCHES only; the summary is stored as a single run item
    partialMatches: PartialMatch[];
    partialMatchCount: number;
}

export const MAX_PARTIAL_MATCHES = 100;

const round2 = (n: number) => Math.round(n * 100) / 100;

function emptyCounts(): Record<MatchTier, number> {
    return { exact: 0, caseInsensitive: 0, partial: 0, unmatched: 0, blank: 0 };
}

/** Per-batch recorder of which tier resolved each lookup. */
export class TranslationTally implements TranslationRecorder {
    private readonly counts: Record<TermCategory, Record<MatchTier, number>> = {
        condition: emptyCounts(),
        systemType: emptyCounts(),
        severity: emptyCounts(),
    };
    private readonly partials: PartialMatch[] = [];
    private partialCount = 0;

    record(category: TermCategory, input: string, result: Translation): void {
        this.counts[category][result.tier] += 1;
        if (result.tier === "partial" && result.matchedKey !== undefined) {
            this.partialCount += 1;
            if (this.partials.length < MAX_PARTIAL_MATCHES) {
                this.partials.push({ category, input, matchedKey: result.matchedKey, value: result.value });
            }
        }
    }

    summary(): TranslationSummary {
        return {
            categories: {
                condition: this.tallyOf("condition"),
                systemType: this.tallyOf("systemType"),
                severity: this.tallyOf("severity"),
            },
            partialMatches: [...this.partials],
            partialMatchCount: this.partialCount,
        };
    }

    private tallyOf(category: TermCategory): CategoryTally {
        const c = this.counts[category];
        const looked = c.exact + c.caseInsensitive + c.partial + c.unmatched;
        return {
            ...c,
            confidence: looked === 0 ? 0 : round2(((c.exact + c.caseInsensitive) / looked) * 100),
        };
    }
}
