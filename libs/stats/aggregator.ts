import type { CleaningStatistics } from "../cleaning/cleaner";
import type { EmrStatistics } from "../emr/builder";

/** One reportable summary per batch, merged from the cleaning and conversion stages. */
export interface BatchSummary {
    recordsReceived: number;
    recordsCleaned: number;
    duplicatesRemoved: number;
    invalidRecordsRemoved: number;
    patientsCreated: number;
    conditionsCreated: number;
    encountersCreated: number;
    observationsCreated: number;
    conversionErrors: number;
    dataQualityScore: number;
    fieldCompleteness: CleaningStatistics["fieldCompleteness"];
    severityDistribution: CleaningStatistics["severityDistribution"];
    systemTypeDistribution: CleaningStatistics["systemTypeDistribution"];
    dateRange: CleaningStatistics["dateRange"];
    translation: CleaningStatistics["translation"];
    conversionTimeSeconds: number;
}

export function summarizeBatch(cleaning: CleaningStatistics, emr: EmrStatistics): BatchSummary {
    return {
        recordsReceived: cleaning.totalRecords,
        recordsCleaned: cleaning.cleanedRecords,
        duplicatesRemoved: cleaning.duplicatesRemoved,
        invalidRecordsRemoved: cleaning.invalidRecordsRemoved,
        patientsCreated: emr.patientsCreated,
        conditionsCreated: emr.conditionsCreated,
        encountersCreated: emr.encountersCreated,
        observationsCreated: emr.observationsCreated,
        conversionErrors: emr.conversionErrors,
        dataQualityScore: cleaning.dataQualityScore,
        fieldCompleteness: cleaning.fieldCompleteness,
        severityDistribution: cleaning.severityDistribution,
        systemTypeDistribution: cleaning.systemTypeDistribution,
        dateRange: cleaning.dateRange,
        translation: cleaning.translation,
        conversionTimeSeconds: emr.processingTimeSeconds,
    };
}

export interface CumulativeSnapshot {
    readonly startedAt: string;
    readonly lastBatchAt: string | null;
    readonly batchesCompleted: number;
    readonly batchesFailed: number;
    readonly recordsReceived: number;
    readonly recordsCleaned: number;
    readonly duplicatesRemoved: number;
    readonly invalidRecordsRemoved: number;
    readonly patientsCreated: number;
    readonly conditionsCreated: number;
    readonly encountersCreated: number;
    readonly observationsCreated: number;
    readonly conversionErrors: number;
    readonly averageDataQualityScore: number;
}

interface State {
    readonly snapshot: CumulativeSnapshot;
    readonly qualitySum: number;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * Totals since process start. Additive only.
 *
 * Each update builds the next state in full and replaces the old one with a single
 * assignment, so a reader sees either all of a batch's counts or none of them.
 */
export class CumulativeStatistics {
    private state: State;

    constructor(private readonly now: () => Date = () => new Date()) {
        this.state = Object.freeze({
            qualitySum: 0,
            snapshot: Object.freeze({
                startedAt: now().toISOString(),
                lastBatchAt: null,
                batchesCompleted: 0,
                batchesFailed: 0,
                recordsReceived: 0,
                recordsCleaned: 0,
                duplicatesRemoved: 0,
                invalidRecordsRemoved: 0,
                patientsCreated: 0,
                conditionsCreated: 0,
                encountersCreated: 0,
                observationsCreated: 0,
                conversionErrors: 0,
                averageDataQualityScore: 0,
            }),
        });
    }

    snapshot(): CumulativeSnapshot {
        return this.state.snapshot;
    }

    recordBatch(summary: BatchSummary): CumulativeSnapshot {
        const prev = this.state.snapshot;
        const qualitySum = this.state.qualitySum + summary.dataQualityScore;
        const batchesCompleted = prev.batchesCompleted + 1;
        const next: CumulativeSnapshot = Object.freeze({
            ...prev,
            lastBatchAt: this.now().toISOString(),
            batchesCompleted,
            recordsReceived: prev.recordsReceived + summary.recordsReceived,
            recordsCleaned: prev.recordsCleaned + summary.recordsCleaned,
            duplicatesRemoved: prev.duplicatesRemoved + summary.duplicatesRemoved,
            invalidRecordsRemoved: prev.invalidRecordsRemoved + summary.invalidRecordsRemoved,
            patientsCreated: prev.patientsCreated + summary.patientsCreated,
            conditionsCreated: prev.conditionsCreated + summary.conditionsCreated,
            encountersCreated: prev.encountersCreated + summary.encountersCreated,
            observationsCreated: prev.observationsCreated + summary.observationsCreated,
            conversionErrors: prev.conversionErrors + summary.conversionErrors,
            averageDataQualityScore: round2(qualitySum / batchesCompleted),
        });
        this.state = Object.freeze({ snapshot: next, qualitySum });
        return next;
    }

    recordFailure(): CumulativeSnapshot {
        const prev = this.state.snapshot;
        const next: CumulativeSnapshot = Object.freeze({
            ...prev,
            lastBatchAt: this.now().toISOString(),
            batchesFailed: prev.batchesFailed + 1,
        });
        this.state = Object.freeze({ snapshot: next, qualitySum: this.state.qualitySum });
        return next;
    }
}
