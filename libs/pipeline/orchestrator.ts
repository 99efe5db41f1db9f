import { randomUUID } from "crypto";
import { parseTm2Csv } from "../adapters/csv/tm2";
import {
    dedupeRecords,
    normalizeRecords,
    summarizeCleaning,
    toRawRecords,
    translateRecords,
    validateRecords,
    type CleaningStatistics,
} from "../cleaning/cleaner";
import type { Config } from "../config";
import { convert, type EmrStatistics } from "../emr/builder";
import { findDanglingReferences } from "../emr/graph";
import { auditFireAndForget } from "../obs/audit";
import { metricCount, metricMs } from "../obs/metrics";
import { CumulativeStatistics, summarizeBatch, type BatchSummary, type CumulativeSnapshot } from "../stats/aggregator";
import type { RunRecord, RunStore } from "../store/run-store";
import type { EmrSubmitter } from "../submission/sqs-submitter";
import type { TermNormalizer } from "../translation/normalizer";
import { TranslationTally } from "../translation/tally";
import type { EmrGraph } from "../validation/emr";
import { BatchError, type ConversionError, type RecordError } from "./errors";
import { BatchStateMachine, type PipelineStage, type Transition } from "./state";

export const SAMPLE_ROWS = [
    {
        patient_id: "PAT001",
        tm2_code: "TM2.A01.01",
        condition_name: "Chronic Insomnia",
        system_type: "Ayurveda",
        severity: "Moderate",
        diagnosis_date: "2024-01-15",
        practitioner_id: "DOC123",
    },
    {
        patient_id: "PAT002",
        tm2_code: "TM2.B02.03",
        condition_name: "Digestive Disorders",
        system_type: "Siddha",
        severity: "Mild",
        diagnosis_date: "2024-02-20",
        practitioner_id: "DOC456",
    },
] as const;

export type Outcome<T extends object> = ({ ok: true } & T) | { ok: false; error: string };

export interface CompletedBatch {
    status: "completed";
    processingId: string;
    filename?: string;
    summary: BatchSummary;
    cleaning: CleaningStatistics;
    emrStatistics: EmrStatistics;
    emr: EmrGraph;
    recordErrors: RecordError[];
    conversionErrors: ConversionError[];
    // absent for previews
    submission?: Outcome<{ messageIds: string[] }>;
    persistence?: Outcome<{ processingId: string }>;
    transitions: Transition[];
    processingTimeSeconds: number;
}

export interface FailedBatch {
    status: "failed";
    processingId: string;
    filename?: string;
    failedStage: PipelineStage;
    error: { name: string; message: string; details?: unknown };
    persistence?: Outcome<{ processingId: string }>;
    transitions: Transition[];
    processingTimeSeconds: number;
}

export type BatchResult = CompletedBatch | FailedBatch;

type StageOutput = Pick<CompletedBatch, "summary" | "cleaning" | "emrStatistics" | "emr" | "recordErrors" | "conversionErrors">;

export interface PipelineDeps {
    normalizer: TermNormalizer;
    submitter: EmrSubmitter;
    runStore: RunStore;
    config: Pick<Config, "sourceSystem" | "previewMaxRows">;
    cumulative?: CumulativeStatistics;
    now?: () => Date;
    newId?: () => string;
}

interface RunOptions {
    filename?: string;
    // previews skip submission, persistence, cumulative totals, metrics and audit
    preview: boolean;
}

const message = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Drives one batch through validating → cleaning → translating → converting.
 *
 * A BatchError at any stage ends the batch as `failed`; any other error is a bug
 * and propagates to the caller. Side effects run only after the batch completes,
 * and their failures are reported in the result rather than thrown.
 */
export class Tm2Pipeline {
    private readonly cumulative: CumulativeStatistics;
    private readonly now: () => Date;
    private readonly newId: () => string;

    constructor(private readonly deps: PipelineDeps) {
        this.now = deps.now ?? (() => new Date());
        this.cumulative = deps.cumulative ?? new CumulativeStatistics(this.now);
        this.newId = deps.newId ?? randomUUID;
    }

    processCsv(buf: Buffer, filename: string): Promise<BatchResult> {
        return this.run(() => parseTm2Csv(buf), { filename, preview: false });
    }

    process(rows: unknown, opts: { filename?: string } = {}): Promise<BatchResult> {
        return this.run(() => rows, { filename: opts.filename, preview: false });
    }

    preview(rows?: unknown): Promise<BatchResult> {
        const max = this.deps.config.previewMaxRows;
        return this.run(() => {
            if (rows === undefined) return SAMPLE_ROWS;
            if (Array.isArray(rows) && rows.length > max) {
                throw new BatchError(`preview accepts at most ${max} rows, got ${rows.length}`);
            }
            return rows;
        }, { preview: true });
    }

    cumulativeStatistics(): CumulativeSnapshot {
        return this.cumulative.snapshot();
    }

    private async run(load: () => unknown, opts: RunOptions): Promise<BatchResult> {
        const processingId = this.newId();
        const machine = new BatchStateMachine(this.now);
        const startedAt = this.now().toISOString();
        const t0 = Date.now();
        const elapsed = () => (Date.now() - t0) / 1000;
        const base = { processingId, ...(opts.filename ? { filename: opts.filename } : {}) };

        let stages: StageOutput;
        try {
            stages = this.runStages(load, machine, processingId);
        } catch (e) {
            if (!(e instanceof BatchError)) throw e;
            const failedStage = machine.stage;
            machine.advance("failed");
            const failed: FailedBatch = {
                status: "failed",
                ...base,
                failedStage,
                error: { name: e.name, message: e.message, ...(e.details !== undefined ? { details: e.details } : {}) },
                transitions: machine.transitions,
                processingTimeSeconds: elapsed(),
            };
            console.warn("batch-failed", { processingId, failedStage, error: e.message, preview: opts.preview });
            if (opts.preview) return failed;

            failed.persistence = await this.persist({
                ...base,
                status: "failed",
                startedAt,
                finishedAt: this.now().toISOString(),
                processingTimeSeconds: failed.processingTimeSeconds,
                failedStage,
                error: { name: e.name, message: e.message },
            });
            this.cumulative.recordFailure();
            await metricCount("tm2_batch_failed_count", 1, { stage: failedStage });
            await auditFireAndForget({
                type: "tm2.batch.failed",
                source: this.deps.config.sourceSystem,
                traceId: processingId,
                failedStage,
                error: e.message,
            });
            return failed;
        }

        const completed: CompletedBatch = {
            status: "completed",
            ...base,
            ...stages,
            transitions: machine.transitions,
            processingTimeSeconds: elapsed(),
        };
        if (opts.preview) return completed;

        completed.submission = await this.submit(stages.emr, processingId);
        completed.persistence = await this.persist({
            ...base,
            status: "completed",
            startedAt,
            finishedAt: this.now().toISOString(),
            processingTimeSeconds: completed.processingTimeSeconds,
            summary: stages.summary,
            ...(completed.submission.ok
                ? { submittedMessages: completed.submission.messageIds.length }
                : { submissionError: completed.submission.error }),
        });
        this.cumulative.recordBatch(stages.summary);

        const { summary } = stages;
        console.info("batch-completed", {
            processingId,
            received: summary.recordsReceived,
            cleaned: summary.recordsCleaned,
            conditions: summary.conditionsCreated,
            quality: summary.dataQualityScore,
        });
        await metricCount("tm2_batch_completed_count");
        await metricCount("tm2_records_received_count", summary.recordsReceived);
        await metricCount("tm2_invalid_records_count", summary.invalidRecordsRemoved);
        await metricCount("tm2_duplicate_records_count", summary.duplicatesRemoved);
        await metricCount("tm2_conversion_error_count", summary.conversionErrors);
        await metricMs("tm2_batch_time_ms", Date.now() - t0);
        await auditFireAndForget({
            type: "tm2.batch.completed",
            source: this.deps.config.sourceSystem,
            traceId: processingId,
            filename: opts.filename,
            recordsReceived: summary.recordsReceived,
            conditionsCreated: summary.conditionsCreated,
            dataQualityScore: summary.dataQualityScore,
        });
        return completed;
    }

    private runStages(load: () => unknown, machine: BatchStateMachine, processingId: string): StageOutput {
        const rows = load();

        machine.advance("validating");
        const raw = toRawRecords(rows);
        const validated = validateRecords(raw);
        const deduped = dedupeRecords(validated.valid);

        machine.advance("cleaning");
        const normalized = normalizeRecords(deduped.unique);

        machine.advance("translating");
        const tally = new TranslationTally();
        const records = translateRecords(normalized, this.deps.normalizer, tally);
        const recordErrors = [...validated.errors, ...deduped.errors].sort((a, b) => a.row - b.row);
        const cleaning = summarizeCleaning({
            totalRecords: raw.length,
            records,
            errors: recordErrors,
            translation: tally.summary(),
        });

        machine.advance("converting");
        const conversion = convert(records, {
            dataQualityScore: cleaning.dataQualityScore,
            processingId,
            sourceSystem: this.deps.config.sourceSystem,
            now: this.now,
        });
        const dangling = findDanglingReferences(conversion.graph);
        if (dangling.length > 0) {
            throw new BatchError("EMR graph has dangling references", dangling);
        }
        const summary = summarizeBatch(cleaning, conversion.statistics);

        machine.advance("completed");
        return {
            summary,
            cleaning,
            emrStatistics: conversion.statistics,
            emr: conversion.graph,
            recordErrors,
            conversionErrors: conversion.errors,
        };
    }

    private async submit(graph: EmrGraph, processingId: string): Promise<Outcome<{ messageIds: string[] }>> {
        try {
            const receipt = await this.deps.submitter.submit(graph, { processingId });
            return { ok: true, messageIds: receipt.messageIds };
        } catch (e) {
            console.warn("submission-failed", { processingId, error: message(e) });
            return { ok: false, error: message(e) };
        }
    }

    private async persist(run: RunRecord): Promise<Outcome<{ processingId: string }>> {
        try {
            await this.deps.runStore.saveRun(run);
            return { ok: true, processingId: run.processingId };
        } catch (e) {
            console.warn("run-persist-failed", { processingId: run.processingId, error: message(e) });
            return { ok: false, error: message(e) };
        }
    }
}
