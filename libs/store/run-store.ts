import type { PipelineStage } from "../pipeline/state";
import type { BatchSummary } from "../stats/aggregator";

export type RunStatus = "completed" | "failed";

/** Metadata of one processed batch, as kept in the processing history. */
export interface RunRecord {
    processingId: string;
    filename?: string;
    status: RunStatus;
    startedAt: string;
    finishedAt: string;
    processingTimeSeconds: number;
    summary?: BatchSummary;
    submittedMessages?: number;
    submissionError?: string;
    failedStage?: PipelineStage;
    error?: { name: string; message: string };
}

export interface RunStore {
    saveRun(run: RunRecord): Promise<void>;
    latestRun(status: RunStatus): Promise<RunRecord | null>;
}

/** Process-local store for tests and local runs. */
export class InMemoryRunStore implements RunStore {
    private readonly runs: RunRecord[] = [];

    async saveRun(run: RunRecord): Promise<void> {
        if (this.runs.some((r) => r.processingId === run.processingId)) {
            throw new Error(`run ${run.processingId} already saved`);
        }
        this.runs.push(run);
    }

    async latestRun(status: RunStatus): Promise<RunRecord | null> {
        let latest: RunRecord | null = null;
        for (const run of this.runs) {
            if (run.status === status && (!latest || run.startedAt >= latest.startedAt)) latest = run;
        }
        return latest;
    }

    all(): RunRecord[] {
        return [...this.runs];
    }
}
