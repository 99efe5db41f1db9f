import { BatchError } from "./errors";

export const PIPELINE_STAGES = [
    "received",
    "validating",
    "cleaning",
    "translating",
    "converting",
    "completed",
    "failed",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

const NEXT: Readonly<Record<PipelineStage, readonly PipelineStage[]>> = {
    received: ["validating", "failed"],
    validating: ["cleaning", "failed"],
    cleaning: ["translating", "failed"],
    translating: ["converting", "failed"],
    converting: ["completed", "failed"],
    completed: [],
    failed: [],
};

export interface Transition {
    stage: PipelineStage;
    at: string;
}

/** Lifecycle of one batch. `completed` and `failed` are terminal. */
export class BatchStateMachine {
    private current: PipelineStage = "received";
    private readonly history: Transition[];

    constructor(private readonly now: () => Date = () => new Date()) {
        this.history = [{ stage: "received", at: now().toISOString() }];
    }

    get stage(): PipelineStage {
        return this.current;
    }

    get transitions(): Transition[] {
        return [...this.history];
    }

    advance(next: PipelineStage): void {
        if (!NEXT[this.current].includes(next)) {
            throw new BatchError(`illegal batch transition ${this.current} -> ${next}`);
        }
        this.current = next;
        this.history.push({ stage: next, at: this.now().toISOString() });
    }
}
