import { InMemoryRunStore, type RunRecord } from "./run-store";

const run = (processingId: string, status: RunRecord["status"], startedAt: string): RunRecord => ({
    processingId,
    status,
    startedAt,
    finishedAt: startedAt,
    processingTimeSeconds: 0,
});

test("latest run is picked per status by start time", async () => {
    const store = new InMemoryRunStore();
    await store.saveRun(run("a", "completed", "2024-05-01T10:00:00.000Z"));
    await store.saveRun(run("b", "completed", "2024-05-01T12:00:00.000Z"));
    await store.saveRun(run("c", "failed", "2024-05-01T13:00:00.000Z"));
    await store.saveRun(run("d", "completed", "2024-05-01T11:00:00.000Z"));

    expect((await store.latestRun("completed"))?.processingId).toBe("b");
    expect((await store.latestRun("failed"))?.processingId).toBe("c");
});

test("a run is saved once", async () => {
    const store = new InMemoryRunStore();
    await store.saveRun(run("a", "completed", "2024-05-01T10:00:00.000Z"));
    await expect(store.saveRun(run("a", "completed", "2024-05-01T10:00:00.000Z"))).rejects.toThrow("run a already saved");
    expect(await new InMemoryRunStore().latestRun("completed")).toBeNull();
});
