import { newRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { BatchItemRecord, BatchRecorder, Workflow } from "../batch/recorder.js";
import type { PostgresStore } from "../store/postgresStore.js";

/** Writes one batch into the ledger: a run row, then one row per item as it is emitted. */
export class BatchRun implements BatchRecorder {
  readonly runId: RunId;
  private started = false;

  constructor(private readonly store: PostgresStore, runId: RunId = newRunId()) {
    this.runId = runId;
  }

  async start(info: { workflow: Workflow; itemCount: number; settingsHash: `sha256:${string}`; params: JsonObject }): Promise<void> {
    await this.store.createBatchRun({
      runId: this.runId,
      workflow: info.workflow,
      settingsHash: info.settingsHash,
      params: info.params,
      itemCount: info.itemCount
    });
    this.started = true;
  }

  async item(record: BatchItemRecord): Promise<void> {
    await this.store.addBatchItem(this.runId, record);
  }

  async finish(summary: JsonObject): Promise<void> {
    await this.store.finishBatchRun(this.runId, { status: "succeeded", summary, error: null });
  }

  async fail(message: string): Promise<void> {
    // Nothing to close when the run row was never written.
    if (!this.started) return;
    await this.store.finishBatchRun(this.runId, { status: "failed", summary: null, error: message });
  }
}
