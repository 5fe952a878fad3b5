import type { JsonObject } from "../core/json.js";

export type Workflow = "sample_regions" | "bootstrap_replicates";

export interface BatchItemRecord {
  position: number;
  itemKey: string;
  status: string;
  value: number | null;
  detail: string | null;
}

/** Receives the life cycle of one batch; items arrive in work-list order. */
export interface BatchRecorder {
  start(info: { workflow: Workflow; itemCount: number; settingsHash: `sha256:${string}`; params: JsonObject }): Promise<void>;
  item(record: BatchItemRecord): Promise<void>;
  finish(summary: JsonObject): Promise<void>;
  fail(message: string): Promise<void>;
}
