import type { Kysely, Selectable } from "kysely";
import { canonicalizeJson } from "../core/canonicalJson.js";
import type { JsonObject } from "../core/json.js";
import { isRunId, type RunId } from "../core/ids.js";
import type { BatchItemRecord, Workflow } from "../batch/recorder.js";
import type { BatchItemsTable, BatchRunsTable, DB } from "../db/types.js";

export type BatchRunStatus = "running" | "succeeded" | "failed";

export interface BatchRunRecord {
  runId: RunId;
  workflow: Workflow;
  status: BatchRunStatus;
  settingsHash: string;
  params: JsonObject;
  itemCount: number;
  createdAt: string;
  finishedAt: string | null;
  summary: JsonObject | null;
  error: string | null;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toRunId(value: string): RunId {
  if (isRunId(value)) return value;
  throw new Error(`malformed run id in ledger: ${value}`);
}

function toWorkflow(value: string): Workflow {
  if (value === "sample_regions" || value === "bootstrap_replicates") return value;
  throw new Error(`unknown workflow in ledger: ${value}`);
}

function toStatus(value: string): BatchRunStatus {
  if (value === "running" || value === "succeeded" || value === "failed") return value;
  throw new Error(`unknown batch status in ledger: ${value}`);
}

// jsonb columns come back parsed.
function toJsonObject(value: unknown): JsonObject {
  const json = canonicalizeJson(value ?? {});
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new Error("expected a JSON object in ledger column");
  }
  return json;
}

function toRunRecord(row: Selectable<BatchRunsTable>): BatchRunRecord {
  return {
    runId: toRunId(row.run_id),
    workflow: toWorkflow(row.workflow),
    status: toStatus(row.status),
    settingsHash: row.settings_hash,
    params: toJsonObject(row.params),
    itemCount: Number(row.item_count),
    createdAt: toIso(row.created_at),
    finishedAt: toIsoOrNull(row.finished_at),
    summary: row.summary ? toJsonObject(row.summary) : null,
    error: row.error
  };
}

function toItemRecord(row: Selectable<BatchItemsTable>): BatchItemRecord {
  return {
    position: Number(row.position),
    itemKey: row.item_key,
    status: row.status,
    value: row.value === null ? null : Number(row.value),
    detail: row.detail
  };
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createBatchRun(input: {
    runId: RunId;
    workflow: Workflow;
    settingsHash: string;
    params: JsonObject;
    itemCount: number;
  }): Promise<void> {
    await this.db
      .insertInto("batch_runs")
      .values({
        run_id: input.runId,
        workflow: input.workflow,
        status: "running",
        settings_hash: input.settingsHash,
        params: input.params,
        item_count: input.itemCount,
        summary: null,
        error: null
      })
      .execute();
  }

  async addBatchItem(runId: RunId, item: BatchItemRecord): Promise<void> {
    await this.db
      .insertInto("batch_items")
      .values({
        run_id: runId,
        position: item.position,
        item_key: item.itemKey,
        status: item.status,
        value: item.value,
        detail: item.detail
      })
      .execute();
  }

  async finishBatchRun(
    runId: RunId,
    outcome: { status: Exclude<BatchRunStatus, "running">; summary: JsonObject | null; error: string | null }
  ): Promise<void> {
    await this.db
      .updateTable("batch_runs")
      .set({
        status: outcome.status,
        summary: outcome.summary,
        error: outcome.error,
        finished_at: new Date().toISOString()
      })
      .where("run_id", "=", runId)
      .execute();
  }

  async getBatchRun(runId: RunId): Promise<BatchRunRecord | null> {
    const row = await this.db.selectFrom("batch_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? toRunRecord(row) : null;
  }

  async listBatchItems(runId: RunId): Promise<BatchItemRecord[]> {
    const rows = await this.db
      .selectFrom("batch_items")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("position", "asc")
      .execute();
    return rows.map(toItemRecord);
  }
}
