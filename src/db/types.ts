import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface BatchRunsTable {
  run_id: string;
  workflow: string;
  status: string;
  settings_hash: string;
  params: Json;
  item_count: number;
  created_at: Generated<string>;
  finished_at: OptionalNullable<string>;
  summary: JsonNullable;
  error: OptionalNullable<string>;
}

export interface BatchItemsTable {
  run_id: string;
  position: number;
  item_key: string;
  status: string;
  value: OptionalNullable<number>;
  detail: OptionalNullable<string>;
  recorded_at: Generated<string>;
}

export interface DB {
  batch_runs: BatchRunsTable;
  batch_items: BatchItemsTable;
}
