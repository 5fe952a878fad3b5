import { PipelineSettings, type SettingsPatch } from "../config/settings.js";
import { createDb, createPgPool } from "../db/connection.js";
import { applySqlFile } from "../db/bootstrap.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { BatchRun } from "../runs/batchRun.js";
import { PostgresStore } from "../store/postgresStore.js";

export const DEFAULT_SETTINGS_PATH = "config/default.pipeline.yaml";

export async function loadCliSettings(configPath: string | undefined, patch: SettingsPatch): Promise<PipelineSettings> {
  const base = await PipelineSettings.loadFromFile(configPath ?? process.env.PIPELINE_CONFIG ?? DEFAULT_SETTINGS_PATH);
  return base.override(patch);
}

export function cliLogger(settings: PipelineSettings, name: string): Logger {
  const logger = createLogger({ level: settings.logLevel, name });
  logger.debug({ settings: settings.snapshot(), settings_hash: settings.settingsHash }, "effective settings");
  return logger;
}

export interface CliLedger {
  recorder(): BatchRun;
  close(): Promise<void>;
}

/** Postgres ledger for CLI batches; only opened when DATABASE_URL is set. */
export async function openCliLedger(): Promise<CliLedger | null> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) return null;

  const pool = createPgPool(databaseUrl);
  if ((process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false") {
    try {
      await applySqlFile(pool);
    } catch (e) {
      await pool.end();
      throw e;
    }
  }
  const db = createDb(pool);
  const store = new PostgresStore(db);
  return {
    recorder: () => new BatchRun(store),
    close: async () => {
      // Kysely ends the pool it was handed.
      await db.destroy();
    }
  };
}
