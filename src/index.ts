import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { PipelineSettings } from "./config/settings.js";
import { createDb, createLedgerPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { LocalProcessInvoker } from "./execution/backends/localProcess.js";
import { createLogger } from "./logging/logger.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const settingsPath = process.env.PIPELINE_CONFIG ?? "config/default.pipeline.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const settings = await PipelineSettings.loadFromFile(settingsPath);
  const logger = createLogger({ level: settings.logLevel, name: "ribotree-gateway" });

  logger.debug({ settings: settings.snapshot() }, "effective settings");

  const { pool, mode } = createLedgerPool(process.env.DATABASE_URL);
  if (mode === "pg-mem" || autoSchema) {
    await applySqlFile(pool);
  }

  const store = new PostgresStore(createDb(pool));
  const server = createGatewayServer({ settings, store, invoker: new LocalProcessInvoker(), logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ settings: settingsPath, settings_hash: settings.settingsHash, ledger: mode }, "gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
