import { loadConfig } from "./config.js";
import { loadLocalEnv } from "./env.js";
import { createLogger } from "./logger.js";
import { EtlRunner } from "./processor.js";
import { SqliteWarehouse } from "./warehouse.js";

async function main() {
  loadLocalEnv();
  const config = loadConfig();
  const logger = createLogger(config);
  const warehouse = new SqliteWarehouse(config.WAREHOUSE_PATH, { batchSize: config.FACT_BATCH_SIZE });

  try {
    const runner = new EtlRunner(config, { warehouse }, logger);
    const summary = await runner.run();
    logger.info({
      runId: summary.runId,
      loaded: summary.loaded,
      excluded: summary.report.excluded,
      geoEnrichment: summary.report.geoEnrichment
    }, "ETL run completed");
  }
  catch (err) {
    logger.error({ err }, "ETL run failed");
    process.exitCode = 1;
  }
  finally {
    warehouse.close();
  }
}

void main();
