import Fastify from "fastify";
import compress from "@fastify/compress";
import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import cron from "node-cron";
import { loadConfig } from "./config.js";
import { loadLocalEnv } from "./env.js";
import { toHttpError } from "./lib/httpError.js";
import { createLogger } from "./logger.js";
import { EtlRunner } from "./processor.js";
import { warehouseRoutes } from "./routes/warehouse.js";
import { SqliteWarehouse } from "./warehouse.js";

async function bootstrap() {
  loadLocalEnv();
  const config = loadConfig();
  const logger = createLogger(config);

  const fastify = Fastify({
    logger,
    bodyLimit: 64 * 1024 * 1024
  });

  await fastify.register(cors, {
    origin: true
  });
  await fastify.register(compress);
  await fastify.register(sensible);

  fastify.setErrorHandler((err, request, reply) => {
    const normalized = toHttpError(err);
    if (normalized.statusCode >= 500) {
      request.log.error({ err }, "Request failed");
    }
    reply.code(normalized.statusCode).send(normalized.body);
  });

  const warehouse = new SqliteWarehouse(config.WAREHOUSE_PATH, { batchSize: config.FACT_BATCH_SIZE });
  const runner = new EtlRunner(config, { warehouse }, logger);

  await fastify.register(warehouseRoutes, { runner });

  fastify.get("/healthz", async () => {
    return { ok: true, timestamp: new Date().toISOString() };
  });

  const schedule = config.CRON_SCHEDULE;
  if (schedule) {
    cron.schedule(schedule, async () => {
      fastify.log.info({ schedule }, "Running scheduled ETL");
      try {
        await runner.run();
      }
      catch (err) {
        fastify.log.error({ err }, "Scheduled ETL run failed");
      }
    });
  }

  const close = async () => {
    fastify.log.info("Shutting down");
    await fastify.close();
    warehouse.close();
    process.exit(0);
  };

  process.on("SIGINT", close);
  process.on("SIGTERM", close);

  try {
    await fastify.listen({
      port: config.port,
      host: config.host
    });
    fastify.log.info(`Aerosol ETL service listening on http://${config.host}:${config.port}`);
  }
  catch (err) {
    fastify.log.error({ err }, "Failed to start aerosol ETL service");
    process.exit(1);
  }
}

void bootstrap();
