import Fastify from "fastify";

import { closeDatabase } from "@newsdesk/db";

import { createWorkerContext, type WorkerContext } from "./context.js";
import { startDeduplicationScheduler } from "./jobs/deduplicate-stories.js";
import { workerMetrics } from "./metrics/registry.js";

async function main() {
  const context = createWorkerContext();

  context.logger.info(
    {
      database: context.config.database.path,
      embeddings: context.embedder.name,
      similarityThreshold: context.config.clustering.similarityThreshold
    },
    "Worker service bootstrap complete"
  );

  const deduplicationScheduler = startDeduplicationScheduler(context);
  const metricsServer = await startMetricsServer(context);

  const shutdown = async (signal?: string) => {
    context.logger.info({ signal }, "Shutting down worker");
    deduplicationScheduler.stop();

    if (metricsServer) {
      await metricsServer.close();
    }

    await context.writeQueue.onIdle();
    closeDatabase(context.db);
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  process.on("unhandledRejection", (reason) => {
    context.logger.error({ reason }, "Unhandled rejection");
  });
}

async function startMetricsServer(context: WorkerContext) {
  if (!context.config.monitoring.enabled) {
    context.logger.info("Metrics server disabled via configuration");
    return null;
  }

  const server = Fastify({ logger: false });

  server.get("/metrics", async (_request, reply) => {
    reply.header("Content-Type", workerMetrics.registry.contentType);
    return workerMetrics.registry.metrics();
  });

  await server.listen({
    port: context.config.monitoring.metricsPort,
    host: context.config.monitoring.metricsHost
  });

  context.logger.info(
    {
      port: context.config.monitoring.metricsPort,
      host: context.config.monitoring.metricsHost
    },
    "Metrics endpoint listening"
  );

  return server;
}

void main();
