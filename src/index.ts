import dotenv from "dotenv";
import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { BrokerService } from "./services/broker.service";
import { BoundedExecutor } from "./services/executor.service";
import { ArtifactSink } from "./services/sink.service";
import { createS3Client, S3ObjectStore } from "./services/storage.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startSink() {
  const config = loadConfig();
  logger.level = config.logLevel;

  logger.info("Initializing services...");

  const s3Client = createS3Client(config.s3);
  const sink = new ArtifactSink({
    store: new S3ObjectStore(s3Client, config.s3.bucket),
    executor: new BoundedExecutor(config.uploadConcurrency),
    stagingDir: config.stagingDir,
    captureDir: config.captureDir,
    keyPrefix: config.s3.keyPrefix,
  });

  let broker: BrokerService | undefined;
  if (config.broker.enabled) {
    broker = new BrokerService(
      config.broker.redisUrl,
      config.broker.channel,
      sink,
    );
    await broker.connect();
    await broker.subscribe();
  }

  let server: Server | undefined;
  if (config.http.enabled) {
    const app = createApp({ sink, apiKey: config.http.apiKey });
    server = app.listen(config.http.port, "0.0.0.0", () => {
      logger.info(`Server listening on port ${config.http.port}`);
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    if (server) {
      const closing = server;
      await new Promise<void>((resolve) => closing.close(() => resolve()));
    }
    await broker?.disconnect();
    await sink.stop();
    s3Client.destroy();

    logger.info("Sink stopped", sink.stats());
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  logger.info("Sink ready to accept records");
}

startSink().catch((error) => {
  logger.error("Failed to start sink:", error);
  process.exit(1);
});
