import { createClient } from "redis";
import type { RecordSink } from "../models/record.model";
import { sessionRecordSchema } from "../models/record.schema";
import logger from "../utils/logger";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Feeds records published on a Redis channel into a sink. A bad message
 * or a failed write is logged and the subscription keeps going.
 */
export class BrokerService {
  private subscriber: RedisClient;
  private channel: string;
  private sink: RecordSink;
  private isConnected: boolean = false;

  constructor(redisUrl: string, channel: string, sink: RecordSink) {
    this.channel = channel;
    this.sink = sink;
    this.subscriber = createClient({ url: redisUrl });

    this.subscriber.on("error", (err) =>
      logger.error("Redis Subscriber Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.subscriber.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) return;

    try {
      await this.subscriber.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async subscribe(): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      await this.subscriber.subscribe(this.channel, (message) => {
        void this.handleMessage(message);
      });
      logger.info(`Subscribed to ${this.channel}`);
    } catch (error) {
      logger.error(`Error subscribing to ${this.channel}:`, error);
      throw error;
    }
  }

  async handleMessage(message: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message);
    } catch (error) {
      logger.error(`Error parsing record message from ${this.channel}:`, error);
      return;
    }

    const { error, value } = sessionRecordSchema.validate(parsed);
    if (error) {
      logger.warn(`Ignoring invalid record from ${this.channel}`, {
        details: error.message,
      });
      return;
    }

    try {
      await this.sink.write(value);
    } catch (writeError) {
      logger.error(`Error writing ${value.eventid} record:`, writeError);
    }
  }
}
