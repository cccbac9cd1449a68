import {
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import https from "https";
import type { S3Config } from "../config";
import logger from "../utils/logger";

export type HeadResult = "found" | "not_found";

/**
 * The two object store calls the sink needs. `headObject` reports a
 * missing object as "not_found" and throws for everything else.
 */
export interface ObjectStore {
  headObject(key: string): Promise<HeadResult>;
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
}

export function isNotFoundError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  if (
    "name" in error &&
    (error.name === "NotFound" || error.name === "NoSuchKey")
  ) {
    return true;
  }

  if (
    "$metadata" in error &&
    error.$metadata &&
    typeof error.$metadata === "object" &&
    "httpStatusCode" in error.$metadata
  ) {
    return error.$metadata.httpStatusCode === 404;
  }

  return false;
}

export function createS3Client(config: S3Config): S3Client {
  const clientConfig: S3ClientConfig = {
    region: config.region,
    forcePathStyle: config.forcePathStyle,
  };

  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
  }

  if (config.credentials) {
    clientConfig.credentials = config.credentials;
  } else {
    logger.info(
      "No static S3 credentials configured - using the default AWS credential chain",
    );
  }

  if (!config.verifyTls) {
    logger.warn("TLS certificate verification is disabled for S3");
    clientConfig.requestHandler = {
      httpsAgent: new https.Agent({ rejectUnauthorized: false }),
    };
  }

  return new S3Client(clientConfig);
}

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;
  private bucket: string;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.bucket = bucket;
    logger.info(`S3ObjectStore initialized for bucket: ${this.bucket}`);
  }

  async headObject(key: string): Promise<HeadResult> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      return "found";
    } catch (error) {
      if (isNotFoundError(error)) {
        return "not_found";
      }
      logger.error(`Error checking object ${key}:`, error);
      throw error;
    }
  }

  async putObject(
    key: string,
    body: Buffer,
    contentType: string,
  ): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
      logger.debug(`Stored object ${key} (${body.length} bytes)`);
    } catch (error) {
      logger.error(`Error storing object ${key}:`, error);
      throw error;
    }
  }
}
