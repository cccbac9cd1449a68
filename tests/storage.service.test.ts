import {
  type HeadObjectCommandOutput,
  NotFound,
  type PutObjectCommandOutput,
  S3Client,
  type ServiceInputTypes,
} from "@aws-sdk/client-s3";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config";
import {
  createS3Client,
  isNotFoundError,
  S3ObjectStore,
} from "../src/services/storage.service";
import logger from "../src/utils/logger";
import { storeError } from "./helpers";

type Responder = (
  input: ServiceInputTypes,
) => Promise<HeadObjectCommandOutput | PutObjectCommandOutput>;

/** An S3Client whose requests never leave the process. */
function stubbedClient(respond: Responder): {
  client: S3Client;
  inputs: ServiceInputTypes[];
} {
  const client = new S3Client({
    region: "us-east-1",
    credentials: {
      accessKeyId: "test-access-key",
      secretAccessKey: "test-secret",
    },
  });
  const inputs: ServiceInputTypes[] = [];

  client.middlewareStack.add(
    () => async (args) => {
      inputs.push(args.input);
      return { output: await respond(args.input), response: {} };
    },
    { step: "initialize", name: "stubTransport", priority: "high" },
  );

  return { client, inputs };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("isNotFoundError", () => {
  it("matches S3 not-found errors", () => {
    expect(
      isNotFoundError(new NotFound({ message: "NotFound", $metadata: {} })),
    ).toBe(true);
    expect(isNotFoundError(storeError("NoSuchKey", "missing"))).toBe(true);
    expect(
      isNotFoundError({ name: "Unknown", $metadata: { httpStatusCode: 404 } }),
    ).toBe(true);
  });

  it("rejects everything else", () => {
    expect(
      isNotFoundError({
        name: "AccessDenied",
        $metadata: { httpStatusCode: 403 },
      }),
    ).toBe(false);
    expect(isNotFoundError(new Error("socket hang up"))).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
    expect(isNotFoundError("NotFound")).toBe(false);
  });
});

describe("S3ObjectStore", () => {
  it("reports an existing object as found", async () => {
    const { client, inputs } = stubbedClient(async () => ({ $metadata: {} }));
    const store = new S3ObjectStore(client, "test-bucket");

    await expect(store.headObject("downloads/aaaa")).resolves.toBe("found");
    expect(inputs[0]).toMatchObject({
      Bucket: "test-bucket",
      Key: "downloads/aaaa",
    });
  });

  it("maps NotFound to not_found", async () => {
    const { client } = stubbedClient(async () => {
      throw new NotFound({
        message: "NotFound",
        $metadata: { httpStatusCode: 404 },
      });
    });
    const store = new S3ObjectStore(client, "test-bucket");

    await expect(store.headObject("downloads/aaaa")).resolves.toBe(
      "not_found",
    );
  });

  it("propagates other head errors", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => logger);
    const denied = storeError("AccessDenied", "Access Denied");
    const { client } = stubbedClient(async () => {
      throw denied;
    });
    const store = new S3ObjectStore(client, "test-bucket");

    await expect(store.headObject("downloads/aaaa")).rejects.toBe(denied);
  });

  it("puts the body with the given content type", async () => {
    const { client, inputs } = stubbedClient(async () => ({ $metadata: {} }));
    const store = new S3ObjectStore(client, "test-bucket");

    await store.putObject(
      "uploads/bbbb",
      Buffer.from("payload"),
      "application/octet-stream",
    );

    expect(inputs[0]).toMatchObject({
      Bucket: "test-bucket",
      Key: "uploads/bbbb",
      ContentType: "application/octet-stream",
      Body: Buffer.from("payload"),
    });
  });

  it("propagates put errors", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => logger);
    const { client } = stubbedClient(async () => {
      throw storeError("SlowDown", "Please reduce your request rate.");
    });
    const store = new S3ObjectStore(client, "test-bucket");

    await expect(
      store.putObject("uploads/bbbb", Buffer.from("x"), "text/plain"),
    ).rejects.toThrow("Please reduce your request rate.");
  });
});

describe("createS3Client", () => {
  it("applies region, endpoint and path style", async () => {
    const config = loadConfig({
      S3_BUCKET: "test-bucket",
      S3_REGION: "eu-west-1",
      S3_ENDPOINT: "http://localhost:9000",
      S3_ACCESS_KEY_ID: "test-access-key",
      S3_SECRET_ACCESS_KEY: "test-secret",
    });
    const client = createS3Client(config.s3);

    await expect(client.config.region()).resolves.toBe("eu-west-1");
    expect(client.config.forcePathStyle).toBe(true);
    client.destroy();
  });

  it("falls back to the default credential chain", () => {
    const info = vi.spyOn(logger, "info").mockImplementation(() => logger);
    const config = loadConfig({ S3_BUCKET: "test-bucket" });

    createS3Client(config.s3).destroy();

    expect(info).toHaveBeenCalledWith(
      "No static S3 credentials configured - using the default AWS credential chain",
    );
  });

  it("warns when certificate verification is switched off", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    const config = loadConfig({
      S3_BUCKET: "test-bucket",
      S3_ENDPOINT: "https://localhost:9000",
      S3_VERIFY_TLS: "false",
      S3_ACCESS_KEY_ID: "test-access-key",
      S3_SECRET_ACCESS_KEY: "test-secret",
    });

    createS3Client(config.s3).destroy();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "TLS certificate verification is disabled for S3",
    );
  });
});
