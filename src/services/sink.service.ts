import path from "path";
import { inspect } from "util";
import {
  FILE_DOWNLOAD_EVENT,
  FILE_UPLOAD_EVENT,
  type ArtifactKind,
  type RecordSink,
  type SessionRecord,
  type SinkStats,
  type UploadOutcome,
} from "../models/record.model";
import { InvalidRecordError, SerializationError } from "../utils/errors";
import { artifactKey, eventKey } from "../utils/keys";
import logger from "../utils/logger";
import { serializeEvent, type SerializedEvent } from "../utils/serializer";
import { writeTempFile } from "../utils/tempfile";
import { ExistenceChecker } from "./existence.service";
import type { BlockingExecutor } from "./executor.service";
import { SeenCache } from "./seen-cache";
import type { ObjectStore } from "./storage.service";
import { UploaderService } from "./uploader.service";

export interface ArtifactSinkOptions {
  store: ObjectStore;
  executor: BlockingExecutor;
  stagingDir: string;
  /** Captured files must live under this directory. */
  captureDir: string;
  keyPrefix?: string;
}

const FILE_EVENTS = new Map<string, ArtifactKind>([
  [FILE_DOWNLOAD_EVENT, "download"],
  [FILE_UPLOAD_EVENT, "upload"],
]);

function requireString(
  record: SessionRecord,
  field: "shasum" | "outfile",
): string {
  const value = record[field];
  if (typeof value !== "string" || value === "") {
    throw new InvalidRecordError(record.eventid, `missing ${field}`);
  }
  return value;
}

const HEX_PATTERN = /^[0-9a-f]+$/i;

function isInside(dir: string, filePath: string): boolean {
  const relative = path.relative(dir, filePath);
  return (
    relative !== "" &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Routes honeypot records to object storage. Captured files are uploaded
 * under their hash; every other record with a session is written to a
 * staged JSON file and uploaded under its session and content hash.
 */
export class ArtifactSink implements RecordSink {
  private readonly seen: SeenCache = new SeenCache();
  private readonly uploader: UploaderService;
  private readonly stagingDir: string;
  private readonly captureDir: string;
  private readonly keyPrefix: string;
  private readonly inflight: Set<Promise<void>> = new Set();
  private counters: Omit<SinkStats, "cacheSize"> = {
    received: 0,
    uploaded: 0,
    skippedSeen: 0,
    skippedRemote: 0,
    dropped: 0,
    failed: 0,
  };

  constructor(options: ArtifactSinkOptions) {
    this.stagingDir = options.stagingDir;
    this.captureDir = path.resolve(options.captureDir);
    this.keyPrefix = options.keyPrefix ?? "";
    this.uploader = new UploaderService({
      store: options.store,
      executor: options.executor,
      checker: new ExistenceChecker(options.store, options.executor),
      seen: this.seen,
    });
  }

  get cacheSize(): number {
    return this.seen.size;
  }

  stats(): SinkStats {
    return { ...this.counters, cacheSize: this.seen.size };
  }

  write(record: SessionRecord): Promise<void> {
    this.counters.received++;
    const pending = this.dispatch(record);
    this.inflight.add(pending);
    const settle = () => {
      this.inflight.delete(pending);
    };
    pending.then(settle, settle);
    return pending;
  }

  /** Waits for every write accepted so far to settle. */
  async stop(): Promise<void> {
    if (this.inflight.size > 0) {
      logger.info(`Waiting for ${this.inflight.size} in-flight writes`);
    }
    await Promise.allSettled([...this.inflight]);
  }

  private async dispatch(record: SessionRecord): Promise<void> {
    const kind = FILE_EVENTS.get(record.eventid);
    if (kind) {
      const shasum = requireString(record, "shasum");
      if (!HEX_PATTERN.test(shasum)) {
        throw new InvalidRecordError(record.eventid, "shasum is not hex");
      }
      const outfile = path.resolve(requireString(record, "outfile"));
      if (!isInside(this.captureDir, outfile)) {
        throw new InvalidRecordError(
          record.eventid,
          `outfile ${outfile} is outside ${this.captureDir}`,
        );
      }
      await this.track(artifactKey(this.keyPrefix, kind, shasum), outfile);
      return;
    }

    await this.writeEvent(record);
  }

  private async writeEvent(record: SessionRecord): Promise<void> {
    const session = record.session;
    if (typeof session !== "string" || session === "") {
      this.counters.dropped++;
      logger.debug(`Dropping ${record.eventid} record without a session`);
      return;
    }

    let serialized: SerializedEvent;
    try {
      serialized = serializeEvent(record);
    } catch (error) {
      if (!(error instanceof SerializationError)) throw error;
      this.counters.dropped++;
      logger.error(`Can't serialize record: ${describeRecord(record)}`, {
        error: error.message,
      });
      return;
    }

    const stagedFile = await writeTempFile(this.stagingDir, serialized.body);
    const key = eventKey(this.keyPrefix, session, serialized.contentSha256);
    const outcome = await this.track(key, stagedFile);

    if (outcome !== "uploaded") {
      // Left for inspection; the skip paths never remove staged files.
      logger.debug(`Staged event file retained: ${stagedFile}`, { key });
    }
  }

  private async track(key: string, filePath: string): Promise<UploadOutcome> {
    try {
      const outcome = await this.uploader.upload(key, filePath);
      if (outcome === "uploaded") this.counters.uploaded++;
      else if (outcome === "skipped_seen") this.counters.skippedSeen++;
      else this.counters.skippedRemote++;
      return outcome;
    } catch (error) {
      this.counters.failed++;
      throw error;
    }
  }
}

function describeRecord(record: SessionRecord): string {
  return inspect(record, { depth: null, breakLength: Infinity });
}
