import { readFile, unlink } from "fs/promises";
import type { UploadOutcome, UploadState } from "../models/record.model";
import { isMissingFileError } from "../utils/errors";
import logger from "../utils/logger";
import type { BlockingExecutor } from "./executor.service";
import type { ExistenceChecker } from "./existence.service";
import type { SeenCache } from "./seen-cache";
import type { ObjectStore } from "./storage.service";

export const ARTIFACT_CONTENT_TYPE = "application/octet-stream";

export interface UploaderDeps {
  store: ObjectStore;
  executor: BlockingExecutor;
  checker: ExistenceChecker;
  seen: SeenCache;
}

/**
 * Check-then-put for one content key. Two concurrent calls for the same
 * key can both reach the store; the put is idempotent under a
 * content-addressed key.
 */
export class UploaderService {
  private store: ObjectStore;
  private executor: BlockingExecutor;
  private checker: ExistenceChecker;
  private seen: SeenCache;

  constructor(deps: UploaderDeps) {
    this.store = deps.store;
    this.executor = deps.executor;
    this.checker = deps.checker;
    this.seen = deps.seen;
  }

  async upload(key: string, filePath: string): Promise<UploadOutcome> {
    // Must stay ahead of the first await.
    if (this.seen.has(key)) {
      logger.info(`Already uploaded ${key}, skipping`, { filePath });
      return "skipped_seen";
    }

    let state: UploadState = "not_checked";
    const transition = (next: UploadState): void => {
      logger.debug(`Upload ${key}: ${state} -> ${next}`);
      state = next;
    };

    try {
      transition("checking");
      const exists = await this.checker.exists(key);

      if (exists) {
        transition("exists");
        this.seen.add(key);
        logger.info(`Somebody else already uploaded ${key}`, { filePath });
        transition("done");
        return "exists_remote";
      }

      transition("not_exists");
      transition("uploading");
      logger.info(`Uploading ${filePath} as ${key}`);

      await this.executor.run(async () => {
        const body = await readFile(filePath);
        await this.store.putObject(key, body, ARTIFACT_CONTENT_TYPE);
      });

      await unlink(filePath).catch((error: unknown) => {
        // A concurrent upload of the same artifact may have removed it.
        if (!isMissingFileError(error)) throw error;
        logger.debug(`Staged file already removed: ${filePath}`);
      });
      this.seen.add(key);
      transition("done");
      return "uploaded";
    } catch (error) {
      transition("failed");
      throw error;
    }
  }
}
