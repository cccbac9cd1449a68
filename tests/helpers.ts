import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { BlockingExecutor } from "../src/services/executor.service";
import type { HeadResult, ObjectStore } from "../src/services/storage.service";

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

export class FakeObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  readonly heads: string[] = [];
  readonly puts: string[] = [];
  headError: Error | undefined;
  putError: Error | undefined;

  async headObject(key: string): Promise<HeadResult> {
    this.heads.push(key);
    if (this.headError) throw this.headError;
    return this.objects.has(key) ? "found" : "not_found";
  }

  async putObject(
    key: string,
    body: Buffer,
    contentType: string,
  ): Promise<void> {
    this.puts.push(key);
    if (this.putError) throw this.putError;
    this.objects.set(key, { body, contentType });
  }
}

export const inlineExecutor: BlockingExecutor = {
  run<T>(task: () => Promise<T>): Promise<T> {
    return task();
  },
};

export function deferred(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function storeError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
}
