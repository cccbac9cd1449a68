import type { BlockingExecutor } from "./executor.service";
import type { ObjectStore } from "./storage.service";

export class ExistenceChecker {
  private store: ObjectStore;
  private executor: BlockingExecutor;

  constructor(store: ObjectStore, executor: BlockingExecutor) {
    this.store = store;
    this.executor = executor;
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.executor.run(() => this.store.headObject(key));
    return result === "found";
  }
}
