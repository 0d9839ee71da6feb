export class StoreNotInitializedError extends Error {
  constructor(storePath: string) {
    super(`mention store is not initialized (closed): ${storePath}`);
    this.name = "StoreNotInitializedError";
  }
}

export class StoreCorruptError extends Error {
  constructor(storePath: string, reason: string) {
    super(`mention store at ${storePath} is corrupt: ${reason}`);
    this.name = "StoreCorruptError";
  }
}
