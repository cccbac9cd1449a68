export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when a record holds a value that has no canonical JSON form
 * (bigint, function, symbol, circular reference, non-finite number).
 */
export class SerializationError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot serialize value at ${path}: ${reason}`);
    this.name = "SerializationError";
    this.path = path;
  }
}

export class InvalidRecordError extends Error {
  readonly eventid: string;

  constructor(eventid: string, message: string) {
    super(`Invalid ${eventid} record: ${message}`);
    this.name = "InvalidRecordError";
    this.eventid = eventid;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
