// Domain failures raised by the repositories. Absence is never an error:
// lookups return null instead.

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class StorageWriteError extends Error {
  readonly collection: string;

  constructor(collection: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write collection "${collection}": ${reason}`, { cause });
    this.name = "StorageWriteError";
    this.collection = collection;
  }
}
