/**
 * Raised by the record store when the database cannot be opened or a
 * statement fails. The driver error is kept as `cause`.
 */
export class StorageUnavailableError extends Error {
  override readonly name = "StorageUnavailableError";

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }

  return String(error);
}
