export type ErrorCode = "RESOURCE_UNAVAILABLE" | "STREAM_TRANSPORT" | "STORAGE_WRITE";

export interface Failure {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export class ThreadlineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The indexing backend could not be reached, or refused to create a resource. */
export class ResourceUnavailableError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOURCE_UNAVAILABLE", message, options);
  }
}

/** The live event source failed before it was exhausted. */
export class StreamTransportError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STREAM_TRANSPORT", message, options);
  }
}

/** A conversation log write did not complete; nothing from it was persisted. */
export class StorageWriteError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_WRITE", message, options);
  }
}

export const getErrorStatusCode = (error: unknown): number | undefined => {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if ("cause" in error && error.cause && error.cause !== error) {
    return getErrorStatusCode(error.cause);
  }
  return undefined;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toFailure = (error: unknown): Failure => {
  if (error instanceof ThreadlineError) {
    const statusCode = getErrorStatusCode(error.cause);
    return {
      code: error.code,
      message: error.message,
      ...(typeof statusCode === "number" ? { details: { statusCode } } : {}),
    };
  }
  const statusCode = getErrorStatusCode(error);
  if (typeof statusCode === "number") {
    return {
      code: statusCode >= 500 ? "PROVIDER_UNAVAILABLE" : "PROVIDER_API_ERROR",
      message:
        statusCode >= 500
          ? `The backend returned a temporary server error (${statusCode}). Try again in a moment.`
          : errorMessage(error),
      details: { statusCode },
    };
  }
  return { code: "UNEXPECTED", message: errorMessage(error) };
};
