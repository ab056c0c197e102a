export type EngineErrorCode =
  | "CONTRACT_VIOLATION"
  | "PARSE_ERROR"
  | "CITATION_FORMAT"
  | "TRANSIENT_IO"
  | "UPSTREAM_ERROR";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly status?: number;
  readonly details?: unknown;

  constructor(params: { code: EngineErrorCode; message: string; status?: number; details?: unknown; cause?: unknown }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "EngineError";
    this.code = params.code;
    this.status = params.status;
    this.details = params.details;
  }
}

const TRANSIENT_STATUS_CODES = new Set([502, 503, 504]);
const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT"
]);

export function contractViolation(message: string, details?: unknown): EngineError {
  return new EngineError({ code: "CONTRACT_VIOLATION", message, details });
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}

function readSocketCode(value: unknown): string | null {
  if (!value || typeof value !== "object" || !("code" in value)) {
    return null;
  }

  return typeof value.code === "string" ? value.code : null;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof EngineError) {
    if (error.code === "TRANSIENT_IO") {
      return true;
    }

    return error.status !== undefined && TRANSIENT_STATUS_CODES.has(error.status);
  }

  const directCode = readSocketCode(error);
  if (directCode && TRANSIENT_SOCKET_CODES.has(directCode)) {
    return true;
  }

  if (error instanceof Error) {
    const causeCode = readSocketCode(error.cause);
    if (causeCode && TRANSIENT_SOCKET_CODES.has(causeCode)) {
      return true;
    }

    // undici reports connection failures as a bare TypeError
    return error instanceof TypeError && error.message === "fetch failed";
  }

  return false;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
