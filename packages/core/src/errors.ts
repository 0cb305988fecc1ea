/**
 * Error surface shared by every pcopy package.
 */

/**
 * Deterministic error codes for transfer and usage failures.
 * Filesystem failures keep their own Node error objects and are not wrapped.
 */
export const PCOPY_ERROR_CODES = Object.freeze([
  "PCOPY_USAGE",
  "PCOPY_INVALID_ARGUMENT",
  "PCOPY_SHORT_READ",
  "PCOPY_WORKER_FAILED",
  "PCOPY_CANCELLED",
  "PCOPY_ABORTED",
] as const);

export type PcopyErrorCode = (typeof PCOPY_ERROR_CODES)[number];

export function isPcopyErrorCode(value: unknown): value is PcopyErrorCode {
  return PCOPY_ERROR_CODES.some((code) => code === value);
}

export class PcopyError extends Error {
  override readonly name = "PcopyError";
  readonly code: PcopyErrorCode;

  constructor(code: PcopyErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PcopyError);
    }
  }
}

export function isPcopyError(err: unknown, code?: PcopyErrorCode): err is PcopyError {
  if (!(err instanceof PcopyError)) return false;
  return code === undefined || err.code === code;
}

export function safeErr(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null) return null;
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : null;
}
