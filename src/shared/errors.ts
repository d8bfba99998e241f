export enum LiberateErrorCode {
  SNAPSHOT_NOT_FOUND = "SNAPSHOT_NOT_FOUND",
  LATEST_UNDEFINED = "LATEST_UNDEFINED",
  INVALID_SNAPSHOT = "INVALID_SNAPSHOT",
  ARCHIVE_NOT_FOUND = "ARCHIVE_NOT_FOUND",
  ARCHIVE_INVALID = "ARCHIVE_INVALID",
  STORE_UNAVAILABLE = "STORE_UNAVAILABLE",
  IDENTITY_UNKNOWN = "IDENTITY_UNKNOWN",
  UNSUPPORTED_DISTRO = "UNSUPPORTED_DISTRO",
  UNSUPPORTED_VERSION = "UNSUPPORTED_VERSION",
  PREREQUISITES_FAILED = "PREREQUISITES_FAILED",
  COMMAND_FAILED = "COMMAND_FAILED",
}

export class LiberateError extends Error {
  readonly code: LiberateErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LiberateErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "LiberateError";
    this.code = code;
    this.context = context;
  }
}

export function isLiberateError(err: unknown, code?: LiberateErrorCode): err is LiberateError {
  return err instanceof LiberateError && (code === undefined || err.code === code);
}

/** Message text of any thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
