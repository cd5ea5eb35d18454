export type CallerErrorCode =
  | "TUMOR_MISSING"
  | "BATCH_INVALID"
  | "VERSION_UNSUPPORTED"
  | "REGION_INVALID"
  | "PROCESS_FAILED"
  | "CONFIG_INVALID";

export class CallerError extends Error {
  readonly code: CallerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CallerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "CallerError";
    this.code = code;
    this.context = context;
  }
}

export function isCallerError(e: unknown, code?: CallerErrorCode): e is CallerError {
  return e instanceof CallerError && (code === undefined || e.code === code);
}
