import { TrackerError } from "./TrackerError.js";

/**
 * Raised when a scan cannot complete at all, e.g. the front-end listing failed
 */
export class ScanAbortedError extends TrackerError {
  public name = "ScanAbortedError";

  public constructor(message: string, target: string, cause?: Error) {
    super(
      message,
      "SCAN_ABORTED",
      target,
      cause instanceof TrackerError ? [{ code: cause.errorItem.code, message: cause.message }] : undefined,
    );
    this.cause = cause;
  }
}
