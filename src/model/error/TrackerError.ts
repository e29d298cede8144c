import { EXIT_CODES } from "../../constant.js";

export interface ErrorItem {
  code: string;
  message: string;
  target?: string;
  details?: DetailError[];
}

export interface DetailError {
  code: string;
  message: string;
}

/**
 * Base class for all custom errors
 */
export abstract class TrackerError extends Error {
  public name = "TrackerError";

  /**
   * The process exit code this error should result in when it aborts a scan
   */
  public exitCode = EXIT_CODES.FAILURE;

  /**
   * Whether repeating the same call may succeed
   */
  public retryable = false;

  public errorItem: ErrorItem;

  public constructor(message: string, code?: string, target?: string, details?: DetailError[]) {
    super(message);
    this.name = "TrackerError";
    this.errorItem = {
      message: message,
      code: code ?? "INTERNAL_ERROR",
    };
    if (target) {
      this.errorItem.target = target;
    }
    if (details) {
      this.errorItem.details = details;
    }
  }

  public getErrorItem(): ErrorItem {
    return this.errorItem;
  }

  public getExitCode(): number {
    return this.exitCode;
  }
}
