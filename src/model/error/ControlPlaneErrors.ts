import { DetailError, TrackerError } from "./TrackerError.js";

/**
 * Any non-success answer from the control plane without a more specific mapping
 */
export class ControlPlaneError extends TrackerError {
  public name = "ControlPlaneError";

  public constructor(message: string, target?: string, details?: DetailError[], code?: string) {
    super(message, code ?? "CONTROL_PLANE_ERROR", target, details);
  }

  public static fromHttpError(response: Response, target?: string): ControlPlaneError {
    const statusCode = response.status;
    const details: DetailError[] = [{ code: `HTTP_${statusCode}`, message: response.statusText }];

    switch (statusCode) {
      case 401:
        return new AuthError(
          `Control plane rejected the credentials: ${statusCode} ${response.statusText}`,
          target,
          details,
        );
      case 403:
        return new PermissionError(`Permission denied: ${statusCode} ${response.statusText}`, target, details);
      case 404:
        return new NotFoundError(`Resource not found: ${target ?? response.url}`, target, details);
      case 408:
      case 429:
        return new TransientError(
          `Control plane request failed: ${statusCode} ${response.statusText}`,
          target,
          details,
        );
      default:
        if (statusCode >= 500) {
          return new TransientError(
            `Control plane request failed: ${statusCode} ${response.statusText}`,
            target,
            details,
          );
        }
        return new ControlPlaneError(
          `Control plane request failed: ${statusCode} ${response.statusText}`,
          target,
          details,
        );
    }
  }
}

export class AuthError extends ControlPlaneError {
  public name = "AuthError";

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, target, details, "AUTH_ERROR");
  }

  public static fromError(error: unknown): AuthError {
    const message = error instanceof Error ? error.message : String(error);
    return new AuthError(`Failed to load or refresh credentials: ${message}`, "credentials", [
      { code: "CREDENTIALS_UNAVAILABLE", message },
    ]);
  }
}

export class PermissionError extends ControlPlaneError {
  public name = "PermissionError";

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, target, details, "PERMISSION_DENIED");
  }
}

export class NotFoundError extends ControlPlaneError {
  public name = "NotFoundError";

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, target, details, "NOT_FOUND");
  }
}

export class TransientError extends ControlPlaneError {
  public name = "TransientError";
  public retryable = true;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, target, details, "TRANSIENT_ERROR");
  }

  public static fromError(error: Error, target: string): TransientError {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return new TransientError(`Request timed out: ${target}`, target, [
        { code: "TIMEOUT", message: error.message },
      ]);
    }

    return new TransientError(`Failed to reach the control plane: ${error.message}`, target, [
      { code: "CONNECTION_ERROR", message: error.message },
    ]);
  }
}
