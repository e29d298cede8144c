/* eslint-disable @typescript-eslint/consistent-type-assertions */
import {
  AuthError,
  ControlPlaneError,
  NotFoundError,
  PermissionError,
  TransientError,
} from "../ControlPlaneErrors.js";
import { ScanAbortedError } from "../ScanAbortedError.js";
import { ValidationError } from "../ValidationError.js";

describe("Error Classes", () => {
  describe("TrackerError", () => {
    it("should create error with basic properties", () => {
      const error = new ControlPlaneError("Test error");
      expect(error.message).toBe("Test error");
      expect(error.getExitCode()).toBe(1);
      expect(error.retryable).toBe(false);
      expect(error.getErrorItem()).toEqual({ code: "CONTROL_PLANE_ERROR", message: "Test error" });
    });

    it("should create error with target and details", () => {
      const error = new NotFoundError("Gone", "certs/shop", [{ code: "DETAIL", message: "Detail message" }]);
      const item = error.getErrorItem();
      expect(item.code).toBe("NOT_FOUND");
      expect(item.target).toBe("certs/shop");
      expect(item.details).toEqual([{ code: "DETAIL", message: "Detail message" }]);
    });
  });

  describe("ControlPlaneError.fromHttpError", () => {
    function response(status: number, statusText: string): Response {
      return { status, statusText, url: "https://compute.example.test/x" } as Response;
    }

    it("should map 401 to AuthError", () => {
      const error = ControlPlaneError.fromHttpError(response(401, "Unauthorized"), "list");
      expect(error).toBeInstanceOf(AuthError);
      expect(error.message).toBe("Control plane rejected the credentials: 401 Unauthorized");
      expect(error.errorItem.details).toEqual([{ code: "HTTP_401", message: "Unauthorized" }]);
    });

    it("should map 403 to PermissionError", () => {
      const error = ControlPlaneError.fromHttpError(response(403, "Forbidden"), "list");
      expect(error).toBeInstanceOf(PermissionError);
      expect(error.errorItem.code).toBe("PERMISSION_DENIED");
    });

    it("should map 404 to NotFoundError naming the target", () => {
      const error = ControlPlaneError.fromHttpError(response(404, "Not Found"), "shop-cert");
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe("Resource not found: shop-cert");
    });

    it.each([408, 429, 500, 503])("should map %i to a retryable TransientError", (status) => {
      const error = ControlPlaneError.fromHttpError(response(status, "Busy"), "list");
      expect(error).toBeInstanceOf(TransientError);
      expect(error.retryable).toBe(true);
    });

    it("should keep other client errors generic", () => {
      const error = ControlPlaneError.fromHttpError(response(400, "Bad Request"), "list");
      expect(error.constructor).toBe(ControlPlaneError);
      expect(error.message).toBe("Control plane request failed: 400 Bad Request");
    });
  });

  describe("TransientError.fromError", () => {
    it("should describe timeouts", () => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";

      const error = TransientError.fromError(timeout, "shop-cert");
      expect(error.message).toBe("Request timed out: shop-cert");
      expect(error.errorItem.details).toEqual([{ code: "TIMEOUT", message: timeout.message }]);
    });

    it("should describe connection failures", () => {
      const error = TransientError.fromError(new TypeError("fetch failed"), "list");
      expect(error.message).toBe("Failed to reach the control plane: fetch failed");
      expect(error.errorItem.details?.[0].code).toBe("CONNECTION_ERROR");
    });
  });

  describe("AuthError.fromError", () => {
    it("should wrap credential failures", () => {
      const error = AuthError.fromError(new Error("Could not load the default credentials"));
      expect(error.message).toBe("Failed to load or refresh credentials: Could not load the default credentials");
      expect(error.errorItem.target).toBe("credentials");
    });
  });

  describe("ValidationError", () => {
    it("should list every problem", () => {
      const error = ValidationError.fromErrors(["first problem", "second problem"]);
      expect(error.message).toBe("Invalid options:\n  - first problem\n  - second problem");
      expect(error.problems).toEqual(["first problem", "second problem"]);
      expect(error.errorItem.details).toHaveLength(2);
      expect(error.getExitCode()).toBe(2);
    });
  });

  describe("ScanAbortedError", () => {
    it("should carry the cause and its code", () => {
      const cause = new PermissionError("Permission denied: 403 Forbidden");
      const error = new ScanAbortedError("Failed to list front ends", "my-project", cause);

      expect(error.cause).toBe(cause);
      expect(error.errorItem).toEqual({
        code: "SCAN_ABORTED",
        message: "Failed to list front ends",
        target: "my-project",
        details: [{ code: "PERMISSION_DENIED", message: "Permission denied: 403 Forbidden" }],
      });
    });

    it("should omit details for foreign causes", () => {
      const error = new ScanAbortedError("Failed", "my-project", new Error("boom"));
      expect(error.errorItem.details).toBeUndefined();
    });
  });
});
