import { describe, it, expect } from "vitest";
import { AuthError, errorMessage, OperationTimeoutError, RemoteError, ValidationError } from "./errors.js";

describe("errors", () => {
  it("formats RemoteError with status and body", () => {
    const error = new RemoteError("CopyPage", 400, "bad section");
    expect(error.message).toBe("CopyPage failed: HTTP 400 - bad section");
    expect(error.toJSON()).toEqual({
      kind: "remote",
      name: "RemoteError",
      message: "CopyPage failed: HTTP 400 - bad section",
      operation: "CopyPage",
      status: 400,
      body: "bad section",
    });
  });

  it("uses the detail instead of the status when given", () => {
    expect(new RemoteError("CopyPage", 0, "", "operation op-1 failed").message).toBe(
      "CopyPage failed: operation op-1 failed",
    );
  });

  it("carries a kind per class", () => {
    expect(new ValidationError("x").kind).toBe("validation");
    expect(new OperationTimeoutError("op-1", 30).kind).toBe("timeout");
    expect(new AuthError("x").kind).toBe("auth");
    expect(new ValidationError("x")).toBeInstanceOf(Error);
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
