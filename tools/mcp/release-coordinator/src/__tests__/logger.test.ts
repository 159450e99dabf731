import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  log,
  logOperation,
  recordCall,
  getOperationMetrics,
  withLogging,
} from "../logger.js";

// Capture stderr output
const stderrSpy = vi.spyOn(console, "error").mockImplementation(() => {});

beforeEach(() => {
  stderrSpy.mockClear();
});

function lastLine(): string {
  return String(stderrSpy.mock.lastCall?.[0]);
}

describe("log()", () => {
  it("writes to stderr", () => {
    log("info", "test message");
    expect(stderrSpy).toHaveBeenCalledOnce();
    expect(lastLine()).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO  test message$/);
  });

  it("appends context as key=value pairs", () => {
    log("warn", "dependency not in release", {
      repo: "api-gateway",
      missing: "unknown-service",
      count: 2,
      skipped: undefined,
    });
    expect(lastLine()).toMatch(
      / WARN  dependency not in release repo=api-gateway missing=unknown-service count=2$/
    );
  });

  it("quotes string values containing whitespace", () => {
    log("error", "compare failed", { error: "HTTP 404: Not Found" });
    expect(lastLine()).toMatch(/ ERROR compare failed error="HTTP 404: Not Found"$/);
  });
});

describe("logOperation()", () => {
  it("includes operation name and duration", () => {
    logOperation("get_release", "info", "completed", 150);
    const output = lastLine();
    expect(output).toContain("[get_release]");
    expect(output).toContain("(150ms)");
    expect(output).toContain("completed");
  });
});

describe("recordCall() / getOperationMetrics()", () => {
  it("tracks call counts and errors", () => {
    recordCall("test_op", 100, false);
    recordCall("test_op", 200, false);
    recordCall("test_op", 50, true);

    const metrics = getOperationMetrics();
    expect(metrics["test_op"].calls).toBe(3);
    expect(metrics["test_op"].errors).toBe(1);
    expect(metrics["test_op"].totalMs).toBe(350);
    expect(metrics["test_op"].avgMs).toBe(117); // Math.round(350/3)
    expect(metrics["test_op"].lastCallAt).toBeTruthy();
  });
});

describe("withLogging()", () => {
  it("returns the function result", async () => {
    const result = await withLogging("my_op", async () => "done");
    expect(result).toBe("done");
  });

  it("records metrics on success", async () => {
    await withLogging("logged_op", async () => 42);
    const metrics = getOperationMetrics();
    expect(metrics["logged_op"]).toBeDefined();
    expect(metrics["logged_op"].calls).toBe(1);
    expect(metrics["logged_op"].errors).toBe(0);
  });

  it("records metrics, logs and rethrows on error", async () => {
    await expect(
      withLogging("error_op", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(getOperationMetrics()["error_op"].errors).toBe(1);
    expect(lastLine()).toMatch(/ ERROR \[error_op\] boom \(\d+ms\)$/);
  });
});
