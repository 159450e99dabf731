import { describe, it, expect, vi } from "vitest";
import { toolError, toolResponse, wrapTool } from "../tool-helpers.js";
import { CycleError, NotFoundError } from "../errors.js";
import { getOperationMetrics } from "../logger.js";

vi.spyOn(console, "error").mockImplementation(() => {});

describe("toolResponse()", () => {
  it("passes strings through and pretty-prints everything else", () => {
    expect(toolResponse("done")).toEqual({ content: [{ type: "text", text: "done" }] });
    expect(toolResponse({ wave: 1 })).toEqual({
      content: [{ type: "text", text: '{\n  "wave": 1\n}' }],
    });
  });
});

describe("toolError()", () => {
  it("appends the error kind when there is one", () => {
    expect(toolError(new NotFoundError("release", "r-1"))).toEqual({
      content: [{ type: "text", text: "Error: release r-1 not found (not_found)" }],
      isError: true,
    });
    expect(toolError(new CycleError(["a", "a"])).content[0].text).toBe(
      "Error: circular dependency detected: a → a (cycle)"
    );
  });

  it("handles plain errors and non-errors", () => {
    expect(toolError(new Error("gh failed")).content[0].text).toBe("Error: gh failed");
    expect(toolError("timeout").content[0].text).toBe("Error: timeout");
  });
});

describe("wrapTool()", () => {
  it("returns the handler's response and records the call", async () => {
    const handler = wrapTool("test_ok", async ({ id }: { id: string }) => toolResponse(id));
    expect(await handler({ id: "r-1" })).toEqual({ content: [{ type: "text", text: "r-1" }] });
    expect(getOperationMetrics()["test_ok"]).toMatchObject({ calls: 1, errors: 0 });
  });

  it("turns a thrown error into an error result", async () => {
    const handler = wrapTool("test_fail", async (_params: { id: string }) => {
      throw new NotFoundError("repo", 9);
    });
    expect(await handler({ id: "r-1" })).toEqual({
      content: [{ type: "text", text: "Error: repo 9 not found (not_found)" }],
      isError: true,
    });
    expect(getOperationMetrics()["test_fail"]).toMatchObject({ calls: 1, errors: 1 });
  });
});
