import { describe, it, expect, vi } from "vitest";
import { createEvaluator, readEvaluateResult } from "../cdp/runtime";
import type { CallFn } from "../cdp/transport";
import { ConnectionError, ProtocolTimeoutError } from "../errors";

describe("readEvaluateResult", () => {
  it("should return the value", () => {
    expect(readEvaluateResult({ result: { type: "string", value: "[]" } })).toEqual({ kind: "value", value: "[]" });
  });

  it("should keep falsy values as values", () => {
    expect(readEvaluateResult({ result: { type: "boolean", value: false } })).toEqual({ kind: "value", value: false });
  });

  it("should report none when value is omitted", () => {
    expect(readEvaluateResult({ result: { type: "undefined" } })).toEqual({ kind: "none" });
  });

  it("should report none for page exceptions", () => {
    expect(
      readEvaluateResult({
        result: { type: "object", subtype: "error", description: "ReferenceError" },
        exceptionDetails: { text: "Uncaught" },
      })
    ).toEqual({ kind: "none" });
  });

  it("should report none for unexpected shapes", () => {
    expect(readEvaluateResult(undefined)).toEqual({ kind: "none" });
    expect(readEvaluateResult({ result: "nope" })).toEqual({ kind: "none" });
  });
});

describe("createEvaluator", () => {
  it("should call Runtime.evaluate with returnByValue", async () => {
    const call = vi.fn<CallFn>(async () => ({ result: { type: "number", value: 2 } }));
    const evaluate = createEvaluator(call);

    const outcome = await evaluate("ws://localhost:9222/devtools/page/T1", "1 + 1", 5000);

    expect(outcome).toEqual({ kind: "value", value: 2 });
    expect(call).toHaveBeenCalledWith(
      "ws://localhost:9222/devtools/page/T1",
      "Runtime.evaluate",
      { expression: "1 + 1", returnByValue: true },
      5000
    );
  });

  it("should turn a protocol timeout into a timeout outcome", async () => {
    const evaluate = createEvaluator(async () => {
      throw new ProtocolTimeoutError("Runtime.evaluate", 5000);
    });

    await expect(evaluate("ws://page", "x", 5000)).resolves.toEqual({ kind: "timeout" });
  });

  it("should turn connection errors into a failed outcome", async () => {
    const error = new ConnectionError("ws://page", "socket hang up");
    const evaluate = createEvaluator(async () => {
      throw error;
    });

    await expect(evaluate("ws://page", "x", 5000)).resolves.toEqual({ kind: "failed", error });
  });
});
