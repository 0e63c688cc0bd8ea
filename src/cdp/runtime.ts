/**
 * Runtime.evaluate on a page-level connection.
 */

import { call, type CallFn } from "./transport.js";
import { ProtocolTimeoutError } from "../errors.js";
import { isRecord } from "../guards.js";

export type EvaluationOutcome =
  | { kind: "value"; value: unknown }
  | { kind: "none" }
  | { kind: "timeout" }
  | { kind: "failed"; error: unknown };

export type Evaluator = (pageWsUrl: string, expression: string, timeoutMs: number) => Promise<EvaluationOutcome>;

/**
 * Pull `result.value` out of a Runtime.evaluate reply. A reply without a
 * value (undefined, functions, thrown exceptions) yields "none".
 */
export function readEvaluateResult(result: unknown): EvaluationOutcome {
  if (!isRecord(result) || !isRecord(result.result)) {
    return { kind: "none" };
  }
  if (result.exceptionDetails !== undefined) {
    return { kind: "none" };
  }
  if (!("value" in result.result)) {
    return { kind: "none" };
  }
  return { kind: "value", value: result.result.value };
}

export function createEvaluator(callFn: CallFn = call): Evaluator {
  return async (pageWsUrl, expression, timeoutMs) => {
    try {
      const result = await callFn(
        pageWsUrl,
        "Runtime.evaluate",
        { expression, returnByValue: true },
        timeoutMs
      );
      return readEvaluateResult(result);
    } catch (error) {
      if (error instanceof ProtocolTimeoutError) {
        return { kind: "timeout" };
      }
      return { kind: "failed", error };
    }
  };
}

export const evaluate: Evaluator = createEvaluator();
