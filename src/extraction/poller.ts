/**
 * Extraction poller.
 *
 * Opens a tab, gives client-side rendering a head start, then polls the page
 * until the readiness check passes and the query yields a decodable value, or
 * the time budget runs out. The tab is closed on every path once it exists.
 *
 *   CREATING -> WAITING_INITIAL -> (CHECKING_READY <-> SLEEPING) -> EVALUATING
 *     -> DONE(success | empty), with CLEANUP on the way out
 *
 * Readiness misses, query timeouts, empty lists and malformed output all cost
 * the same: one poll tick from the shared budget.
 */

import type { TargetLifecycle } from "../cdp/target-lifecycle.js";
import type { TargetLister } from "../cdp/target-directory.js";
import type { EvaluationOutcome, Evaluator } from "../cdp/runtime.js";
import type { Decoder } from "./decode.js";
import type { TargetDescriptor } from "../types";
import { describeError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const READY_CHECK_TIMEOUT_MS = 5000;
export const QUERY_TIMEOUT_MS = 10_000;

export interface ExtractionRequest<T> {
  /** Page to open */
  readonly url: string;
  /** Page-side expression returning the raw payload */
  readonly query: string;
  /** Page-side expression that is truthy once the content has rendered */
  readonly readyCheck?: string;
  /** Unconditional wait before the first check, counted against maxWaitMs */
  readonly initialWaitMs: number;
  /** Time between checks (default: 2000) */
  readonly pollIntervalMs?: number;
  /** Total budget, measured from just before the initial wait */
  readonly maxWaitMs: number;
  readonly decode: Decoder<T>;
}

export type EmptyReason = "timeout" | "target-vanished";

export type ExtractionResult<T> =
  | { status: "success"; value: T; attempts: number }
  | { status: "empty"; reason: EmptyReason; attempts: number };

export interface PollerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PollerClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface ExtractionPollerDeps {
  lifecycle: TargetLifecycle;
  directory: TargetLister;
  evaluate: Evaluator;
  clock?: PollerClock;
  logger?: Logger;
  /** Timeout for each readiness evaluation in ms (default: 5000) */
  readyTimeoutMs?: number;
  /** Timeout for each query evaluation in ms (default: 10000) */
  queryTimeoutMs?: number;
}

type PageResolution = { kind: "page"; wsUrl: string } | { kind: "vanished" } | { kind: "unavailable" };

function isTruthy(outcome: EvaluationOutcome): boolean {
  return outcome.kind === "value" && Boolean(outcome.value);
}

export class ExtractionPoller {
  private lifecycle: TargetLifecycle;
  private directory: TargetLister;
  private evaluate: Evaluator;
  private clock: PollerClock;
  private log: Logger;
  private readyTimeoutMs: number;
  private queryTimeoutMs: number;

  constructor(deps: ExtractionPollerDeps) {
    this.lifecycle = deps.lifecycle;
    this.directory = deps.directory;
    this.evaluate = deps.evaluate;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger("extract");
    this.readyTimeoutMs = deps.readyTimeoutMs ?? READY_CHECK_TIMEOUT_MS;
    this.queryTimeoutMs = deps.queryTimeoutMs ?? QUERY_TIMEOUT_MS;
  }

  /**
   * Run one extraction. Rejects only when the tab cannot be created
   * (TargetCreationError); every other problem ends as an "empty" result.
   */
  async extract<T>(request: ExtractionRequest<T>): Promise<ExtractionResult<T>> {
    const targetId = await this.lifecycle.createTarget(request.url);
    this.log.debug(`opened ${targetId} for ${request.url}`);

    try {
      return await this.poll(targetId, request);
    } finally {
      await this.cleanup(targetId);
    }
  }

  private async poll<T>(targetId: string, request: ExtractionRequest<T>): Promise<ExtractionResult<T>> {
    const pollIntervalMs = request.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const start = this.clock.now();
    const remaining = () => request.maxWaitMs - (this.clock.now() - start);
    const tick = async () => {
      const ms = Math.min(pollIntervalMs, remaining());
      if (ms > 0) await this.clock.sleep(ms);
    };

    await this.clock.sleep(request.initialWaitMs);

    let attempts = 0;
    while (remaining() > 0) {
      const page = await this.resolvePage(targetId);
      if (page.kind === "vanished") {
        this.log.debug(`${targetId} disappeared from the target list`);
        return { status: "empty", reason: "target-vanished", attempts };
      }
      if (page.kind === "unavailable") {
        await tick();
        continue;
      }
      // A slow listing can run past the deadline
      if (remaining() <= 0) break;

      if (request.readyCheck !== undefined) {
        const ready = await this.evaluate(page.wsUrl, request.readyCheck, this.readyTimeoutMs);
        if (!isTruthy(ready)) {
          await tick();
          continue;
        }
        // The readiness check may have used up the rest of the budget
        if (remaining() <= 0) break;
      }

      attempts++;
      const outcome = await this.evaluate(page.wsUrl, request.query, this.queryTimeoutMs);
      if (outcome.kind === "value") {
        const decoded = request.decode(outcome.value);
        if (decoded.kind === "records") {
          return { status: "success", value: decoded.value, attempts };
        }
        if (decoded.kind === "malformed") {
          this.log.debug(`attempt ${attempts}: ${decoded.reason}`);
        }
      } else if (outcome.kind === "failed") {
        this.log.debug(`attempt ${attempts}: ${describeError(outcome.error)}`);
      }

      await tick();
    }

    return { status: "empty", reason: "timeout", attempts };
  }

  private async resolvePage(targetId: string): Promise<PageResolution> {
    let targets: TargetDescriptor[];
    try {
      targets = await this.directory.listTargets();
    } catch (err) {
      this.log.debug(`listing targets failed: ${describeError(err)}`);
      return { kind: "unavailable" };
    }

    const target = targets.find((t) => t.id === targetId);
    if (!target) {
      return { kind: "vanished" };
    }
    if (!target.webSocketDebuggerUrl) {
      // Another DevTools client is attached to the page
      return { kind: "unavailable" };
    }
    return { kind: "page", wsUrl: target.webSocketDebuggerUrl };
  }

  private async cleanup(targetId: string): Promise<void> {
    try {
      await this.lifecycle.closeTarget(targetId);
      this.log.debug(`closed ${targetId}`);
    } catch (err) {
      this.log.debug(`closing ${targetId} failed: ${describeError(err)}`);
    }
  }
}
