/**
 * Opens and closes tabs through the browser-level CDP connection.
 *
 * Each command resolves the browser endpoint again and gets its own
 * short-lived socket, so a failed close never affects a later create.
 */

import { call, notify, type CallFn } from "./transport.js";
import type { TargetDirectory } from "./target-directory.js";
import { TargetCreationError } from "../errors.js";
import { isRecord } from "../guards.js";

export interface TargetLifecycleOptions {
  /** Timeout for Target.createTarget in ms (default: 10000) */
  createTimeoutMs?: number;
  /** Timeout for Target.closeTarget in ms (default: 3000) */
  closeTimeoutMs?: number;
}

/** What the extraction poller needs to own a tab. */
export interface TargetLifecycle {
  createTarget(url: string): Promise<string>;
  closeTarget(targetId: string): Promise<void>;
}

export interface TargetLifecycleDeps {
  call?: CallFn;
  notify?: CallFn;
}

export class TargetLifecycleManager implements TargetLifecycle {
  private createTimeoutMs: number;
  private closeTimeoutMs: number;
  private callFn: CallFn;
  private notifyFn: CallFn;

  constructor(
    private directory: Pick<TargetDirectory, "browserEndpoint">,
    options: TargetLifecycleOptions = {},
    deps: TargetLifecycleDeps = {}
  ) {
    this.createTimeoutMs = options.createTimeoutMs ?? 10_000;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 3_000;
    this.callFn = deps.call ?? call;
    this.notifyFn = deps.notify ?? notify;
  }

  async createTarget(url: string): Promise<string> {
    try {
      const browserWs = await this.directory.browserEndpoint();
      const result = await this.callFn(browserWs, "Target.createTarget", { url }, this.createTimeoutMs);
      if (!isRecord(result) || typeof result.targetId !== "string") {
        throw new Error("Target.createTarget returned no targetId");
      }
      return result.targetId;
    } catch (err) {
      throw new TargetCreationError(url, { cause: err });
    }
  }

  /**
   * Best-effort close. A missing confirmation is not an error.
   */
  async closeTarget(targetId: string): Promise<void> {
    const browserWs = await this.directory.browserEndpoint();
    await this.notifyFn(browserWs, "Target.closeTarget", { targetId }, this.closeTimeoutMs);
  }
}
