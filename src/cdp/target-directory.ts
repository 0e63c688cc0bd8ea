/**
 * Reads the browser's HTTP discovery surface (/json/version, /json).
 */

import { BrowserUnreachableError, describeError } from "../errors.js";
import { cdpBaseUrl } from "../config.js";
import type { CdpEndpoint, TargetDescriptor } from "../types";
import { isRecord } from "../guards.js";

export interface TargetDirectoryOptions {
  /** Timeout for /json/version and /json requests in ms (default: 5000) */
  requestTimeoutMs?: number;
  /** Timeout for the reachability probe in ms (default: 2000) */
  probeTimeoutMs?: number;
}

/** The subset of the directory the extraction poller depends on. */
export interface TargetLister {
  listTargets(): Promise<TargetDescriptor[]>;
}

function toDescriptor(entry: unknown): TargetDescriptor | null {
  if (!isRecord(entry) || typeof entry.id !== "string") {
    return null;
  }
  const descriptor: TargetDescriptor = { id: entry.id };
  if (typeof entry.type === "string") descriptor.type = entry.type;
  if (typeof entry.title === "string") descriptor.title = entry.title;
  if (typeof entry.url === "string") descriptor.url = entry.url;
  if (typeof entry.webSocketDebuggerUrl === "string") {
    descriptor.webSocketDebuggerUrl = entry.webSocketDebuggerUrl;
  }
  return descriptor;
}

export class TargetDirectory implements TargetLister {
  readonly baseUrl: string;
  private requestTimeoutMs: number;
  private probeTimeoutMs: number;

  constructor(endpoint: CdpEndpoint, options: TargetDirectoryOptions = {}) {
    this.baseUrl = cdpBaseUrl(endpoint);
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 2000;
  }

  /**
   * Browser-level WebSocket URL, used for Target.* commands.
   */
  async browserEndpoint(): Promise<string> {
    const info = await this.getJson("/json/version");
    if (!isRecord(info) || typeof info.webSocketDebuggerUrl !== "string") {
      throw new BrowserUnreachableError(this.baseUrl, {
        cause: new Error("/json/version has no webSocketDebuggerUrl"),
      });
    }
    return info.webSocketDebuggerUrl;
  }

  /**
   * Live targets in the order the browser reports them.
   */
  async listTargets(): Promise<TargetDescriptor[]> {
    const list = await this.getJson("/json");
    if (!Array.isArray(list)) {
      throw new BrowserUnreachableError(this.baseUrl, {
        cause: new Error("/json did not return an array"),
      });
    }
    const targets: TargetDescriptor[] = [];
    for (const entry of list) {
      const descriptor = toDescriptor(entry);
      if (descriptor) targets.push(descriptor);
    }
    return targets;
  }

  async findTarget(id: string): Promise<TargetDescriptor | undefined> {
    const targets = await this.listTargets();
    return targets.find((t) => t.id === id);
  }

  /**
   * Quick probe used before any automation starts. Never throws.
   */
  async reachable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/json/version`, {
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  private async getJson(path: string): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new BrowserUnreachableError(this.baseUrl, { cause: err });
    }

    if (!res.ok) {
      throw new BrowserUnreachableError(this.baseUrl, {
        cause: new Error(`HTTP ${res.status} for ${path}`),
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new BrowserUnreachableError(this.baseUrl, {
        cause: new Error(`Invalid JSON from ${path}: ${describeError(err)}`),
      });
    }
  }
}
