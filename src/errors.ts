/**
 * Error taxonomy.
 *
 * Only BrowserUnreachableError and TargetCreationError ever leave the
 * extraction poller. The protocol-level errors are absorbed per poll tick.
 */

export class CdpSearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The discovery endpoint did not answer. */
export class BrowserUnreachableError extends CdpSearchError {
  constructor(
    readonly baseUrl: string,
    options?: { cause?: unknown }
  ) {
    super(`CDP Chrome not reachable at ${baseUrl}${startHint(baseUrl)}`, options);
  }
}

export class TargetCreationError extends CdpSearchError {
  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to open tab for ${url}: ${describeError(options?.cause)}`, options);
  }
}

/** No response with the request's id arrived in time. */
export class ProtocolTimeoutError extends CdpSearchError {
  constructor(
    readonly method: string,
    readonly timeoutMs: number
  ) {
    super(`CDP timeout (${timeoutMs}ms): ${method}`);
  }
}

/** The WebSocket could not be opened, errored, or closed mid-call. */
export class ConnectionError extends CdpSearchError {
  constructor(
    readonly endpoint: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`CDP connection to ${endpoint} failed: ${reason}`, options);
  }
}

/** The browser answered with a JSON-RPC error object. */
export class ProtocolError extends CdpSearchError {
  constructor(
    readonly method: string,
    readonly code: number,
    detail: string
  ) {
    super(`CDP: ${detail} (${code}) in ${method}`);
  }
}

export class UnknownSourceError extends CdpSearchError {
  constructor(readonly source: string) {
    super(`Unknown source: ${source}`);
  }
}

function startHint(baseUrl: string): string {
  const port = /:(\d+)\/?$/.exec(baseUrl)?.[1];
  return port ? `. Start Chrome with --remote-debugging-port=${port}` : "";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
