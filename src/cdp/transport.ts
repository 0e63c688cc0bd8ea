/**
 * One-shot CDP transport.
 *
 * Every call opens its own WebSocket, sends a single JSON-RPC request with
 * id 1, waits for the message carrying that id and closes the socket.
 * Events and unrelated replies arriving on the same socket are skipped.
 */

import WebSocket from "ws";
import { ConnectionError, ProtocolError, ProtocolTimeoutError } from "../errors.js";
import { isRecord } from "../guards.js";

/** Largest frame accepted from the browser (page extractions can be big). */
export const WS_MAX_PAYLOAD = 10_000_000;

const REQUEST_ID = 1;

export type CdpParams = Record<string, unknown>;

export interface CdpRequest {
  id: number;
  method: string;
  params?: CdpParams;
}

export interface CdpMessage {
  id?: number;
  method?: string;
  result?: unknown;
  error?: { code: number; message: string };
}

function parseMessage(data: WebSocket.RawData): CdpMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const msg: CdpMessage = {};
  if (typeof parsed.id === "number") msg.id = parsed.id;
  if (typeof parsed.method === "string") msg.method = parsed.method;
  if ("result" in parsed) msg.result = parsed.result;
  if (isRecord(parsed.error)) {
    const { code, message } = parsed.error;
    msg.error = {
      code: typeof code === "number" ? code : -1,
      message: typeof message === "string" ? message : "unknown error",
    };
  }
  return msg;
}

/**
 * Send `method` to `endpoint` and resolve with the `result` of the reply.
 *
 * Rejects with ProtocolTimeoutError when no reply arrives within
 * `timeoutMs` (connection setup included), ConnectionError when the socket
 * fails or closes first, ProtocolError when the browser reports an error.
 */
export function call(
  endpoint: string,
  method: string,
  params: CdpParams = {},
  timeoutMs = 10_000
): Promise<unknown> {
  return new Promise<unknown>((resolve, reject) => {
    const ws = new WebSocket(endpoint, {
      perMessageDeflate: false,
      maxPayload: WS_MAX_PAYLOAD,
    });
    let settled = false;

    const finish = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.removeAllListeners();
      // Late socket errors after we're done must not crash the process
      ws.on("error", () => {});
      ws.terminate();
      outcome();
    };

    const timer = setTimeout(() => {
      finish(() => reject(new ProtocolTimeoutError(method, timeoutMs)));
    }, timeoutMs);

    ws.on("open", () => {
      const request: CdpRequest = { id: REQUEST_ID, method, params };
      ws.send(JSON.stringify(request), (err) => {
        if (err) {
          finish(() => reject(new ConnectionError(endpoint, err.message, { cause: err })));
        }
      });
    });

    ws.on("message", (data: WebSocket.RawData) => {
      const msg = parseMessage(data);
      if (!msg || msg.id !== REQUEST_ID) return;

      if (msg.error) {
        const { code, message } = msg.error;
        finish(() => reject(new ProtocolError(method, code, message)));
        return;
      }
      finish(() => resolve(msg.result));
    });

    ws.on("error", (err: Error) => {
      finish(() => reject(new ConnectionError(endpoint, err.message, { cause: err })));
    });

    ws.on("close", (code: number) => {
      finish(() => reject(new ConnectionError(endpoint, `socket closed (${code}) before response`)));
    });
  });
}

export type CallFn = typeof call;

/**
 * Like `call`, for requests whose confirmation the caller does not need:
 * a timeout resolves to undefined instead of rejecting.
 */
export async function notify(
  endpoint: string,
  method: string,
  params: CdpParams = {},
  timeoutMs = 3_000
): Promise<unknown> {
  try {
    return await call(endpoint, method, params, timeoutMs);
  } catch (err) {
    if (err instanceof ProtocolTimeoutError) {
      return undefined;
    }
    throw err;
  }
}
