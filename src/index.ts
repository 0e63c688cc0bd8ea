import express, { type Express } from "express";
import type { Server } from "http";
import type { Socket } from "net";
import { loadConfig, cdpBaseUrl, validatePort, type CdpSearchConfig } from "./config.js";
import { createSearchContext, type SearchService } from "./search.js";
import { registerSearchRoutes } from "./http-routes.js";
import { SITES } from "./sites/index.js";
import { createLogger } from "./logger.js";

export type { SearchResult, ServerInfoResponse, SearchResponse, ReadResponse } from "./types";

export { loadConfig, cdpBaseUrl, type CdpSearchConfig } from "./config.js";
export { createSearchContext, createSearchService, type SearchService, type SearchContext } from "./search.js";
export {
  ExtractionPoller,
  type ExtractionRequest,
  type ExtractionResult,
  type PollerClock,
} from "./extraction/poller.js";
export { decodeSearchResults, decodeText, type Decoded, type Decoder } from "./extraction/decode.js";
export { TargetDirectory } from "./cdp/target-directory.js";
export { TargetLifecycleManager } from "./cdp/target-lifecycle.js";
export { call, notify } from "./cdp/transport.js";
export { evaluate } from "./cdp/runtime.js";
export { SITES, getSite, buildSearchUrl, type SiteAdapter } from "./sites/index.js";
export { formatJson, formatText } from "./format.js";
export * from "./errors.js";

const log = createLogger("server");

export interface ServeOptions {
  port?: number;
  config?: CdpSearchConfig;
  /** Use a prebuilt service instead of wiring the CDP stack (tests) */
  service?: SearchService;
}

export interface CdpSearchServer {
  app: Express;
  port: number;
  stop: () => Promise<void>;
}

/**
 * Start the HTTP search API.
 */
export async function serve(options: ServeOptions = {}): Promise<CdpSearchServer> {
  const config = options.config ?? loadConfig();
  const port = validatePort(options.port ?? config.server.port, "port");
  if (port === config.cdp.port) {
    throw new Error("server port and CDP port must be different");
  }

  const context = createSearchContext(config.cdp);
  const service = options.service ?? context.service;

  const app: Express = express();
  app.use(express.json());
  registerSearchRoutes(app, {
    service,
    sites: SITES,
    cdpUrl: cdpBaseUrl(config.cdp),
    reachable: () => context.directory.reachable(),
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(port, () => resolve(s));
    s.once("error", reject);
  });
  log.info(`HTTP API server running on port ${port}`);

  // Track active connections for clean shutdown
  const connections = new Set<Socket>();
  server.on("connection", (socket: Socket) => {
    connections.add(socket);
    socket.on("close", () => connections.delete(socket));
  });

  let stopping: Promise<void> | null = null;
  const cleanup = (): Promise<void> => {
    if (!stopping) {
      stopping = new Promise<void>((resolve) => {
        for (const socket of connections) {
          socket.destroy();
        }
        connections.clear();
        server.close(() => resolve());
      });
    }
    return stopping;
  };

  const signals = ["SIGINT", "SIGTERM", "SIGHUP"] as const;
  const signalHandler = () => {
    log.info("Shutting down...");
    cleanup().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed:", err);
        process.exit(1);
      }
    );
  };
  signals.forEach((sig) => process.on(sig, signalHandler));

  return {
    app,
    port,
    async stop() {
      signals.forEach((sig) => process.off(sig, signalHandler));
      await cleanup();
    },
  };
}
