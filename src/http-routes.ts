/**
 * HTTP route handlers for the search API.
 *
 * This registers routes for:
 * - GET /
 * - GET /sources
 * - POST /search
 * - POST /read
 */

import type { Express, Request, Response } from "express";
import type { SearchService } from "./search.js";
import type { SiteAdapter } from "./sites/index.js";
import { BrowserUnreachableError, TargetCreationError, UnknownSourceError } from "./errors.js";
import type {
  ListSourcesResponse,
  ReadRequest,
  ReadResponse,
  SearchRequest,
  SearchResponse,
  ServerInfoResponse,
} from "./types";

export interface SearchRouteDeps {
  service: SearchService;
  sites: readonly SiteAdapter[];
  cdpUrl: string;
  reachable: () => Promise<boolean>;
}

const MAX_LIMIT = 50;

function errorStatus(err: unknown): number {
  if (err instanceof UnknownSourceError) return 404;
  if (err instanceof BrowserUnreachableError) return 503;
  if (err instanceof TargetCreationError) return 502;
  return 500;
}

function sendError(res: Response, err: unknown): void {
  res.status(errorStatus(err)).json({ error: err instanceof Error ? err.message : String(err) });
}

export function registerSearchRoutes(app: Express, deps: SearchRouteDeps): void {
  const { service, sites } = deps;

  // GET / - server info
  app.get("/", async (_req: Request, res: Response) => {
    const response: ServerInfoResponse = {
      cdpUrl: deps.cdpUrl,
      reachable: await deps.reachable(),
      sources: sites.map((s) => s.name),
    };
    res.json(response);
  });

  // GET /sources - registered site adapters
  app.get("/sources", (_req: Request, res: Response) => {
    const response: ListSourcesResponse = {
      sources: sites.map((s) => ({ name: s.name, label: s.label })),
    };
    res.json(response);
  });

  // POST /search - run one source, or "all"
  app.post("/search", async (req: Request, res: Response) => {
    const { source, query, limit } = (req.body ?? {}) as Partial<SearchRequest>;

    if (!source || typeof source !== "string") {
      res.status(400).json({ error: "source is required and must be a string" });
      return;
    }
    if (!query || typeof query !== "string") {
      res.status(400).json({ error: "query is required and must be a string" });
      return;
    }
    if (limit !== undefined && (typeof limit !== "number" || !Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT)) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      return;
    }

    try {
      await service.ensureBrowser();
      const results =
        source === "all"
          ? await service.searchAll(query, { limit })
          : await service.searchSource(source, query, { limit });
      const response: SearchResponse = { results };
      res.json(response);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /read - page text
  app.post("/read", async (req: Request, res: Response) => {
    const { url } = (req.body ?? {}) as Partial<ReadRequest>;
    if (!url || typeof url !== "string") {
      res.status(400).json({ error: "url is required and must be a string" });
      return;
    }

    try {
      await service.ensureBrowser();
      const text = await service.readPage(url);
      if (text === null) {
        res.status(404).json({ error: "failed to extract page content" });
        return;
      }
      const response: ReadResponse = { text };
      res.json(response);
    } catch (err) {
      sendError(res, err);
    }
  });
}
