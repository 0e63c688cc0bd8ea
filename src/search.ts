/**
 * Search service: runs site adapters through the extraction poller.
 */

import { TargetDirectory } from "./cdp/target-directory.js";
import { TargetLifecycleManager } from "./cdp/target-lifecycle.js";
import { evaluate } from "./cdp/runtime.js";
import { ExtractionPoller, type PollerClock } from "./extraction/poller.js";
import { decodeSearchResults, decodeText } from "./extraction/decode.js";
import { SITES, buildSearchUrl, type SiteAdapter } from "./sites/index.js";
import { BrowserUnreachableError, UnknownSourceError, describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { CdpEndpoint, SearchResult } from "./types";

export const DEFAULT_LIMIT = 5;
export const DEFAULT_ALL_LIMIT = 3;

/** Seconds a page gets to render before `readPage` grabs its text. */
export const READ_WAIT_SECONDS = 5;
const READ_EXPRESSION = "document.body?.innerText || ''";
const READ_GRACE_MS = 1;

export interface SearchOptions {
  limit?: number;
}

export interface SearchService {
  ensureBrowser(): Promise<void>;
  searchSource(name: string, query: string, options?: SearchOptions): Promise<SearchResult[]>;
  searchAll(query: string, options?: SearchOptions): Promise<SearchResult[]>;
  readPage(url: string): Promise<string | null>;
}

export interface SearchServiceDeps {
  directory: Pick<TargetDirectory, "reachable" | "baseUrl">;
  poller: Pick<ExtractionPoller, "extract">;
  sites?: readonly SiteAdapter[];
  logger?: (scope: string) => Logger;
}

export function createSearchService(deps: SearchServiceDeps): SearchService {
  const sites = deps.sites ?? SITES;
  const makeLogger = deps.logger ?? createLogger;

  function lookup(name: string): SiteAdapter {
    const site = sites.find((s) => s.name === name);
    if (!site) {
      throw new UnknownSourceError(name);
    }
    return site;
  }

  async function runSite(site: SiteAdapter, query: string, limit: number): Promise<SearchResult[]> {
    const result = await deps.poller.extract({
      url: buildSearchUrl(site, query),
      query: site.query,
      readyCheck: site.readyCheck,
      initialWaitMs: site.initialWaitSeconds * 1000,
      maxWaitMs: site.maxWaitSeconds * 1000,
      decode: decodeSearchResults,
    });

    if (result.status === "empty") {
      makeLogger(site.name).error(`Error: ${site.failureMessage}`);
      return [];
    }
    return result.value.slice(0, limit);
  }

  return {
    async ensureBrowser() {
      if (!(await deps.directory.reachable())) {
        throw new BrowserUnreachableError(deps.directory.baseUrl);
      }
    },

    async searchSource(name, query, options = {}) {
      const site = lookup(name);
      return runSite(site, query, options.limit ?? DEFAULT_LIMIT);
    },

    async searchAll(query, options = {}) {
      const limit = options.limit ?? DEFAULT_ALL_LIMIT;
      // Each site owns its own tab, so they can run side by side
      const settled = await Promise.allSettled(sites.map((site) => runSite(site, query, limit)));

      const results: SearchResult[] = [];
      settled.forEach((outcome, i) => {
        if (outcome.status === "fulfilled") {
          results.push(...outcome.value);
        } else {
          makeLogger(sites[i].name).error(`Error: ${describeError(outcome.reason)}`);
        }
      });
      return results;
    },

    async readPage(url) {
      const log = makeLogger("read");
      const waitMs = READ_WAIT_SECONDS * 1000;
      // One attempt: the budget ends just after the initial wait
      const result = await deps.poller.extract({
        url,
        query: READ_EXPRESSION,
        initialWaitMs: waitMs,
        maxWaitMs: waitMs + READ_GRACE_MS,
        decode: decodeText,
      });

      if (result.status === "success") {
        return result.value;
      }
      log.error(result.reason === "target-vanished" ? "Error: tab not found" : "Error: failed to extract page content");
      return null;
    },
  };
}

export interface SearchContext {
  directory: TargetDirectory;
  lifecycle: TargetLifecycleManager;
  poller: ExtractionPoller;
  service: SearchService;
}

/**
 * Wire the real CDP stack for one endpoint.
 */
export function createSearchContext(endpoint: CdpEndpoint, clock?: PollerClock): SearchContext {
  const directory = new TargetDirectory(endpoint);
  const lifecycle = new TargetLifecycleManager(directory);
  const poller = new ExtractionPoller({ lifecycle, directory, evaluate, clock });
  const service = createSearchService({ directory, poller });
  return { directory, lifecycle, poller, service };
}
