/**
 * Fetch-only client for the cdp-search HTTP API.
 *
 * Lets other processes search through a shared server without opening
 * their own connection to the browser.
 */

import type {
  ListSourcesResponse,
  ReadResponse,
  SearchRequest,
  SearchResponse,
  SearchResult,
  ServerInfoResponse,
  SourceInfo,
} from "./types";

export interface CdpSearchLiteClient {
  /** Server info, including whether the browser is reachable */
  info: () => Promise<ServerInfoResponse>;

  /** Registered sources */
  sources: () => Promise<SourceInfo[]>;

  /** Search one source, or "all" */
  search: (source: string, query: string, limit?: number) => Promise<SearchResult[]>;

  /** Read a page's visible text */
  read: (url: string) => Promise<string>;
}

export function connectLite(serverUrl = "http://localhost:9333"): CdpSearchLiteClient {
  async function jsonRequest<T>(path: string, options?: RequestInit): Promise<T> {
    const res = await fetch(`${serverUrl}${path}`, {
      ...options,
      headers: {
        "Content-Type": "application/json",
        ...options?.headers,
      },
    });

    if (!res.ok) {
      const error = await res.text();
      throw new Error(`HTTP ${res.status}: ${error}`);
    }

    return res.json() as Promise<T>;
  }

  return {
    async info() {
      return jsonRequest<ServerInfoResponse>("/");
    },

    async sources() {
      const result = await jsonRequest<ListSourcesResponse>("/sources");
      return result.sources;
    },

    async search(source: string, query: string, limit?: number) {
      const result = await jsonRequest<SearchResponse>("/search", {
        method: "POST",
        body: JSON.stringify({ source, query, limit } satisfies SearchRequest),
      });
      if (result.error) {
        throw new Error(result.error);
      }
      return result.results;
    },

    async read(url: string) {
      const result = await jsonRequest<ReadResponse>("/read", {
        method: "POST",
        body: JSON.stringify({ url }),
      });
      if (result.error) {
        throw new Error(result.error);
      }
      return result.text;
    },
  };
}
