// Shared types - protocol shapes, result records and HTTP request/response bodies

/** Address of the browser's remote debugging surface (HTTP discovery + WebSocket). */
export interface CdpEndpoint {
  host: string;
  port: number;
}

/** One entry of `GET /json`. */
export interface TargetDescriptor {
  id: string;
  type?: string;
  title?: string;
  url?: string;
  /** Page-level WebSocket URL. Missing while another client is attached. */
  webSocketDebuggerUrl?: string;
}

/** Body of `GET /json/version`. */
export interface BrowserVersionInfo {
  Browser?: string;
  "Protocol-Version"?: string;
  webSocketDebuggerUrl: string;
}

/** A single search hit, normalized across platforms. */
export interface SearchResult {
  source: string;
  title: string;
  url: string;
  snippet?: string;
  author?: string;
  date?: string;
  likes?: string;
}

// HTTP API types - shared between client-lite and the server

export interface SourceInfo {
  name: string;
  label: string;
}

export interface ServerInfoResponse {
  cdpUrl: string;
  reachable: boolean;
  sources: string[];
}

export interface ListSourcesResponse {
  sources: SourceInfo[];
}

export interface SearchRequest {
  /** Adapter name, or "all" */
  source: string;
  query: string;
  limit?: number;
}

export interface SearchResponse {
  results: SearchResult[];
  error?: string;
}

export interface ReadRequest {
  url: string;
}

export interface ReadResponse {
  text: string;
  error?: string;
}
