/**
 * Decoders turn whatever the page-side query returned into a typed value.
 *
 * Both "malformed" and "absent" are retried by the poller: a half-rendered
 * page can produce either.
 */

import type { SearchResult } from "../types";
import { isRecord } from "../guards.js";

export type Decoded<T> =
  | { kind: "records"; value: T }
  | { kind: "malformed"; reason: string }
  | { kind: "absent" };

export type Decoder<T> = (raw: unknown) => Decoded<T>;

const OPTIONAL_FIELDS = ["snippet", "author", "date", "likes"] as const;

function toSearchResult(entry: unknown): SearchResult | null {
  if (!isRecord(entry)) return null;
  const { source, title, url } = entry;
  if (typeof source !== "string" || typeof title !== "string" || typeof url !== "string") {
    return null;
  }

  const record: SearchResult = { source, title, url };
  for (const field of OPTIONAL_FIELDS) {
    const value = entry[field];
    if (typeof value === "string") {
      record[field] = value;
    } else if (typeof value === "number") {
      record[field] = String(value);
    }
  }
  return record;
}

/**
 * Default decoder: a JSON-encoded list of result records (or the list itself).
 * An empty list is "absent", not success.
 */
export const decodeSearchResults: Decoder<SearchResult[]> = (raw) => {
  if (raw === undefined || raw === null || raw === "") {
    return { kind: "absent" };
  }

  let parsed: unknown = raw;
  if (typeof raw === "string") {
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { kind: "malformed", reason: "not valid JSON" };
    }
  }

  if (!Array.isArray(parsed)) {
    return { kind: "malformed", reason: "expected a list of results" };
  }
  if (parsed.length === 0) {
    return { kind: "absent" };
  }

  const records: SearchResult[] = [];
  for (const entry of parsed) {
    const record = toSearchResult(entry);
    if (record) records.push(record);
  }
  if (records.length === 0) {
    return { kind: "malformed", reason: "no entry has source, title and url" };
  }
  return { kind: "records", value: records };
};

/** Plain text, e.g. document.body.innerText. Blank text is "absent". */
export const decodeText: Decoder<string> = (raw) => {
  if (typeof raw !== "string") {
    return raw === undefined || raw === null ? { kind: "absent" } : { kind: "malformed", reason: "expected text" };
  }
  return raw.trim() === "" ? { kind: "absent" } : { kind: "records", value: raw };
};
