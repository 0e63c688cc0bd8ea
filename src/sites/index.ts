import type { SiteAdapter } from "./types";
import { wechat } from "./wechat.js";
import { kr36 } from "./kr36.js";
import { xhs } from "./xhs.js";

export type { SiteAdapter } from "./types";

/** Registered adapters, in the order "all" searches them. */
export const SITES: readonly SiteAdapter[] = [wechat, kr36, xhs];

export function getSite(name: string): SiteAdapter | undefined {
  return SITES.find((site) => site.name === name);
}

export function siteNames(): string[] {
  return SITES.map((site) => site.name);
}

/** Fill the adapter's URL template with the escaped search term. */
export function buildSearchUrl(site: SiteAdapter, query: string): string {
  return site.urlTemplate.replace("{query}", encodeURIComponent(query));
}
