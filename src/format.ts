import type { SearchResult } from "./types";

export function formatJson(results: SearchResult[]): string {
  return JSON.stringify(results, null, 2);
}

/**
 * Compact text listing. Detail lines are indented to sit under the title:
 *
 *   [xhs] Title
 *         @author · 2024-05-01 · ❤ 120
 *         https://...
 */
export function formatText(results: SearchResult[]): string {
  const blocks: string[] = [];

  for (const r of results) {
    const indent = " ".repeat(r.source.length + 3);
    const meta = [r.author, r.date, r.likes ? `❤ ${r.likes}` : ""].filter(Boolean).join(" · ");

    const lines = [`[${r.source}] ${r.title}`];
    for (const detail of [meta, r.url, r.snippet]) {
      if (detail) lines.push(indent + detail);
    }
    blocks.push(lines.join("\n") + "\n");
  }

  return blocks.join("\n");
}
