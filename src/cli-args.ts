import { DEFAULT_ALL_LIMIT, DEFAULT_LIMIT } from "./search.js";

export type ParsedArgs =
  | { kind: "search"; source: string; query: string; limit: number; json: boolean }
  | { kind: "read"; url: string }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

export function usage(sources: string[]): string {
  return [
    "Usage:",
    `  cdp-search <${[...sources, "all"].join("|")}> <query> [--limit N] [--json]`,
    "  cdp-search read <url>",
    "",
    "Searches content platforms through Chrome's remote debugging port.",
    `Default limit: ${DEFAULT_LIMIT} per source, ${DEFAULT_ALL_LIMIT} per source with "all".`,
  ].join("\n");
}

export function parseArgs(argv: string[], sources: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h" || command === "help") {
    return { kind: "help" };
  }

  if (command === "read") {
    const url = rest[0];
    if (!url) return { kind: "invalid", message: "read needs a URL" };
    return { kind: "read", url };
  }

  if (command !== "all" && !sources.includes(command)) {
    return { kind: "invalid", message: `unknown command "${command}"` };
  }

  let limit = command === "all" ? DEFAULT_ALL_LIMIT : DEFAULT_LIMIT;
  let json = false;
  const words: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--json") {
      json = true;
    } else if (arg === "--limit" || arg.startsWith("--limit=")) {
      const value = arg === "--limit" ? rest[++i] : arg.slice("--limit=".length);
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) {
        return { kind: "invalid", message: `--limit expects a positive integer, got "${value ?? ""}"` };
      }
      limit = n;
    } else {
      words.push(arg);
    }
  }

  const query = words.join(" ").trim();
  if (!query) {
    return { kind: "invalid", message: `${command} needs a search query` };
  }
  return { kind: "search", source: command, query, limit, json };
}
