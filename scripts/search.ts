#!/usr/bin/env npx tsx
/**
 * Search content platforms through a running Chrome with remote debugging on.
 *
 * Usage:
 *   npx tsx scripts/search.ts <wechat|36kr|xhs|all> <query> [--limit N] [--json]
 *   npx tsx scripts/search.ts read <url>
 *
 * Environment variables:
 *   CDP_HOST - Browser debugging host (default: localhost)
 *   CDP_PORT - Browser debugging port (default: 9222)
 *   CDP_SEARCH_DEBUG - Print poller diagnostics to stderr
 */

import { loadConfig } from "@/config.js";
import { createSearchContext } from "@/search.js";
import { siteNames } from "@/sites/index.js";
import { formatJson, formatText } from "@/format.js";
import { parseArgs, usage } from "@/cli-args.js";
import { describeError } from "@/errors.js";

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), siteNames());
  if (parsed.kind === "help") {
    console.error(usage(siteNames()));
    return 1;
  }
  if (parsed.kind === "invalid") {
    console.error(`Error: ${parsed.message}\n`);
    console.error(usage(siteNames()));
    return 1;
  }

  const config = loadConfig();
  const { service, directory } = createSearchContext(config.cdp);

  if (!(await directory.reachable())) {
    console.error(
      `Error: CDP Chrome not running at ${directory.baseUrl}. ` +
        `Start Chrome with --remote-debugging-port=${config.cdp.port}`
    );
    return 1;
  }

  if (parsed.kind === "read") {
    const text = await service.readPage(parsed.url);
    if (text === null) return 1;
    console.log(text);
    return 0;
  }

  const results =
    parsed.source === "all"
      ? await service.searchAll(parsed.query, { limit: parsed.limit })
      : await service.searchSource(parsed.source, parsed.query, { limit: parsed.limit });

  if (parsed.json) {
    console.log(formatJson(results));
  } else {
    process.stdout.write(formatText(results));
  }
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`Error: ${describeError(err)}`);
    process.exit(1);
  }
);
