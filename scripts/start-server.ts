/**
 * Start the cdp-search HTTP API.
 *
 * Environment variables:
 *   PORT     - HTTP API port (default: 9333)
 *   CDP_HOST - Browser debugging host (default: localhost)
 *   CDP_PORT - Browser debugging port (default: 9222)
 *
 * Configuration file: ~/.cdp-search/config.json
 *   {
 *     "cdp": { "host": "localhost", "port": 9222 },
 *     "server": { "port": 9333 }
 *   }
 */

import { serve } from "@/index.js";
import { loadConfig, cdpBaseUrl } from "@/config.js";
import { TargetDirectory } from "@/cdp/target-directory.js";

const config = loadConfig();

console.log("Starting cdp-search server...");
console.log(`  HTTP API port: ${config.server.port}`);
console.log(`  CDP endpoint: ${cdpBaseUrl(config.cdp)}`);
console.log("");

if (!(await new TargetDirectory(config.cdp).reachable())) {
  console.warn(
    `Warning: no browser answering at ${cdpBaseUrl(config.cdp)} yet. ` +
      `Searches will fail until Chrome runs with --remote-debugging-port=${config.cdp.port}`
  );
}

const server = await serve({ config });

console.log(`HTTP API: http://localhost:${server.port}`);
console.log("Ready");
console.log("");
console.log("Press Ctrl+C to stop");
