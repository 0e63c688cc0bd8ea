/**
 * Configuration for cdp-search.
 *
 * Sources, lowest precedence first:
 * - built-in defaults
 * - ~/.cdp-search/config.json
 * - environment (CDP_HOST, CDP_PORT, PORT)
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { CdpEndpoint } from "./types";
import { createLogger } from "./logger.js";
import { isRecord } from "./guards.js";

const log = createLogger("config");

export interface CdpSearchConfig {
  /** Remote debugging endpoint of the running browser */
  cdp: CdpEndpoint;
  server: {
    /** HTTP API port for scripts/start-server.ts (default: 9333) */
    port: number;
  };
}

export const CONFIG_DIR = join(process.env.HOME || "", ".cdp-search");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export const DEFAULT_CONFIG: CdpSearchConfig = {
  cdp: {
    host: "localhost",
    port: 9222,
  },
  server: {
    port: 9333,
  },
};

interface UserConfig {
  cdp?: Partial<CdpEndpoint>;
  server?: Partial<CdpSearchConfig["server"]>;
}

function pickUserConfig(raw: unknown): UserConfig {
  if (!isRecord(raw)) {
    throw new Error("config must be a JSON object");
  }
  const user: UserConfig = {};
  if (isRecord(raw.cdp)) {
    user.cdp = {};
    if (typeof raw.cdp.host === "string") user.cdp.host = raw.cdp.host;
    if (typeof raw.cdp.port === "number") user.cdp.port = raw.cdp.port;
  }
  if (isRecord(raw.server) && typeof raw.server.port === "number") {
    user.server = { port: raw.server.port };
  }
  return user;
}

export function validatePort(port: number, name: string): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${name}: ${port}. Must be between 1 and 65535`);
  }
  return port;
}

function readUserConfig(file: string): UserConfig {
  try {
    if (existsSync(file)) {
      return pickUserConfig(JSON.parse(readFileSync(file, "utf-8")));
    }
  } catch (err) {
    log.warn(`Warning: Could not load config from ${file}:`, err);
  }
  return {};
}

/**
 * Load configuration with defaults, the user's config file and env overrides.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  file: string = CONFIG_FILE
): CdpSearchConfig {
  const user = readUserConfig(file);

  const config: CdpSearchConfig = {
    cdp: { ...DEFAULT_CONFIG.cdp, ...user.cdp },
    server: { ...DEFAULT_CONFIG.server, ...user.server },
  };

  if (env.CDP_HOST) config.cdp.host = env.CDP_HOST;
  if (env.CDP_PORT) config.cdp.port = parseInt(env.CDP_PORT, 10);
  if (env.PORT) config.server.port = parseInt(env.PORT, 10);

  validatePort(config.cdp.port, "CDP port");
  validatePort(config.server.port, "server port");
  return config;
}

/** HTTP base URL of the discovery endpoint, e.g. http://localhost:9222 */
export function cdpBaseUrl(endpoint: CdpEndpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}
