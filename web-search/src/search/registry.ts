/**
 * Registry of search engines by display name.
 */

import { createRequire } from "node:module";
import type { EngineCredentials, SearchEngine, SearchEngineClass, Transport } from "./types.js";
import { BingSearchEngine } from "./engines/bing.js";
import { YahooBossSearchEngine } from "./engines/yahoo-boss.js";
import { logger } from "../utils/logger.js";

export const SEARCH_ENGINES = Object.freeze({
  [BingSearchEngine.engineName]: BingSearchEngine,
  [YahooBossSearchEngine.engineName]: YahooBossSearchEngine,
} satisfies Record<string, SearchEngineClass>);

export type EngineName = keyof typeof SEARCH_ENGINES;

export function isEngineName(name: string): name is EngineName {
  return Object.hasOwn(SEARCH_ENGINES, name);
}

/**
 * Create a search engine from its configured name.
 *
 * @throws Error if no engine is registered under that name
 */
export function createSearchEngine(
  name: string,
  credentials: EngineCredentials,
  transport: Transport
): SearchEngine {
  if (!isEngineName(name)) {
    const known = Object.keys(SEARCH_ENGINES).join(", ");
    throw new Error(`Unsupported search engine: ${name} (expected one of: ${known})`);
  }
  const EngineClass: SearchEngineClass = SEARCH_ENGINES[name];
  return new EngineClass(credentials, transport);
}

const localRequire = createRequire(import.meta.url);

/**
 * List the declared requirements of an engine that are not installed.
 */
export function missingRequirements(engine: Pick<SearchEngineClass, "requirements">): string[] {
  return engine.requirements().filter((pkg) => {
    try {
      localRequire.resolve(pkg);
      return false;
    } catch (error) {
      logger.debug(`Cannot resolve ${pkg}: ${error instanceof Error ? error.message : String(error)}`);
      return true;
    }
  });
}
