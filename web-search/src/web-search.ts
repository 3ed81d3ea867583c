import { loadConfig } from "./config/config.js";
import type { TransportConfig } from "./config/types.js";
import {
  SEARCH_ENGINES,
  createSearchEngine,
  missingRequirements,
  type Transport,
} from "./search/index.js";
import { FetchTransport } from "./transport/fetch-transport.js";
import { logger } from "./utils/logger.js";

export interface WebSearchOptions {
  query: string;
  configPath?: string;
  /** Engine name overriding the configured one */
  engine?: string;
  debug?: boolean;
  /** Transport to use instead of one built from config */
  transport?: Transport;
}

export interface WebSearchOutcome {
  engine: string;
  query: string;
  urls: string[];
}

export interface EngineSummary {
  name: string;
  requirements: readonly string[];
  missing: string[];
}

/**
 * Build the default transport from the transport section of the config.
 */
export function createTransport(config: TransportConfig): FetchTransport {
  return new FetchTransport({
    defaultHeaders: config.userAgent ? { "User-Agent": config.userAgent } : {},
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Run one query against the configured engine.
 */
export async function webSearch(options: WebSearchOptions): Promise<WebSearchOutcome> {
  const query = options.query.trim();
  if (!query) {
    throw new Error("Query must not be empty");
  }

  const config = await loadConfig(options.configPath);
  if (options.debug || config.debug) {
    logger.setDebug(true);
  }

  const engineName = options.engine ?? config.engine;
  const credentials = config.engines[engineName] ?? {};
  const transport = options.transport ?? createTransport(config.transport);
  const engine = createSearchEngine(engineName, credentials, transport);

  logger.debug(`Searching ${engine.name} for ${JSON.stringify(query)}`);
  const urls = await engine.search(query);

  return { engine: engine.name, query, urls };
}

/**
 * Describe every registered engine and whether its requirements are installed.
 */
export function describeEngines(): EngineSummary[] {
  return Object.values(SEARCH_ENGINES).map((engine) => ({
    name: engine.engineName,
    requirements: engine.requirements(),
    missing: missingRequirements(engine),
  }));
}
