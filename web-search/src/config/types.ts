/**
 * Configuration types for web-search
 */

export interface Config {
  /** Registry name of the engine to query (e.g. "Bing", "Yahoo! BOSS") */
  engine: string;
  /** Credentials per engine name */
  engines: Record<string, EngineCredentialsConfig>;
  transport: TransportConfig;
  debug?: boolean;
}

/** Named secrets for one engine (key, secret, type) */
export type EngineCredentialsConfig = Record<string, string>;

export interface TransportConfig {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  userAgent?: string;
}
