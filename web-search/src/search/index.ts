/**
 * Pluggable web search: one contract over several providers.
 */

export { SearchQueryError } from "./errors.js";
export { BaseSearchEngine, extractUrls, MAX_ERROR_BODY_LENGTH } from "./engine.js";
export { BingSearchEngine } from "./engines/bing.js";
export { YahooBossSearchEngine } from "./engines/yahoo-boss.js";
export {
  SEARCH_ENGINES,
  createSearchEngine,
  isEngineName,
  missingRequirements,
} from "./registry.js";
export type { EngineName } from "./registry.js";
export { signRequest, buildSignedUrl, percentEncode, systemSigningSource } from "./oauth.js";
export type { OAuthConsumer, SigningSource, SignRequestOptions } from "./oauth.js";
export type {
  EngineCredentials,
  SearchEngine,
  SearchEngineClass,
  Transport,
  TransportResponse,
} from "./types.js";
