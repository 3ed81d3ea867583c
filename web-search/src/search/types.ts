/**
 * Types shared by the search engines and the transports they call through.
 */

/** Named secrets handed to an engine at construction (key, secret, type). */
export type EngineCredentials = Readonly<Record<string, string>>;

/** Raw response as returned by a transport. */
export interface TransportResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, names lower-cased */
  headers: Readonly<Record<string, string>>;
  /** Undecoded response body */
  body: Buffer;
}

/**
 * HTTP capability injected into every engine.
 * Owned by the caller; engines never close or reconfigure it.
 */
export interface Transport {
  /**
   * Issue a GET request.
   *
   * @param url Fully encoded request URL
   * @param headers Extra headers for this request only
   */
  get(url: string, headers?: Readonly<Record<string, string>>): Promise<TransportResponse>;
}

/**
 * Interface every search backend implements.
 */
export interface SearchEngine {
  /** Provider display name, also the registry key */
  readonly name: string;

  /** npm packages this engine needs at runtime */
  requirements(): readonly string[];

  /**
   * Search for a query.
   *
   * @returns Result URLs ranked by the provider; empty when nothing matched
   * @throws SearchQueryError on transport, status or decoding failures
   */
  search(query: string): Promise<string[]>;
}

/** Static side of a search engine, as stored in the registry. */
export interface SearchEngineClass {
  readonly engineName: string;
  requirements(): readonly string[];
  new (credentials: EngineCredentials, transport: Transport): SearchEngine;
}
