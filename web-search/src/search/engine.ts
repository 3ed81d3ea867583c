/**
 * Base class for search engines.
 * Handles the response pipeline every provider shares: one transport call,
 * gzip decoding, status check and JSON decoding.
 */

import { gunzip } from "node:zlib";
import { promisify } from "node:util";
import type {
  EngineCredentials,
  SearchEngine,
  Transport,
  TransportResponse,
} from "./types.js";
import { SearchQueryError } from "./errors.js";
import { logger } from "../utils/logger.js";

const gunzipAsync = promisify(gunzip);

/** Longest slice of a response body quoted in a status error */
export const MAX_ERROR_BODY_LENGTH = 500;

export abstract class BaseSearchEngine implements SearchEngine {
  abstract readonly name: string;

  constructor(
    protected readonly credentials: EngineCredentials,
    protected readonly transport: Transport
  ) {}

  requirements(): readonly string[] {
    return [];
  }

  abstract search(query: string): Promise<string[]>;

  /**
   * Look up a credential this engine cannot work without.
   * @throws Error if the key is absent
   */
  protected credential(key: string): string {
    const value = this.credentials[key];
    if (value === undefined) {
      throw new Error(`${this.name}: missing credential "${key}"`);
    }
    return value;
  }

  /**
   * GET a URL and decode the JSON body.
   * @throws SearchQueryError on transport failure, non-200 status or bad JSON
   */
  protected async fetchJson(
    url: string,
    headers?: Readonly<Record<string, string>>
  ): Promise<unknown> {
    logger.logCurl("GET", url, headers);

    let response: TransportResponse;
    let body: Buffer;
    try {
      response = await this.transport.get(url, headers);
      body = isGzip(response) ? await gunzipAsync(response.body) : response.body;
    } catch (error) {
      throw new SearchQueryError(
        `${this.name} Error: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const text = body.toString("utf-8");
    if (response.status !== 200) {
      throw new SearchQueryError(
        `${this.name} Error: got response code '${response.status}':\n${text.slice(0, MAX_ERROR_BODY_LENGTH)}`
      );
    }

    try {
      return JSON.parse(text) as unknown;
    } catch {
      throw new SearchQueryError(`${this.name} Error: JSON could not be decoded`);
    }
  }
}

function isGzip(response: TransportResponse): boolean {
  return response.headers["content-encoding"]?.toLowerCase() === "gzip";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` into a decoded response and collect `field` from each result.
 * A missing or mistyped step yields no results rather than an error, since
 * providers answer an empty search with a trimmed-down document.
 */
export function extractUrls(data: unknown, path: readonly string[], field: string): string[] {
  let node: unknown = data;
  for (const key of path) {
    if (!isRecord(node)) return [];
    node = node[key];
  }
  if (!Array.isArray(node)) return [];

  const urls: string[] = [];
  for (const entry of node) {
    const url = isRecord(entry) ? entry[field] : undefined;
    if (typeof url === "string") {
      urls.push(url);
    }
  }
  return urls;
}
