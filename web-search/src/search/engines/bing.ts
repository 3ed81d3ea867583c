/**
 * Bing Search (Azure Datamarket) engine.
 * Authenticates with a static Basic header built from the account key.
 */

import { BaseSearchEngine, extractUrls } from "../engine.js";
import type { EngineCredentials, Transport } from "../types.js";
import { logger } from "../../utils/logger.js";

const BASE_URL = "https://api.datamarket.azure.com/Bing";

/** Results requested per query */
const RESULT_COUNT = "5";

export class BingSearchEngine extends BaseSearchEngine {
  static readonly engineName = "Bing";

  static requirements(): readonly string[] {
    return [];
  }

  readonly name = BingSearchEngine.engineName;

  /** Sent with every request; the transport itself is left untouched. */
  private readonly headers: Readonly<Record<string, string>>;

  constructor(credentials: EngineCredentials, transport: Transport) {
    super(credentials, transport);
    const key = this.credential("key");
    const auth = Buffer.from(`${key}:${key}`, "utf-8").toString("base64");
    this.headers = Object.freeze({ Authorization: `Basic ${auth}` });
  }

  /**
   * Do a Bing web search.
   *
   * @returns URLs ranked by relevance as determined by Bing
   * @throws SearchQueryError on errors
   */
  async search(query: string): Promise<string[]> {
    const data = await this.fetchJson(this.buildUrl(query), this.headers);
    const urls = extractUrls(data, ["d", "results"], "Url");
    logger.debug(`${this.name}: ${urls.length} results for ${JSON.stringify(query)}`);
    return urls;
  }

  /**
   * Build the request URL. Option values are OData string literals, hence
   * the single quotes; the query itself is searched as an exact phrase.
   */
  buildUrl(query: string): string {
    const service = this.credentials["type"] === "searchweb" ? "SearchWeb" : "Search";
    const params = new URLSearchParams([
      ["$format", "json"],
      ["$top", RESULT_COUNT],
      ["Query", `'"${query.replaceAll('"', "")}"'`],
      ["Market", "'en-US'"],
      ["Adult", "'Strict'"],
      ["Options", "'DisableLocationDetection'"],
      ["WebSearchOptions", "'DisableHostCollapsing+DisableQueryAlterations'"],
    ]);
    return `${BASE_URL}/${service}/Web?${params.toString()}`;
  }
}
