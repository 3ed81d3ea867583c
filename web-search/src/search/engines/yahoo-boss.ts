/**
 * Yahoo! BOSS engine.
 * Every request is OAuth 1.0a signed with the consumer key and secret.
 */

import { BaseSearchEngine, extractUrls } from "../engine.js";
import type { EngineCredentials, Transport } from "../types.js";
import {
  buildSignedUrl,
  signRequest,
  systemSigningSource,
  type OAuthConsumer,
  type SigningSource,
} from "../oauth.js";
import { logger } from "../../utils/logger.js";

const BASE_URL = "http://yboss.yahooapis.com/ysearch/web";

export class YahooBossSearchEngine extends BaseSearchEngine {
  static readonly engineName = "Yahoo! BOSS";

  static requirements(): readonly string[] {
    return ["oauth-1.0a"];
  }

  readonly name = YahooBossSearchEngine.engineName;

  private readonly consumer: OAuthConsumer;

  constructor(
    credentials: EngineCredentials,
    transport: Transport,
    private readonly signing: SigningSource = systemSigningSource
  ) {
    super(credentials, transport);
    this.consumer = Object.freeze({
      key: this.credential("key"),
      secret: this.credential("secret"),
    });
  }

  requirements(): readonly string[] {
    return YahooBossSearchEngine.requirements();
  }

  /**
   * Do a Yahoo! BOSS web search.
   *
   * @returns URLs ranked by relevance as determined by Yahoo
   * @throws SearchQueryError on errors
   */
  async search(query: string): Promise<string[]> {
    const data = await this.fetchJson(this.buildUrl(query));
    const urls = extractUrls(data, ["bossresponse", "web", "results"], "url");
    logger.debug(`${this.name}: ${urls.length} results for ${JSON.stringify(query)}`);
    return urls;
  }

  /** Build a freshly signed request URL. */
  buildUrl(query: string): string {
    const params = signRequest({
      method: "GET",
      url: BASE_URL,
      params: {
        q: `"${query}"`,
        count: "5",
        type: "html,text,pdf",
        format: "json",
      },
      consumer: this.consumer,
      nonce: this.signing.nonce(),
      timestamp: this.signing.timestamp(),
    });
    return buildSignedUrl(BASE_URL, params);
  }
}
