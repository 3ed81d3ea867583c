/**
 * OAuth 1.0a request signing (HMAC-SHA1, two-legged: no token secret).
 */

import { createHmac, randomBytes } from "node:crypto";
import OAuth from "oauth-1.0a";

export interface OAuthConsumer {
  key: string;
  secret: string;
}

/**
 * Source of the per-request nonce and timestamp.
 * Injected so signatures can be reproduced.
 */
export interface SigningSource {
  nonce(): string;
  /** Seconds since the Unix epoch */
  timestamp(): number;
}

export const systemSigningSource: SigningSource = {
  nonce: () => randomBytes(16).toString("hex"),
  timestamp: () => Math.floor(Date.now() / 1000),
};

export interface SignRequestOptions {
  method: string;
  /** Endpoint without a query string */
  url: string;
  params: Readonly<Record<string, string>>;
  consumer: OAuthConsumer;
  nonce: string;
  timestamp: number;
}

function createOAuth(consumer: OAuthConsumer): OAuth {
  return new OAuth({
    consumer,
    signature_method: "HMAC-SHA1",
    hash_function: (baseString: string, key: string) =>
      createHmac("sha1", key).update(baseString).digest("base64"),
  });
}

/**
 * Sign a request's parameters.
 *
 * @returns The request parameters plus every oauth_* parameter, including
 *   oauth_signature
 */
export function signRequest(options: SignRequestOptions): Record<string, string> {
  const oauth = createOAuth(options.consumer);
  const oauthData = {
    oauth_consumer_key: options.consumer.key,
    oauth_nonce: options.nonce,
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: options.timestamp,
    oauth_version: "1.0",
  };

  const signature = oauth.getSignature(
    { url: options.url, method: options.method, data: options.params },
    "",
    oauthData
  );

  return {
    ...options.params,
    oauth_consumer_key: oauthData.oauth_consumer_key,
    oauth_nonce: oauthData.oauth_nonce,
    oauth_signature_method: oauthData.oauth_signature_method,
    oauth_timestamp: String(oauthData.oauth_timestamp),
    oauth_version: oauthData.oauth_version,
    oauth_signature: signature,
  };
}

/**
 * RFC 3986 percent-encoding, the same encoding the signature base string
 * uses. Spaces become %20, never +.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Append parameters to a base URL with RFC 3986 encoding.
 */
export function buildSignedUrl(base: string, params: Readonly<Record<string, string>>): string {
  const query = Object.entries(params)
    .map(([key, value]) => `${percentEncode(key)}=${percentEncode(value)}`)
    .join("&");
  return `${base}?${query}`;
}
