/**
 * Raised by a search engine when a query cannot be completed: the transport
 * failed, the provider answered with a non-200 status, or the body was not
 * valid JSON. The message is always prefixed with the engine's name.
 */
export class SearchQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchQueryError";
  }
}
