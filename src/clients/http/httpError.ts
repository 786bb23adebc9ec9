/**
 * HttpError: a board or page answered with a non-2xx status
 *
 * Lives beside the client; src/types holds shapes only.
 */

import type { HttpErrorDetails } from "@/types";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? `: ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} from ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /**
   * Raw Retry-After header, when the server sent one
   */
  get retryAfter(): string | null {
    return this.headers?.get("retry-after") ?? null;
  }
}
