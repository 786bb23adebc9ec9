/**
 * Lever source constants: base URL, HTTP tunables, limits
 *
 * Postings API documentation: https://github.com/lever/postings-api
 */

import { SOURCE_USER_AGENT } from "../sources";

export const LEVER_API_BASE_URL = "https://api.lever.co/v0";

export const LEVER_HTTP_TIMEOUT_MS = 15000;

export const LEVER_HTTP_MAX_ATTEMPTS = 2;

export const LEVER_HTTP_HEADERS: Record<string, string> = {
  Accept: "application/json",
  "User-Agent": SOURCE_USER_AGENT,
};

export const LEVER_LIMITS = {
  MAX_POSTINGS_PER_SITE: 200,
} as const;
