import { InvalidInputError } from "./errors.js";

export const DEFAULT_HOSTNAME = "api.github.com";

const HOSTNAME_PATTERN = /^[a-z0-9]([a-z0-9.-]*[a-z0-9])?(:[0-9]+)?$/;

/**
 * Maps a hostname to the REST API root: the public API for `api.github.com`,
 * the `/api/v3` prefix for GitHub Enterprise Server.
 */
export function apiBaseUrl(hostname: string = DEFAULT_HOSTNAME): string {
  const host = hostname.trim().toLowerCase();
  if (!HOSTNAME_PATTERN.test(host)) {
    throw new InvalidInputError("hostname", `invalid hostname "${hostname}" (expected e.g. github.example.com)`);
  }
  if (host === DEFAULT_HOSTNAME) {
    return "https://api.github.com";
  }
  return `https://${host}/api/v3`;
}
