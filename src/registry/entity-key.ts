/**
 * Canonical identity keys for entities.
 *
 * A domain is the strongest identity signal (one company, one domain), so it
 * always wins over a name. Names are a weaker fallback: two companies may
 * share one.
 */

import { PLACEHOLDER, UNRESOLVED_KEY, isPlaceholder } from "./schema.js";

/**
 * Trim and collapse internal runs of whitespace to single spaces.
 */
export function normalizeWhitespace(value: string): string {
  return value.trim().split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Lowercase a domain and strip scheme, path, query and fragment.
 *
 * @example
 *   normalizeDomain("https://www.Acme.com/path?x=1") // "www.acme.com"
 *
 * Returns "" for absent or placeholder input.
 */
export function normalizeDomain(value: string | null | undefined): string {
  if (value === null || value === undefined || isPlaceholder(value)) {
    return "";
  }
  let domain = value.trim().toLowerCase();
  domain = domain.replace(/^https?:\/\//, "");
  const cut = domain.search(/[/?#]/);
  if (cut !== -1) {
    domain = domain.slice(0, cut);
  }
  return domain.trim();
}

export function normalizeName(value: string | null | undefined): string {
  if (value === null || value === undefined || isPlaceholder(value)) {
    return "";
  }
  return normalizeWhitespace(value).toLowerCase();
}

/**
 * Build the entity key: `domain:<domain>`, else `name:<name>`, else "n/v".
 */
export function buildEntityKey(
  domain?: string | null,
  name?: string | null
): string {
  const normalizedDomain = normalizeDomain(domain);
  if (normalizedDomain) {
    return `domain:${normalizedDomain}`;
  }
  const normalizedName = normalizeName(name);
  if (normalizedName) {
    return `name:${normalizedName}`;
  }
  return UNRESOLVED_KEY;
}

export function isResolvedKey(key: string | undefined): key is string {
  return key !== undefined && key.trim() !== "" && key.trim() !== PLACEHOLDER;
}
