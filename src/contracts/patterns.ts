/**
 * Patterns and word lists used by the step rules.
 */

/** `YYYY-MM-DDTHH:MM:SSZ`, no fractional seconds or offsets */
export const ISO_UTC_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

/** 7-40 hex chars, optionally written as `git:<sha>` */
export const GIT_SHA_PATTERN = /^(?:git:)?[0-9a-f]{7,40}$/i;

export const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

/** Lowercase host name with at least one dot and an alphabetic TLD */
export const DOMAIN_PATTERN = /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

export const HTTP_URL_PATTERN = /^https?:\/\/\S+$/i;

export function isIsoUtc(value: unknown): value is string {
  return typeof value === "string" && ISO_UTC_PATTERN.test(value);
}

export function isPipelineVersion(value: unknown): value is string {
  return (
    typeof value === "string" &&
    (GIT_SHA_PATTERN.test(value) || SEMVER_PATTERN.test(value))
  );
}

export function isValidDomain(value: unknown): value is string {
  return typeof value === "string" && DOMAIN_PATTERN.test(value);
}

export function isHttpUrl(value: unknown): value is string {
  return typeof value === "string" && HTTP_URL_PATTERN.test(value.trim());
}

/** Markers of an official company register in registration evidence. */
export const REGISTER_MARKERS: readonly string[] = [
  "handelsregister",
  "commercial register",
  "registergericht",
  "amtsgericht",
  "companies house",
  "firmenbuch",
  "registre du commerce",
  "kvk",
  "hrb",
  "hra",
];

/** Words that turn a source-discovery finding into a factual claim. */
export const CLAIM_KEYWORDS: readonly string[] = [
  "founded",
  "established",
  "incorporated",
  "headquartered",
  "headquarters",
  "revenue",
  "turnover",
  "employees",
  "employs",
  "ceo",
  "acquired",
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive search for any of the given terms.
 * Returns the first term found, or null.
 */
export function findTerm(text: string, terms: readonly string[]): string | null {
  const lowered = text.toLowerCase();
  for (const term of terms) {
    const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}($|[^a-z0-9])`);
    if (pattern.test(lowered)) {
      return term;
    }
  }
  return null;
}

/** Phrases by which a finding reports that nothing was found. */
export const NO_EVIDENCE_PHRASES: readonly string[] = [
  "no evidence",
  "no verifiable",
  "not found",
  "no sites found",
  "n/v",
];
