/**
 * Evidence citations supplied in the case file.
 */

import { z } from "zod";
import type { Citation } from "../registry/schema.js";

export const CaseCitationSchema = z.object({
  publisher: z.string().trim().min(1),
  url: z.string().trim().regex(/^https?:\/\/\S+$/i, "must be an http(s) URL"),
  accessed_at_utc: z.string().trim().min(1).optional(),
});

export type CaseCitation = z.infer<typeof CaseCitationSchema>;

/**
 * A well-formed citation, stamped with `accessedAt` when the case file
 * leaves the access time out. Anything else yields null.
 */
export function parseCitation(value: unknown, accessedAt: string): Citation | null {
  const parsed = CaseCitationSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  return {
    publisher: parsed.data.publisher,
    url: parsed.data.url,
    accessed_at_utc: parsed.data.accessed_at_utc ?? accessedAt,
  };
}

/** Keep the first citation per URL. */
export function dedupeSources(sources: readonly Citation[]): Citation[] {
  const seen = new Set<string>();
  const result: Citation[] = [];
  for (const source of sources) {
    const url = source.url?.trim() ?? "";
    if (url === "" || seen.has(url)) {
      continue;
    }
    seen.add(url);
    result.push(source);
  }
  return result;
}
