import type { SearchResult } from "../catalog/types";
import { GatewayError, errorMessage } from "../errors";
import type { BM25Index } from "./bm25";
import { toSearchResult } from "./bm25";

export const MAX_REGEX_LENGTH = 200;

/**
 * Compile a user-supplied pattern.
 * The length cap is checked before compilation is attempted.
 * Matching ignores case; a leading "(?i)" is accepted and dropped.
 */
export function compilePattern(pattern: string, maxLength: number = MAX_REGEX_LENGTH): RegExp {
  if (pattern.length > maxLength) {
    throw new GatewayError(
      "pattern_too_long",
      `Pattern exceeds maximum length of ${maxLength} characters`,
      { details: { length: pattern.length, maxLength } }
    );
  }

  const source = pattern.startsWith("(?i)") ? pattern.slice(4) : pattern;

  try {
    return new RegExp(source, "i");
  } catch (error) {
    throw new GatewayError("invalid_pattern", `Invalid regex pattern: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Search indexed tools by regex pattern.
 * Returns every match, ordered by namespaced name, with a binary score of 1.
 */
export function searchWithRegex(
  index: BM25Index,
  pattern: string,
  maxLength: number = MAX_REGEX_LENGTH
): SearchResult[] {
  const regex = compilePattern(pattern, maxLength);
  return index.filter(text => regex.test(text)).map(meta => toSearchResult(meta, 1));
}
