import { ValidationError } from "../errors";
import {
  MAX_ARTICLES,
  MAX_QUERY_LEN,
  MIN_ARTICLES,
} from "../constants/news";

// ASCII control characters, keeping \t \n \r
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

/**
 * Normalizes free-text query input before it is used as a cache key
 * or sent upstream.
 */
export function sanitizeQuery(raw: string): string {
  const q = raw.replace(CONTROL_CHARS, "").trim().replace(/\s+/g, " ");

  if (!q) {
    throw new ValidationError("Query must not be empty after sanitization", "q");
  }
  // Code points, not UTF-16 units
  if ([...q].length > MAX_QUERY_LEN) {
    throw new ValidationError(`Query too long (>${MAX_QUERY_LEN} chars)`, "q");
  }
  return q;
}

export function validateMax(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError("Parameter 'max' must be an integer", "max");
  }
  if (value < MIN_ARTICLES || value > MAX_ARTICLES) {
    throw new ValidationError(
      `Parameter 'max' must be between ${MIN_ARTICLES} and ${MAX_ARTICLES} inclusive`,
      "max"
    );
  }
  return value;
}
