const SIGNED_QUERY_PATTERN = /\?[^#\s]*/g;

/**
 * Signed URLs carry their credentials in the query string; keep the location,
 * drop the signature.
 */
export function redactSignedUrl(url: string): string {
  return url.replace(SIGNED_QUERY_PATTERN, "?[REDACTED]");
}
