/**
 * UUID format guard for look-ups.
 *
 * Parsing a malformed string throws; callers that should answer "not found"
 * for such input check it here first and skip the query.
 */

const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Returns `true` when `value` is a well-formed UUID v1-v5 string. */
export function isValidUuid(value: string): boolean {
  return UUID_RE.test(value);
}
