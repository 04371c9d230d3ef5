/**
 * String functions shared by dedicated opcodes and the standard library.
 *
 * @module runtime/string-functions
 */

const MAX_LABEL_LENGTH = 63;

/**
 * Substring by `[start, end)`, counted from the end of the string when
 * `reverse` is set. Returns null for non-ASCII input or out-of-range bounds.
 */
export function substring(value: string, start: number, end: number, reverse: boolean): string | null {
  if (start < 0 || start >= end || value.length < end) {
    return null;
  }
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) > 127) return null;
  }
  if (!reverse) {
    return value.substring(start, end);
  }
  return value.substring(value.length - end, value.length - start);
}

/**
 * Split on a literal delimiter. A limit of 0 means unlimited; otherwise at
 * most `limit` parts are returned and the last one holds the remainder.
 */
export function split(value: string, delimiter: string, limit: number): string[] {
  if (delimiter.length === 0) {
    throw new RangeError('split delimiter must not be empty');
  }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`split limit must be a non-negative integer, got ${limit}`);
  }
  if (limit === 1) {
    return [value];
  }
  const parts = value.split(delimiter);
  if (limit === 0 || parts.length <= limit) {
    return parts;
  }
  return [...parts.slice(0, limit - 1), parts.slice(limit - 1).join(delimiter)];
}

/**
 * Percent-encode everything outside the RFC 3986 unreserved set.
 */
export function uriEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function isAlphanumeric(code: number): boolean {
  return (code >= 48 && code <= 57) || (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

function isValidLabel(label: string): boolean {
  if (label.length === 0 || label.length > MAX_LABEL_LENGTH) {
    return false;
  }
  if (!isAlphanumeric(label.charCodeAt(0))) {
    return false;
  }
  for (let i = 1; i < label.length; i++) {
    const code = label.charCodeAt(i);
    if (!isAlphanumeric(code) && code !== 45) return false;
  }
  return true;
}

/**
 * RFC 1123 host label check. With `allowDots`, every dot-separated label
 * must be valid on its own (so empty labels from leading, trailing or
 * doubled dots fail).
 */
export function isValidHostLabel(value: string, allowDots: boolean): boolean {
  if (!allowDots) {
    return isValidLabel(value);
  }
  return value.split('.').every(isValidLabel);
}
