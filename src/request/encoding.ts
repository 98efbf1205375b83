/**
 * Query-string escaping
 * @module request/encoding
 */

/**
 * Form URL encoding (application/x-www-form-urlencoded).
 *
 * Unreserved: A-Z a-z 0-9 - _ .
 * Space becomes `+`; everything else is `%XX` over its UTF-8 bytes.
 *
 * @example
 * ```typescript
 * formUrlEncode('2014-08-15T12:00:00Z'); // '2014-08-15T12%3A00%3A00Z'
 * formUrlEncode('a b~'); // 'a+b%7E'
 * ```
 */
export function formUrlEncode(str: string): string {
  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);

    if (
      (code >= 0x41 && code <= 0x5a) || // A-Z
      (code >= 0x61 && code <= 0x7a) || // a-z
      (code >= 0x30 && code <= 0x39) || // 0-9
      code === 0x2d || // -
      code === 0x5f || // _
      code === 0x2e // .
    ) {
      encoded += char;
    } else if (code === 0x20) {
      encoded += '+';
    } else {
      const utf8 = new TextEncoder().encode(char);
      for (const byte of utf8) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * Joins name/value pairs into a query string, escaping values only
 */
export function toQueryString(pairs: ReadonlyArray<readonly [string, string]>): string {
  return pairs.map(([name, value]) => `${name}=${formUrlEncode(value)}`).join('&');
}
