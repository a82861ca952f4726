/**
 * String literals for generated source
 */

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
  '\v': '\\v',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029'
};

function hex(code: number, width: number): string {
  return code.toString(16).toUpperCase().padStart(width, '0');
}

/**
 * Renders `value` as a single-quoted literal whose parsed value is exactly
 * `value`, whatever it contains: quotes, backslashes, line terminators,
 * control characters and unpaired surrogates.
 *
 * @example
 * ```typescript
 * toStringLiteral("it's");    // 'it\'s'
 * toStringLiteral('a\nb');    // 'a\nb' (escaped, on one line)
 * ```
 */
export function toStringLiteral(value: string): string {
  let output = "'";

  for (let index = 0; index < value.length; index++) {
    const char = value.charAt(index);
    const code = value.charCodeAt(index);
    const simple = SIMPLE_ESCAPES[char];

    if (simple !== undefined) {
      output += simple;
    } else if (code < 0x20 || code === 0x7f) {
      // \0 followed by a digit would read as an octal escape
      output += `\\x${hex(code, 2)}`;
    } else if (code >= 0xd800 && code <= 0xdbff) {
      const next = value.charCodeAt(index + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        output += value.slice(index, index + 2);
        index++;
      } else {
        output += `\\u${hex(code, 4)}`;
      }
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      output += `\\u${hex(code, 4)}`;
    } else {
      output += char;
    }
  }

  return `${output}'`;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Renders an object literal key: bare when it is a plain identifier, quoted
 * otherwise
 */
export function toPropertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : toStringLiteral(name);
}
