const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\f': '\\f',
  '\r': '\\r',
}

function unicodeEscape(code: number): string {
  return `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`
}

/**
 * Escape text as the body of a double-quoted string literal.
 *
 * Backslash, double quote and the common control characters get their short
 * escapes; any other UTF-16 code unit below 0x20 or above 0x7F becomes
 * `\uXXXX`. The result is valid inside a JSON string, so `JSON.parse` of the
 * quoted result returns the input.
 */
export function escapeStringLiteral(value: string): string {
  let out = ''
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i)
    const named = NAMED_ESCAPES[ch]
    if (named !== undefined) {
      out += named
      continue
    }
    const code = value.charCodeAt(i)
    out += code < 0x20 || code > 0x7F ? unicodeEscape(code) : ch
  }
  return out
}

/**
 * Wrap a value in double quotes, escaping it first when requested.
 *
 * Unescaped output is written verbatim: a raw `"` or newline in the value
 * yields a document GML readers will reject.
 */
export function quote(value: string, escape: boolean): string {
  return `"${escape ? escapeStringLiteral(value) : value}"`
}
