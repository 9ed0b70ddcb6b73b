const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  "'": '&#39;',
  '"': '&#34;',
}

const HTML_SPECIALS = /[&<>'"]/g

/**
 * Escape the five HTML-significant characters so stored text can be embedded
 * in a page as-is. Entities already present are escaped again (`&amp;` becomes
 * `&amp;amp;`): stored comments are raw text, never markup.
 */
export function escapeHtml(input: string): string {
  if (input === '') return ''
  return input.replace(HTML_SPECIALS, (ch) => HTML_ESCAPES[ch] ?? ch)
}

const NON_ASCII = /[^\x00-\x7f]+/gu

/**
 * Percent-encode every non-ASCII character as its UTF-8 bytes so a URL can be
 * sent in a header such as `Location`. ASCII is left untouched.
 */
export function escapeNonAscii(input: string): string {
  return input.replace(NON_ASCII, (run) =>
    Array.from(Buffer.from(run, 'utf8'), (byte) => `%${byte.toString(16).toUpperCase()}`).join(''),
  )
}
