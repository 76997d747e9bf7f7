const TYPST_SPECIAL_CHARS = /([#*_`$@\\<>])/g

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ENTITIES[ch] ?? ch)
}

/**
 * Escape markup characters for Typst content, then break up `//` and `/*`
 * so they are not read as comment openers.
 */
export function escapeTypst(text: string): string {
  return text
    .replace(TYPST_SPECIAL_CHARS, '\\$1')
    .replaceAll('//', '/\\/')
    .replaceAll('/*', '/\\*')
}
