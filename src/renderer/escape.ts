const TEXT_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;'
};

const ATTRIBUTE_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '"': '&quot;'
};

/** Escapes text content: `&`, `<` and `>`. */
export function escapeText(text: string): string {
  return text.replace(/[&<>]/g, char => TEXT_ESCAPES[char] ?? char);
}

/** Escapes a double-quoted attribute value: `&` and `"`. */
export function escapeAttribute(value: string): string {
  return value.replace(/[&"]/g, char => ATTRIBUTE_ESCAPES[char] ?? char);
}
