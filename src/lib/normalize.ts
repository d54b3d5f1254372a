const TOKEN_RE = /[a-z0-9]+/g;

/**
 * Split text into lower-case alphanumeric runs. Everything else is a
 * separator. Total over any input; "" gives [].
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/**
 * Canonical comparison key: the tokens of `text` joined with no separator,
 * so "My-File_01.MOV" and "myfile01mov" share a key.
 *
 * Every rule source, index key and asset name goes through this before
 * comparison.
 */
export function normalize(text: string): string {
  return tokenize(text).join("");
}
