// Trailing sentence punctuation, after NFKC has folded full-width forms
const TRAILING_PUNCT = /[?!.。、,\s]+$/u;
const WHITESPACE = /\s+/gu;

/**
 * Normalized question key: NFKC, lower-case, no whitespace, no trailing
 * sentence punctuation. "何歳ですか？" and "何歳ですか " share a key.
 */
export function normalizeQuestion(text: string): string {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(WHITESPACE, "")
    .replace(TRAILING_PUNCT, "");
}

export function isDegenerateQuestion(text: string): boolean {
  return normalizeQuestion(text).length === 0;
}
