const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-term lookup for vocabulary entries such as "go", "c++" or "ci/cd".
 * The term must not be glued to another letter or digit on either side, so
 * "go" does not hit "catégorie" and "git" does not hit "digital".
 */
export function containsTerm(text: string, term: string): boolean {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`, "iu");
  return pattern.test(text);
}

export function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}
