/**
 * Vietnamese-aware text helpers.
 *
 * Matching is done on NFC-normalised, lowercased text so precomposed and
 * decomposed spellings compare equal while diacritics stay significant
 * ("cấm" never matches "cam").
 */

/** Canonical form used for every comparison. */
export function normalizeText(text: string): string {
  return text.toLowerCase().normalize("NFC");
}

const TOKEN_RE = /[\p{L}\p{M}\p{N}]+/gu;

/** Unicode word tokens of already-normalised or raw text (normalised here). */
export function tokenize(text: string): string[] {
  return normalizeText(text).match(TOKEN_RE) ?? [];
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}]";

function wordsPattern(text: string): string {
  return normalizeText(text).trim().split(/\s+/).map(escapeRegExp).join("\\s+");
}

/**
 * Compile a literal phrase into a regex that only matches on word
 * boundaries (letters, marks and digits count as word characters), with
 * any run of whitespace inside the phrase matching any run in the text.
 * An occurrence directly preceded by one of `notAfter` does not match.
 */
export function phrasePattern(phrase: string, notAfter: readonly string[] = []): RegExp {
  const guards = notAfter.filter((p) => p.trim().length > 0).map(wordsPattern);
  const negated =
    guards.length > 0 ? `(?<!(?<!${WORD_CHAR})(?:${guards.join("|")})\\s+)` : "";
  return new RegExp(`${negated}(?<!${WORD_CHAR})${wordsPattern(phrase)}(?!${WORD_CHAR})`, "u");
}

/**
 * Matcher over a fixed phrase list. Returns the first phrase (in list
 * order) found in the text, or undefined.
 */
export class PhraseMatcher {
  private readonly patterns: ReadonlyArray<{ phrase: string; re: RegExp }>;

  /**
   * @param notAfter Lead-in words (e.g. negations) that disqualify an occurrence.
   */
  public constructor(phrases: readonly string[], notAfter: readonly string[] = []) {
    this.patterns = phrases
      .filter((p) => p.trim().length > 0)
      .map((phrase) => ({ phrase, re: phrasePattern(phrase, notAfter) }));
  }

  public get size(): number {
    return this.patterns.length;
  }

  public firstMatch(text: string): string | undefined {
    const normalized = normalizeText(text);
    for (const { phrase, re } of this.patterns) {
      if (re.test(normalized)) return phrase;
    }
    return undefined;
  }
}
