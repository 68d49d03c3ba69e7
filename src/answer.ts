import { optionLetter } from "./types";

/**
 * Parse the option a model picked out of free-form text. Only letters
 * within `A..` the option count are accepted. Tried in order: an explicit
 * "Đáp án: X" / "Answer: X" / "Lựa chọn: X", a reply that is just the
 * letter (optionally followed by punctuation), then the last standalone
 * capital letter in range.
 *
 * @returns 0-based option index, or undefined when nothing usable was found
 */
export function parseAnswerIndex(text: string, optionCount: number): number | undefined {
  if (optionCount <= 0) return undefined;
  const last = optionLetter(Math.min(optionCount, 26) - 1);
  const range = `A-${last}`;
  const normalized = text.normalize("NFC");

  const explicit = new RegExp(
    `(?:[Đđ]áp án|ĐÁP ÁN|[Aa]nswer|ANSWER|[Cc]họn|CHỌN)\\s*(?:là|LÀ|is|IS)?\\s*[:：]?\\s*\\(?([${range}])(?![\\p{L}\\p{N}])`,
    "u",
  );
  const bare = new RegExp(`^\\s*\\(?([${range}])\\)?\\s*[.):]?\\s*$`, "u");
  const standalone = new RegExp(`(?<![\\p{L}\\p{N}])([${range}])(?![\\p{L}\\p{N}])`, "gu");

  const fromMatch = (letter: string | undefined) =>
    letter === undefined ? undefined : letter.charCodeAt(0) - 65;

  const e = explicit.exec(normalized);
  if (e) return fromMatch(e[1]);
  const b = bare.exec(normalized);
  if (b) return fromMatch(b[1]);
  const all = Array.from(normalized.matchAll(standalone));
  if (all.length > 0) return fromMatch(all[all.length - 1][1]);
  return undefined;
}
