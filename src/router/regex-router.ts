import { DocumentType, RouteDecision } from "../types";
import { extractYear } from "../rag/temporal-filter";
import { normalizeText, PhraseMatcher } from "../text";

/** A named pattern; the name is reported back as `matchedPattern`. */
export interface RouteRule {
  readonly name: string;
  readonly pattern: RegExp;
}

const WORD = "[\\p{L}\\p{M}\\p{N}]";
const NOT_BEFORE = `(?<!${WORD})`;
const NOT_AFTER = `(?!${WORD})`;

/**
 * Reading comprehension: the question carries its own passage. Matched
 * against lowercased NFC text.
 */
export const READING_RULES: readonly RouteRule[] = [
  {
    name: "passage-label",
    pattern: /(đoạn văn|bài đọc|đoạn thông tin|đoạn trích|văn bản sau)/u,
  },
  {
    name: "context-label",
    pattern: new RegExp(`${NOT_BEFORE}(context|passage|text|ngữ cảnh)\\s*:`, "u"),
  },
  { name: "numbered-reference", pattern: /\[\d+\]/u },
  {
    name: "passage-reference",
    pattern: /(dựa (vào|trên) (đoạn|bài|văn bản|thông tin)|thông tin trên|nội dung trên|theo văn bản)/u,
  },
];

/** Mathematics and science: notation, calculus vocabulary, "compute" verbs. */
export const STEM_RULES: readonly RouteRule[] = [
  {
    name: "latex-command",
    pattern: /\\(int|sum|frac|sqrt|lim|prod|log|ln|sin|cos|tan|cdot|times|pi|infty)/u,
  },
  { name: "math-symbol", pattern: /[\^√∫∑∏π≤≥≠∞]/u },
  {
    name: "function-notation",
    pattern: new RegExp(`${NOT_BEFORE}\\p{L}\\s*\\(\\s*${WORD}+\\s*\\)\\s*=`, "u"),
  },
  {
    name: "calculus-term",
    pattern:
      /(đạo hàm|tích phân|nguyên hàm|phương trình|hàm số|logarit|lượng giác|ma trận|xác suất|cấp số (cộng|nhân))/u,
  },
  {
    // "tính" as a verb; "tính chất", "tính cách"... are nouns.
    name: "compute-verb",
    pattern: new RegExp(
      `(${NOT_BEFORE}tính(?!\\s+(chất|cách|năng|mạng|thần|từ|hợp|pháp|riêng|đến))${NOT_AFTER}|tìm giá trị|rút gọn)`,
      "u",
    ),
  },
  { name: "arithmetic", pattern: /\d\s*[+*×÷=]\s*\d/u },
];

/** Keyword table for the RAG category hint; first entry with a hit wins. */
export const CATEGORY_KEYWORDS: ReadonlyArray<readonly [DocumentType, readonly string[]]> = [
  [
    "LAW",
    ["luật", "bộ luật", "nghị định", "thông tư", "hiến pháp", "pháp luật", "xử phạt", "hình sự", "dân sự"],
  ],
  [
    "HISTORY",
    ["lịch sử", "triều", "nhà nguyễn", "nhà trần", "nhà lý", "kháng chiến", "chiến dịch", "khởi nghĩa", "vua"],
  ],
  ["GEOGRAPHY", ["địa lý", "địa lí", "tỉnh", "sông", "núi", "đồng bằng", "khí hậu", "biển đông"]],
  ["CULTURE", ["văn hóa", "văn hoá", "lễ hội", "phong tục", "tín ngưỡng", "ẩm thực", "di sản"]],
  ["POLITICS", ["đảng", "quốc hội", "chính phủ", "chủ tịch nước", "bộ chính trị"]],
];

/** Legal-instrument heads that start an entity spanning lowercase words. */
const ENTITY_MARKERS: readonly string[] = [
  "bộ luật",
  "nghị định",
  "nghị quyết",
  "thông tư",
  "hiến pháp",
  "pháp lệnh",
  "quyết định",
  "luật",
];

/** Words that end a marker-led entity. */
const ENTITY_STOPWORDS = new Set([
  "có",
  "là",
  "được",
  "về",
  "của",
  "năm",
  "từ",
  "theo",
  "và",
  "với",
  "trong",
  "cho",
  "khi",
  "thì",
  "nào",
  "gì",
  "đã",
  "sẽ",
  "đang",
  "này",
  "đó",
  "các",
  "những",
  "số",
  "ngày",
  "tháng",
  "quy",
]);

const MAX_ENTITIES = 5;
const MAX_MARKER_ENTITY_WORDS = 6;

type Token = { text: string; kind: "word" | "number" | "punct" };

const TOKEN_RE = /[\p{L}\p{M}]+|\p{N}+|[^\s\p{L}\p{M}\p{N}]/gu;
const SENTENCE_END = new Set([".", "?", "!", ":", ";", "\n"]);

function lex(text: string): Token[] {
  const out: Token[] = [];
  for (const m of text.matchAll(TOKEN_RE)) {
    const t = m[0];
    if (/^\p{N}+$/u.test(t)) out.push({ text: t, kind: "number" });
    else if (/^[\p{L}\p{M}]+$/u.test(t)) out.push({ text: t, kind: "word" });
    else out.push({ text: t, kind: "punct" });
  }
  return out;
}

function isCapitalized(token: Token | undefined): boolean {
  return token?.kind === "word" && /^\p{Lu}/u.test(token.text);
}

/** Number of tokens a legal-instrument marker occupies at position i (0 if none). */
function markerLength(tokens: Token[], i: number): number {
  for (const marker of ENTITY_MARKERS) {
    const words = marker.split(" ");
    const ok = words.every(
      (w, k) => tokens[i + k]?.kind === "word" && normalizeText(tokens[i + k].text) === w,
    );
    if (ok) return words.length;
  }
  return 0;
}

/**
 * Salient entities: runs of capitalised words, or a legal-instrument marker
 * followed by its name ("Luật Đất đai", "Bộ luật Dân sự"). A lone
 * capitalised word at the start of a sentence is ignored.
 */
export function extractEntities(text: string): string[] {
  const tokens = lex(text.normalize("NFC"));
  const entities: string[] = [];
  const seen = new Set<string>();
  let sentenceStart = true;
  let i = 0;

  while (i < tokens.length && entities.length < MAX_ENTITIES) {
    const token = tokens[i];
    if (!isCapitalized(token)) {
      sentenceStart = token.kind === "punct" && SENTENCE_END.has(token.text);
      i++;
      continue;
    }

    const startedSentence = sentenceStart;
    sentenceStart = false;
    const marker = markerLength(tokens, i);
    let end = i;
    if (marker > 0) {
      end = i + marker;
      while (
        end < tokens.length &&
        end - i < MAX_MARKER_ENTITY_WORDS &&
        tokens[end].kind === "word" &&
        !ENTITY_STOPWORDS.has(normalizeText(tokens[end].text))
      ) {
        end++;
      }
    } else {
      // A marker inside the run starts a new entity.
      end = i + 1;
      while (isCapitalized(tokens[end]) && markerLength(tokens, end) === 0) end++;
    }

    const words = tokens.slice(i, end).map((t) => t.text);
    const keep = marker > 0 || words.length > 1 || !startedSentence;
    const key = normalizeText(words.join(" "));
    if (keep && !seen.has(key)) {
      seen.add(key);
      entities.push(words.join(" "));
    }
    i = end;
  }
  return entities;
}

/**
 * Deterministic question router. READING rules are evaluated first, then
 * STEM, otherwise RAG. `route` is a pure function of the text and the rule
 * tables given at construction.
 */
export class RegexRouter {
  private readonly readingRules: readonly RouteRule[];
  private readonly stemRules: readonly RouteRule[];
  private readonly categories: ReadonlyArray<readonly [DocumentType, PhraseMatcher]>;

  public constructor(opts?: {
    readingRules?: readonly RouteRule[];
    stemRules?: readonly RouteRule[];
    categoryKeywords?: ReadonlyArray<readonly [DocumentType, readonly string[]]>;
  }) {
    this.readingRules = opts?.readingRules ?? READING_RULES;
    this.stemRules = opts?.stemRules ?? STEM_RULES;
    this.categories = (opts?.categoryKeywords ?? CATEGORY_KEYWORDS).map(
      ([type, words]) => [type, new PhraseMatcher(words)] as const,
    );
  }

  public route(queryText: string): RouteDecision {
    if (queryText.trim().length === 0) {
      return { mode: "RAG", extractedEntities: [] };
    }
    const normalized = normalizeText(queryText);

    const reading = RegexRouter.firstMatch(normalized, this.readingRules);
    if (reading) return { mode: "READING", matchedPattern: reading, extractedEntities: [] };

    const stem = RegexRouter.firstMatch(normalized, this.stemRules);
    if (stem) return { mode: "STEM", matchedPattern: stem, extractedEntities: [] };

    const decision: {
      mode: "RAG";
      extractedEntities: string[];
      extractedYear?: number;
      categoryHint?: DocumentType;
    } = { mode: "RAG", extractedEntities: extractEntities(queryText) };
    const year = extractYear(queryText);
    if (year !== undefined) decision.extractedYear = year;
    const category = this.categoryHint(queryText);
    if (category) decision.categoryHint = category;
    return decision;
  }

  private categoryHint(text: string): DocumentType | undefined {
    for (const [type, matcher] of this.categories) {
      if (matcher.firstMatch(text) !== undefined) return type;
    }
    return undefined;
  }

  private static firstMatch(text: string, rules: readonly RouteRule[]): string | undefined {
    return rules.find((r) => r.pattern.test(text))?.name;
  }
}
