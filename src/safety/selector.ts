import { parseAnswerIndex } from "../answer";
import { LLMClient } from "../llm";
import { logWarning } from "../logger";
import { buildRefusalPrompt } from "../prompts";
import { PhraseMatcher } from "../text";
import { Question } from "../types";
import { NEGATION_LEAD_INS, REFUSAL_OPTION_PHRASES } from "./keywords";

export type RefusalMethod = "keyword" | "llm" | "default";

export interface RefusalSelection {
  /** 0-based option index. */
  index: number;
  method: RefusalMethod;
  degraded: boolean;
}

export interface SafetySelectorOptions {
  phrases?: readonly string[];
  /** A phrase directly after one of these does not count. */
  negations?: readonly string[];
  llmTimeoutMs?: number;
}

/**
 * Picks the option that refuses an unsafe request: first by refusal
 * phrases in the option texts (position order, negated occurrences such
 * as "không vi phạm" ignored), then by asking the LLM.
 * Never throws; anything unusable falls back to option 0.
 */
export class SafetySelector {
  private readonly phrases: PhraseMatcher;
  private readonly llmTimeoutMs?: number;

  public constructor(
    private readonly llm: LLMClient,
    options: SafetySelectorOptions = {},
  ) {
    this.phrases = new PhraseMatcher(
      options.phrases ?? REFUSAL_OPTION_PHRASES,
      options.negations ?? NEGATION_LEAD_INS,
    );
    this.llmTimeoutMs = options.llmTimeoutMs;
  }

  public async selectRefusalOption(question: Question, signal?: AbortSignal): Promise<RefusalSelection> {
    const count = question.options.length;
    if (count === 0) {
      logWarning("Unsafe question has no options", { id: question.id });
      return { index: 0, method: "default", degraded: true };
    }

    const byPhrase = question.options.findIndex((o) => this.phrases.firstMatch(o) !== undefined);
    if (byPhrase >= 0) return { index: byPhrase, method: "keyword", degraded: false };

    const res = await this.llm.complete(buildRefusalPrompt(question), {
      timeoutMs: this.llmTimeoutMs,
      signal,
    });
    if (!res.ok) {
      logWarning("Refusal selection fell back to option A", {
        id: question.id,
        error: res.error.message,
      });
      return { index: 0, method: "default", degraded: true };
    }
    const index = parseAnswerIndex(res.value, count);
    if (index === undefined) {
      logWarning("Could not parse refusal option from model output", {
        id: question.id,
        output: res.value.slice(0, 200),
      });
      return { index: 0, method: "default", degraded: true };
    }
    return { index, method: "llm", degraded: false };
  }
}
