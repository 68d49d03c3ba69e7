import { parseAnswerIndex } from "./answer";
import { deadlineSignal, Semaphore } from "./async";
import { MalformedInputError } from "./errors";
import { LLMClient } from "./llm";
import { logVerbose, logWarning } from "./logger";
import { buildPlainPrompt, buildRagPrompt, buildReadingPrompt, buildStemPrompt } from "./prompts";
import { HybridSearchEngine } from "./rag/hybrid-search";
import { RegexRouter } from "./router/regex-router";
import { SafetyGuard } from "./safety/guard";
import { RefusalMethod, SafetySelector } from "./safety/selector";
import { StatusManager } from "./status";
import { optionLetter, Question, RouteDecision, RouteMode, SafetyVerdict, ScoredChunk } from "./types";

export interface QueryOutcome {
  verdict: SafetyVerdict;
  /** Absent when the safety guard stopped the query. */
  route?: RouteDecision;
  /** Retrieved context; empty outside RAG mode. */
  chunks: ScoredChunk[];
  /** Some dependency failed, or the deadline fired, while the query ran. */
  degraded: boolean;
}

export type AnswerMode = "SAFETY" | RouteMode;

export interface AnswerOutcome {
  questionId: string;
  /** 0-based option index. */
  optionIndex: number;
  letter: string;
  mode: AnswerMode;
  /** How the option was chosen; `default` means option A as fallback. */
  method: RefusalMethod;
  degraded: boolean;
  query: QueryOutcome;
}

export interface BatchItem {
  question: Question;
  targetYear?: number;
}

export interface QueryProcessorDeps {
  guard: SafetyGuard;
  router: RegexRouter;
  search: HybridSearchEngine;
  selector: SafetySelector;
  llm: LLMClient;
  status?: StatusManager;
}

export interface QueryProcessorSettings {
  /** Budget for a whole query, safety check to parsed answer. 0 disables it. */
  queryDeadlineMs: number;
  llmTimeoutMs: number;
  maxConcurrentQueries: number;
}

export const DEFAULT_PROCESSOR_SETTINGS: QueryProcessorSettings = {
  queryDeadlineMs: 120_000,
  llmTimeoutMs: 60_000,
  maxConcurrentQueries: 4,
};

/**
 * Per-query pipeline: safety guard, then router, then (RAG mode) hybrid
 * search; `answer` continues with prompt dispatch and letter parsing.
 * Holds no per-query state, so one instance serves concurrent queries.
 */
export class QueryProcessor {
  private readonly settings: QueryProcessorSettings;
  private readonly semaphore: Semaphore;

  public constructor(
    private readonly deps: QueryProcessorDeps,
    settings: Partial<QueryProcessorSettings> = {},
  ) {
    this.settings = { ...DEFAULT_PROCESSOR_SETTINGS, ...settings };
    this.semaphore = new Semaphore(this.settings.maxConcurrentQueries);
  }

  /**
   * Screen, route and (for RAG) retrieve. An explicit `targetYear`
   * overrides the year found in the question text. Waits for a free slot
   * when `maxConcurrentQueries` queries are already running.
   */
  public async processQuery(
    question: Question,
    targetYear?: number,
    signal?: AbortSignal,
  ): Promise<QueryOutcome> {
    return this.semaphore.run(async () => {
      const deadline = deadlineSignal(this.settings.queryDeadlineMs, signal);
      try {
        return await this.runQuery(question, targetYear, deadline.signal);
      } finally {
        deadline.dispose();
      }
    });
  }

  /**
   * Full question answering; never throws for a dependency failure. Shares
   * the concurrency bound with {@link processQuery}; the deadline starts
   * once the query holds a slot.
   */
  public async answer(question: Question, targetYear?: number, signal?: AbortSignal): Promise<AnswerOutcome> {
    return this.semaphore.run(async () => {
      const deadline = deadlineSignal(this.settings.queryDeadlineMs, signal);
      try {
        const outcome = await this.runAnswer(question, targetYear, deadline.signal);
        this.deps.status?.recordQuery({
          degraded: outcome.degraded,
          unsafe: outcome.query.verdict.isUnsafe,
        });
        return outcome;
      } finally {
        deadline.dispose();
      }
    });
  }

  /** Answer many questions; at most `maxConcurrentQueries` run at once and results keep input order. */
  public async processBatch(items: readonly BatchItem[], signal?: AbortSignal): Promise<AnswerOutcome[]> {
    return Promise.all(items.map((item) => this.answer(item.question, item.targetYear, signal)));
  }

  private async runQuery(question: Question, targetYear: number | undefined, signal: AbortSignal): Promise<QueryOutcome> {
    if (question.text.trim().length === 0) {
      logWarning("Empty question text", { error: new MalformedInputError(`question ${question.id}`).toJSON() });
    }

    const verdict = await this.deps.guard.check(question.text, signal);
    if (verdict.isUnsafe) {
      logVerbose("Query blocked by safety guard", {
        id: question.id,
        similarity: verdict.similarity,
        keyword: verdict.matchedKeyword,
      });
      return { verdict, chunks: [], degraded: verdict.degraded };
    }

    const route = this.deps.router.route(question.text);
    logVerbose("Routed", { id: question.id, mode: route.mode, pattern: route.matchedPattern });
    if (route.mode !== "RAG") {
      return { verdict, route, chunks: [], degraded: verdict.degraded };
    }

    const search = await this.deps.search.run(question.text, {
      targetYear: targetYear ?? route.extractedYear,
      entities: route.extractedEntities,
      categories: route.categoryHint ? [route.categoryHint] : undefined,
      signal,
    });
    return {
      verdict,
      route,
      chunks: search.results,
      degraded: verdict.degraded || search.degraded || search.cancelled,
    };
  }

  private async runAnswer(
    question: Question,
    targetYear: number | undefined,
    signal: AbortSignal,
  ): Promise<AnswerOutcome> {
    const query = await this.runQuery(question, targetYear, signal);
    const base = { questionId: question.id, query };

    if (!query.route) {
      const refusal = await this.deps.selector.selectRefusalOption(question, signal);
      return {
        ...base,
        optionIndex: refusal.index,
        letter: optionLetter(refusal.index),
        mode: "SAFETY",
        method: refusal.method,
        degraded: query.degraded || refusal.degraded,
      };
    }

    const mode = query.route.mode;
    if (question.options.length === 0) {
      logWarning("Question has no options", { id: question.id });
      return { ...base, optionIndex: 0, letter: optionLetter(0), mode, method: "default", degraded: true };
    }

    const prompt = QueryProcessor.buildPrompt(mode, question, query.chunks);
    const res = await this.deps.llm.complete(prompt, { timeoutMs: this.settings.llmTimeoutMs, signal });
    const index = res.ok ? parseAnswerIndex(res.value, question.options.length) : undefined;
    if (index === undefined) {
      logWarning("No usable answer from the model, defaulting to option A", {
        id: question.id,
        error: res.ok ? "unparseable output" : res.error.message,
      });
      return { ...base, optionIndex: 0, letter: optionLetter(0), mode, method: "default", degraded: true };
    }
    return {
      ...base,
      optionIndex: index,
      letter: optionLetter(index),
      mode,
      method: "llm",
      degraded: query.degraded,
    };
  }

  private static buildPrompt(mode: RouteMode, question: Question, chunks: readonly ScoredChunk[]): string {
    switch (mode) {
      case "READING":
        return buildReadingPrompt(question);
      case "STEM":
        return buildStemPrompt(question);
      case "RAG":
        return chunks.length > 0 ? buildRagPrompt(question, chunks) : buildPlainPrompt(question);
    }
  }
}
