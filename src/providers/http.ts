import { z } from "zod";
import { AbortedError, sleep, TimeoutError, withDeadline } from "../async";
import { DependencyName, TransientDependencyError } from "../errors";
import { logWarning } from "../logger";
import { Err, Ok, Result } from "../result";
import { CallOptions } from "../types";

/** Subset of the global fetch used by providers (injectable for tests). */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Retry schedule for transient upstream failures (network errors, 429 and
 * 5xx). Attempt n waits `baseDelayMs * backoffFactor^(n-1)`, capped at
 * `maxDelayMs`, with +/-20% jitter when `jitter` is set.
 */
export interface RetryConfig {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
  backoffFactor: 2,
  jitter: true,
};

export const NO_RETRY: RetryConfig = { ...DEFAULT_RETRY_CONFIG, maxAttempts: 1 };

export interface PostJsonParams<T> {
  dependency: DependencyName;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  schema: z.ZodType<T>;
  fetchImpl: FetchLike;
  options?: CallOptions;
  retry?: RetryConfig;
}

const MAX_ERROR_BODY = 300;

type Attempt<T> = Result<T, TransientDependencyError>;

function isRetryable(error: TransientDependencyError): boolean {
  if (error.reason === "network") return true;
  return error.reason === "http" && error.status !== undefined && (error.status === 429 || error.status >= 500);
}

export function retryDelay(config: RetryConfig, attempt: number): number {
  const delay = Math.min(config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1), config.maxDelayMs);
  return config.jitter ? delay * (0.8 + Math.random() * 0.4) : delay;
}

/** One request, body read and validation included. */
async function attemptPost<T>(params: PostJsonParams<T>, signal: AbortSignal): Promise<Attempt<T>> {
  const { dependency, url, headers, body, schema, fetchImpl } = params;
  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return Err(new TransientDependencyError(dependency, "network", message, { cause: e }));
  }

  if (!res.ok) {
    const detail = await res.text().catch(() => "");
    return Err(
      new TransientDependencyError(
        dependency,
        "http",
        `HTTP ${res.status}${detail ? `: ${detail.slice(0, MAX_ERROR_BODY)}` : ""}`,
        { status: res.status },
      ),
    );
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch (e) {
    return Err(new TransientDependencyError(dependency, "bad_response", "invalid JSON body", { cause: e }));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return Err(
      new TransientDependencyError(dependency, "bad_response", parsed.error.issues[0]?.message ?? "unexpected payload"),
    );
  }
  return Ok(parsed.data);
}

async function attemptWithRetry<T>(params: PostJsonParams<T>, signal: AbortSignal): Promise<Attempt<T>> {
  const retry = params.retry ?? DEFAULT_RETRY_CONFIG;
  const maxAttempts = Math.max(1, Math.floor(retry.maxAttempts));
  let result = await attemptPost(params, signal);
  for (let attempt = 1; attempt < maxAttempts; attempt++) {
    if (result.ok || !isRetryable(result.error) || signal.aborted) return result;
    const delay = retryDelay(retry, attempt);
    logWarning(`${params.dependency} attempt ${attempt}/${maxAttempts} failed, retrying`, {
      error: result.error.message,
      delayMs: Math.round(delay),
    });
    await sleep(delay, signal);
    result = await attemptPost(params, signal);
  }
  return result;
}

/**
 * POST a JSON body and validate the JSON reply, retrying transient
 * failures. The timeout and the caller's signal bound the whole exchange:
 * every attempt, the backoff sleeps between them and the body reads. Every
 * failure mode comes back as a TransientDependencyError.
 */
export async function postJson<T>(
  params: PostJsonParams<T>,
): Promise<Result<T, TransientDependencyError>> {
  const { dependency, url, options } = params;
  try {
    return await withDeadline((signal) => attemptWithRetry(params, signal), {
      timeoutMs: options?.timeoutMs,
      signal: options?.signal,
      context: `POST ${url}`,
    });
  } catch (e) {
    if (e instanceof TimeoutError) {
      return Err(new TransientDependencyError(dependency, "timeout", e.message, { cause: e }));
    }
    if (e instanceof AbortedError) {
      return Err(new TransientDependencyError(dependency, "aborted", e.message, { cause: e }));
    }
    const message = e instanceof Error ? e.message : String(e);
    return Err(new TransientDependencyError(dependency, "network", message, { cause: e }));
  }
}

/** `{ data: [{ embedding: number[] }] }`, shared by OpenAI-style embedding endpoints. */
export const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

/** `{ choices: [{ message: { content } }] }`, shared by OpenAI-style chat endpoints. */
export const ChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
