import { APP_VERSION } from "./config";

/** Loaded artifact sizes. */
export interface ArtifactStatus {
  /** Chunks in the knowledge store. */
  chunks: number;
  /** Vector dimensionality of the knowledge store. */
  dimension: number;
  /** Rows of the unsafe-intent matrix. */
  safetyVectors: number;
}

/**
 * Monotonic, non-negative query counters. A query counts as degraded when
 * any dependency failed or its deadline fired while it ran.
 */
export interface QueryCounters {
  processed: number;
  degraded: number;
  unsafe: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle, loaded artifacts and query
 * counters. Exposed read-only via `statusManager.getStatus()` and served by
 * the HTTP `/health` route.
 *
 * ready = true only after the knowledge store and safety matrix are loaded.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Provider kind and model of the LLM, e.g. "ollama:qwen2.5". */
  llm: string;
  /** Provider kind and model of the embedding service. */
  embedding: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  artifacts: ArtifactStatus;
  queries: QueryCounters;
}

export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      llm: initial?.llm ?? "",
      embedding: initial?.embedding ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      artifacts: initial?.artifacts ?? { chunks: 0, dimension: 0, safetyVectors: 0 },
      queries: initial?.queries ?? { processed: 0, degraded: 0, unsafe: 0 },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setProviders(llm: string, embedding: string) {
    this.data.llm = llm;
    this.data.embedding = embedding;
  }

  public setArtifacts(artifacts: ArtifactStatus) {
    this.data.artifacts = { ...artifacts };
  }

  /** Count one finished query. */
  public recordQuery(outcome: { degraded: boolean; unsafe: boolean }) {
    this.data.queries.processed += 1;
    if (outcome.degraded) this.data.queries.degraded += 1;
    if (outcome.unsafe) this.data.queries.unsafe += 1;
  }

  /** Artifacts loaded; tools may now serve queries. */
  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (startup, transports, health checks).
export const statusManager = new StatusManager();
