import { TransientDependencyError } from "./errors";
import { Result } from "./result";
import { CallOptions } from "./types";

/**
 * Completion service used for answer synthesis and for the safety
 * selector's fallback. The prompt text is opaque to this interface.
 */
export interface LLMClient {
  readonly modelName: string;
  complete(prompt: string, options?: CallOptions): Promise<Result<string, TransientDependencyError>>;
}
