/**
 * Provider settings, one variant per backend. Chosen once at startup from
 * configuration; nothing dispatches on provider strings per call.
 */
export type ProviderSettings =
  | {
      kind: "ollama";
      baseUrl: string;
      model: string;
      apiKey?: string;
    }
  | {
      kind: "azure";
      /** Resource endpoint, e.g. https://my-resource.openai.azure.com */
      baseUrl: string;
      /** Deployment name. */
      model: string;
      apiKey: string;
      apiVersion: string;
    }
  | {
      kind: "vnpt";
      baseUrl: string;
      /** e.g. vnptai_hackathon_small; the endpoint path is derived from it. */
      model: string;
      apiKey: string;
      tokenId: string;
      tokenKey: string;
    };

export type ProviderKind = ProviderSettings["kind"];

export const PROVIDER_KINDS: readonly ProviderKind[] = ["ollama", "azure", "vnpt"];

/** Sampling knobs for answer synthesis; a multiple-choice letter needs few tokens. */
export interface CompletionParams {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_COMPLETION_PARAMS: CompletionParams = { temperature: 0.3, maxTokens: 256 };
