import type { Schema } from '@google/generative-ai';

export interface ImagePart {
  data: Buffer;
  mimeType: string;
}

export interface ModelRequest {
  /** Stage or task label, used for tracing and by test doubles. */
  purpose: string;
  prompt: string;
  systemInstruction?: string;
  image?: ImagePart;
  /** Asks the provider for JSON matching this shape. */
  responseSchema?: Schema;
}

export interface ModelUsage {
  promptTokens: number;
  outputTokens: number;
}

export type TransientReason = 'timeout' | 'rate_limited' | 'transport' | 'server_error' | 'empty_output';
export type PolicyReason = 'content_blocked' | 'schema_rejected' | 'invalid_request';

export type ProviderOutcome =
  | { kind: 'success'; text: string; usage?: ModelUsage }
  | { kind: 'transient'; reason: TransientReason; message: string }
  | { kind: 'policy'; reason: PolicyReason; message: string };

export interface ProviderCallOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

export interface ModelProvider {
  readonly name: string;
  complete(modelId: string, request: ModelRequest, options: ProviderCallOptions): Promise<ProviderOutcome>;
  ping(modelId: string, options: ProviderCallOptions): Promise<void>;
}
