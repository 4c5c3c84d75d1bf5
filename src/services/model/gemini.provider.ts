import {
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
  Part,
} from '@google/generative-ai';
import {
  ModelProvider,
  ModelRequest,
  ProviderCallOptions,
  ProviderOutcome,
} from './model.provider';

export interface GeminiProviderOptions {
  apiKey?: string;
  apiVersion?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class GeminiProvider implements ModelProvider {
  readonly name = 'gemini';
  private client: GoogleGenerativeAI;
  private apiVersion: string;
  private temperature: number;
  private maxOutputTokens: number;
  private models = new Map<string, GenerativeModel>();

  constructor(options: GeminiProviderOptions = {}) {
    const key = options.apiKey || process.env.GEMINI_API_KEY;
    if (!key) {
      throw new Error('Missing Gemini API key. Set GEMINI_API_KEY in .env.');
    }

    this.client = new GoogleGenerativeAI(key);
    this.apiVersion = options.apiVersion || 'v1beta';
    this.temperature = options.temperature ?? 0;
    this.maxOutputTokens = options.maxOutputTokens ?? 8192;
  }

  async complete(
    modelId: string,
    request: ModelRequest,
    options: ProviderCallOptions
  ): Promise<ProviderOutcome> {
    const parts: Part[] = [{ text: request.prompt }];
    if (request.image) {
      parts.push({
        inlineData: {
          data: request.image.data.toString('base64'),
          mimeType: request.image.mimeType,
        },
      });
    }

    try {
      const response = await this.model(modelId).generateContent(
        {
          contents: [{ role: 'user', parts }],
          systemInstruction: request.systemInstruction,
          generationConfig: {
            temperature: this.temperature,
            maxOutputTokens: this.maxOutputTokens,
            ...(request.responseSchema
              ? { responseMimeType: 'application/json', responseSchema: request.responseSchema }
              : {}),
          },
        },
        { timeout: options.timeoutMs, signal: options.signal }
      );

      const blockReason = response.response.promptFeedback?.blockReason;
      if (blockReason) {
        return { kind: 'policy', reason: 'content_blocked', message: `Prompt blocked: ${blockReason}` };
      }

      const content = response.response.text();
      if (!content.trim()) {
        return { kind: 'transient', reason: 'empty_output', message: 'LLM returned empty content.' };
      }

      const usage = response.response.usageMetadata;
      return {
        kind: 'success',
        text: content,
        usage: usage
          ? { promptTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount }
          : undefined,
      };
    } catch (error) {
      return this.classify(error, options.signal);
    }
  }

  async ping(modelId: string, options: ProviderCallOptions): Promise<void> {
    await this.model(modelId).countTokens('ping', {
      timeout: options.timeoutMs,
      signal: options.signal,
    });
  }

  private model(modelId: string): GenerativeModel {
    let model = this.models.get(modelId);
    if (!model) {
      model = this.client.getGenerativeModel({ model: modelId }, { apiVersion: this.apiVersion });
      this.models.set(modelId, model);
    }
    return model;
  }

  private classify(error: unknown, signal: AbortSignal): ProviderOutcome {
    const message = error instanceof Error ? error.message : 'Unknown LLM error.';

    if (signal.aborted) {
      return { kind: 'transient', reason: 'timeout', message };
    }
    if (error instanceof GoogleGenerativeAIResponseError) {
      return { kind: 'policy', reason: 'content_blocked', message };
    }
    if (error instanceof GoogleGenerativeAIRequestInputError) {
      return { kind: 'policy', reason: 'invalid_request', message };
    }
    if (error instanceof GoogleGenerativeAIFetchError) {
      const status = error.status ?? 0;
      if (status === 429) return { kind: 'transient', reason: 'rate_limited', message };
      if (status >= 500) return { kind: 'transient', reason: 'server_error', message };
      if (status === 400 && /schema/i.test(message)) {
        return { kind: 'policy', reason: 'schema_rejected', message };
      }
      if (status >= 400) return { kind: 'policy', reason: 'invalid_request', message };
    }
    return { kind: 'transient', reason: 'transport', message };
  }
}
