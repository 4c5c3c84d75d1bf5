import { z } from 'zod';
import type { Schema } from '@google/generative-ai';
import {
  ModelUnavailableError,
  SchemaValidationError,
  errorMessage,
} from '../../errors/PipelineErrors';
import { AttemptOutcome, ModelAttempt, StageId } from '../../types/PrescriptionTypes';
import { backoffDelay, raceAbort, sleep, timeoutScope } from '../../utils/async';
import { createLogger, Logger } from '../../utils/logger';
import { err, ok, Result } from '../../utils/result';
import { Tracer } from '../trace.service';
import { ModelProvider, ModelRequest, ModelUsage, ProviderOutcome } from './model.provider';

export interface OutputSchema<T> {
  name: string;
  validator: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Provider-side response shape, sent along with the request. */
  responseSchema?: Schema;
}

export interface ModelOutput<T> {
  value: T;
  raw: string;
  modelId: string;
  attempts: ModelAttempt[];
  usage?: ModelUsage;
}

export interface GatewayCallContext {
  recordId: string;
  stage: StageId;
  signal: AbortSignal;
}

export interface ModelGatewayOptions {
  /** Tried strictly in order: primary, secondary, fallback. */
  models: string[];
  timeoutMs: number;
  /** Retries per model after the first attempt. */
  retryBudget: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: SchemaValidationError };

/** Longest model output kept on a schema_invalid attempt. */
export const RAW_OUTPUT_LIMIT = 2000;

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export const parseJsonOutput = <T>(raw: string, schema: OutputSchema<T>): Parsed<T> => {
  const trimmed = raw.trim();
  const body = FENCE_PATTERN.exec(trimmed)?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return {
      ok: false,
      error: new SchemaValidationError(`${schema.name}: output is not JSON (${errorMessage(error)})`, raw),
    };
  }

  const result = schema.validator.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: new SchemaValidationError(`${schema.name}: ${issues}`, raw) };
  }
  return { ok: true, value: result.data };
};

export class ModelGateway {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ModelProvider,
    private readonly options: ModelGatewayOptions,
    private readonly tracer: Tracer,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('model-gateway');
  }

  get modelIds(): readonly string[] {
    return this.options.models;
  }

  complete(
    request: ModelRequest,
    context: GatewayCallContext
  ): Promise<Result<ModelOutput<string>, ModelUnavailableError>> {
    return this.run<string>(request, context, (raw) => ({ ok: true, value: raw }));
  }

  completeStructured<T>(
    request: ModelRequest,
    schema: OutputSchema<T>,
    context: GatewayCallContext
  ): Promise<Result<ModelOutput<T>, ModelUnavailableError>> {
    const withSchema: ModelRequest = { ...request, responseSchema: request.responseSchema ?? schema.responseSchema };
    return this.run<T>(withSchema, context, (raw) => parseJsonOutput(raw, schema));
  }

  /** Resolves with the first model that answers a ping, or rejects with the last failure. */
  async ping(signal?: AbortSignal): Promise<string> {
    let lastError: unknown = new Error('No models configured.');
    for (const modelId of this.options.models) {
      const scope = timeoutScope(this.options.timeoutMs, signal);
      try {
        await raceAbort(
          this.provider.ping(modelId, { timeoutMs: this.options.timeoutMs, signal: scope.signal }),
          scope.signal
        );
        return modelId;
      } catch (error) {
        lastError = error;
      } finally {
        scope.dispose();
      }
    }
    throw lastError;
  }

  private async run<T>(
    request: ModelRequest,
    context: GatewayCallContext,
    parse: (raw: string) => Parsed<T>
  ): Promise<Result<ModelOutput<T>, ModelUnavailableError>> {
    const attempts: ModelAttempt[] = [];
    const { retryBudget, retryBaseDelayMs, retryMaxDelayMs } = this.options;

    for (const modelId of this.options.models) {
      for (let retry = 0; retry <= retryBudget; retry++) {
        context.signal.throwIfAborted();

        const started = Date.now();
        const outcome = await this.call(modelId, request, context.signal);
        context.signal.throwIfAborted();

        let attemptOutcome: AttemptOutcome = outcome.kind;
        let reason: string | undefined;
        let rawOutput: string | undefined;
        let parsed: Parsed<T> | undefined;

        if (outcome.kind === 'success') {
          parsed = parse(outcome.text);
          if (!parsed.ok) {
            attemptOutcome = 'schema_invalid';
            reason = parsed.error.message;
            rawOutput = parsed.error.rawOutput.slice(0, RAW_OUTPUT_LIMIT);
            this.logger.warn('Model output failed validation', { stage: context.stage, modelId, reason });
          }
        } else {
          reason = `${outcome.reason}: ${outcome.message}`;
        }

        const attempt: ModelAttempt = {
          model_id: modelId,
          attempt: retry + 1,
          outcome: attemptOutcome,
          latency_ms: Date.now() - started,
          ...(reason ? { reason } : {}),
          ...(rawOutput !== undefined ? { raw_output: rawOutput } : {}),
        };
        attempts.push(attempt);
        this.tracer.emit({
          kind: 'model_call',
          recordId: context.recordId,
          stage: context.stage,
          modelId,
          attempt: attempts.length,
          retryCount: retry,
          latencyMs: attempt.latency_ms,
          outcome: attemptOutcome,
          reason,
          rawOutput,
        });

        if (outcome.kind === 'success' && parsed && parsed.ok) {
          return ok({
            value: parsed.value,
            raw: outcome.text,
            modelId,
            attempts,
            usage: outcome.usage,
          });
        }

        if (outcome.kind === 'policy') {
          this.logger.warn('Model refused request, moving to next model', {
            stage: context.stage,
            modelId,
            reason,
          });
          break;
        }

        if (retry < retryBudget) {
          const delay = backoffDelay(retry, retryBaseDelayMs, retryMaxDelayMs);
          this.logger.warn('Transient model failure, retrying', {
            stage: context.stage,
            modelId,
            retry: retry + 1,
            delayMs: delay,
            reason,
          });
          await sleep(delay, context.signal);
        }
      }
    }

    this.logger.error('All models exhausted', { stage: context.stage, attempts: attempts.length });
    return err(new ModelUnavailableError(attempts));
  }

  private async call(modelId: string, request: ModelRequest, parent: AbortSignal): Promise<ProviderOutcome> {
    const { timeoutMs } = this.options;
    const scope = timeoutScope(timeoutMs, parent);
    try {
      return await raceAbort(
        this.provider.complete(modelId, request, { timeoutMs, signal: scope.signal }),
        scope.signal
      );
    } catch (error) {
      parent.throwIfAborted();
      if (scope.timedOut()) {
        return { kind: 'transient', reason: 'timeout', message: `No response within ${timeoutMs}ms.` };
      }
      return { kind: 'transient', reason: 'transport', message: errorMessage(error) };
    } finally {
      scope.dispose();
    }
  }
}
