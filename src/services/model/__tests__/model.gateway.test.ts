import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ModelUnavailableError, PipelineTimeoutError } from '../../../errors/PipelineErrors';
import {
  answer,
  flushTraces,
  GATEWAY_OPTIONS,
  hang,
  refused,
  ScriptedModelProvider,
  silentLogger,
  transient,
} from '../../../__tests__/support/fakes';
import { MemoryTraceSink, Tracer } from '../../trace.service';
import { GatewayCallContext, ModelGateway, ModelGatewayOptions, OutputSchema, parseJsonOutput, RAW_OUTPUT_LIMIT } from '../model.gateway';

const doseSchema: OutputSchema<{ dose: string }> = {
  name: 'dose',
  validator: z.object({ dose: z.string() }),
};

const setup = (options: Partial<ModelGatewayOptions> = {}) => {
  const provider = new ScriptedModelProvider();
  const sink = new MemoryTraceSink();
  const gateway = new ModelGateway(
    provider,
    { ...GATEWAY_OPTIONS, ...options },
    new Tracer([sink], silentLogger),
    silentLogger
  );
  return { provider, sink, gateway };
};

const context = (signal: AbortSignal = new AbortController().signal): GatewayCallContext => ({
  recordId: 'rec-1',
  stage: 'patient_info',
  signal,
});

const request = { purpose: 'dose', prompt: 'Read the dose.' };

describe('ModelGateway', () => {
  it('returns the first valid answer from the primary model', async () => {
    const { provider, gateway } = setup();
    provider.script('dose', answer({ dose: '500mg' }));

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.value).toEqual({ dose: '500mg' });
    expect(result.value.modelId).toBe('model-a');
    expect(result.value.attempts).toEqual([
      { model_id: 'model-a', attempt: 1, outcome: 'success', latency_ms: expect.any(Number) },
    ]);
  });

  it('retries transient failures on the same model before falling back', async () => {
    const { provider, gateway } = setup();
    provider.script('dose', transient('rate_limited'), transient('timeout'), answer({ dose: '250mg' }));

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.attempts.map((a) => [a.model_id, a.attempt, a.outcome])).toEqual([
      ['model-a', 1, 'transient'],
      ['model-a', 2, 'transient'],
      ['model-a', 3, 'success'],
    ]);
    expect(result.value.attempts[0].reason).toBe('rate_limited: simulated failure');
  });

  it('moves to the next model once the retry budget is spent', async () => {
    const { provider, gateway } = setup({ retryBudget: 1 });
    provider.always('dose', (modelId) => (modelId === 'model-c' ? answer({ dose: '1 tab' }) : transient()));

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.modelId).toBe('model-c');
    expect(provider.calls.map((c) => c.modelId)).toEqual(['model-a', 'model-a', 'model-b', 'model-b', 'model-c']);
  });

  it('skips the remaining retries of a model that refuses', async () => {
    const { provider, gateway } = setup();
    provider.script('dose', refused(), answer({ dose: '10ml' }));

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.attempts.map((a) => [a.model_id, a.outcome])).toEqual([
      ['model-a', 'policy'],
      ['model-b', 'success'],
    ]);
  });

  it('treats output that fails the schema as retryable', async () => {
    const { provider, gateway } = setup();
    provider.script(
      'dose',
      { kind: 'success', text: 'the dose is 500mg' },
      answer({ amount: 500 }),
      { kind: 'success', text: '```json\n{"dose":"500mg"}\n```' }
    );

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.attempts.map((a) => a.outcome)).toEqual(['schema_invalid', 'schema_invalid', 'success']);
    expect(result.value.attempts[1].reason).toBe('dose: dose: Required');
    expect(result.value.attempts.map((a) => a.raw_output)).toEqual([
      'the dose is 500mg',
      '{"amount":500}',
      undefined,
    ]);
    expect(result.value.value).toEqual({ dose: '500mg' });
  });

  it('keeps a truncated copy of invalid output on the attempt and its trace', async () => {
    const { provider, sink, gateway } = setup({ models: ['model-a'], retryBudget: 0 });
    const rambling = 'x'.repeat(RAW_OUTPUT_LIMIT + 100);
    provider.script('dose', { kind: 'success', text: rambling });

    const result = await gateway.completeStructured(request, doseSchema, context());
    await flushTraces();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.attempts[0].raw_output).toBe('x'.repeat(RAW_OUTPUT_LIMIT));
    expect(sink.ofKind('model_call')[0].rawOutput).toBe('x'.repeat(RAW_OUTPUT_LIMIT));
  });

  it('reports every attempt when all models are exhausted', async () => {
    const { provider, gateway } = setup();
    provider.always('dose', transient());

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ModelUnavailableError);
    expect(result.error.code).toBe('MODEL_UNAVAILABLE');
    expect(result.error.message).toBe('All configured models failed (model-a, model-b, model-c).');
    expect(result.error.attempts).toHaveLength(9);
  });

  it('turns a slow model into a transient timeout', async () => {
    const { provider, gateway } = setup({ models: ['model-a'], retryBudget: 0, timeoutMs: 20 });
    provider.always('dose', () => hang());

    const result = await gateway.completeStructured(request, doseSchema, context());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.attempts.map((a) => [a.outcome, a.reason])).toEqual([
      ['transient', 'timeout: No response within 20ms.'],
    ]);
  });

  it('stops when the caller aborts', async () => {
    const { provider, gateway } = setup();
    provider.always('dose', () => hang());
    const controller = new AbortController();

    const pending = gateway.completeStructured(request, doseSchema, context(controller.signal));
    controller.abort(new PipelineTimeoutError(5));

    await expect(pending).rejects.toBeInstanceOf(PipelineTimeoutError);
    expect(provider.calls).toHaveLength(1);
  });

  it('emits one trace event per attempt', async () => {
    const { provider, sink, gateway } = setup();
    provider.script('dose', transient(), refused(), answer({ dose: '5mg' }));

    await gateway.completeStructured(request, doseSchema, context());
    await flushTraces();

    expect(
      sink.ofKind('model_call').map((e) => [e.modelId, e.attempt, e.retryCount, e.outcome, e.stage, e.recordId])
    ).toEqual([
      ['model-a', 1, 0, 'transient', 'patient_info', 'rec-1'],
      ['model-a', 2, 1, 'policy', 'patient_info', 'rec-1'],
      ['model-b', 3, 0, 'success', 'patient_info', 'rec-1'],
    ]);
  });

  it('returns plain text from complete()', async () => {
    const { provider, gateway } = setup();
    provider.script('dose', { kind: 'success', text: 'Take one tablet twice daily.' });

    const result = await gateway.complete(request, context());

    expect(result.ok && result.value.value).toBe('Take one tablet twice daily.');
  });

  it('pings models in order until one answers', async () => {
    const { provider, gateway } = setup();
    provider.unreachable.add('model-a');

    await expect(gateway.ping()).resolves.toBe('model-b');

    provider.unreachable.add('model-b').add('model-c');
    await expect(gateway.ping()).rejects.toThrow('model-c unreachable');
  });
});

describe('parseJsonOutput', () => {
  it('reports non-JSON output with the raw text attached', () => {
    const parsed = parseJsonOutput('not json', doseSchema);

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.code).toBe('SCHEMA_VALIDATION_FAILED');
    expect(parsed.error.rawOutput).toBe('not json');
    expect(parsed.error.message.startsWith('dose: output is not JSON')).toBe(true);
  });
});
