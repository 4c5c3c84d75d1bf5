import { applyUpdate, createRecord } from '../../pipeline/prescription.record';
import { KnowledgeEntry, KnowledgeStore } from '../../services/knowledge/knowledge.store';
import { ModelGateway, ModelGatewayOptions } from '../../services/model/model.gateway';
import {
  ModelProvider,
  ModelRequest,
  ProviderCallOptions,
  ProviderOutcome,
  TransientReason,
} from '../../services/model/model.provider';
import { MemoryTraceSink, Tracer } from '../../services/trace.service';
import { RunOptions, StageContext } from '../../stages/stage';
import { PrescriptionRecord, RawExtraction, SourceImage } from '../../types/PrescriptionTypes';
import { Logger } from '../../utils/logger';

export type ScriptStep =
  | ProviderOutcome
  | ((modelId: string, request: ModelRequest) => ProviderOutcome | Promise<ProviderOutcome>);

/**
 * Provider double driven by per-purpose scripts. Queued steps are consumed
 * one per call; once a queue is empty the purpose's default step answers.
 */
export class ScriptedModelProvider implements ModelProvider {
  readonly name = 'scripted';
  readonly calls: { modelId: string; purpose: string }[] = [];
  readonly unreachable = new Set<string>();
  private readonly queues = new Map<string, ScriptStep[]>();
  private readonly defaults = new Map<string, ScriptStep>();

  script(purpose: string, ...steps: ScriptStep[]): this {
    this.queues.set(purpose, [...(this.queues.get(purpose) ?? []), ...steps]);
    return this;
  }

  always(purpose: string, step: ScriptStep): this {
    this.defaults.set(purpose, step);
    return this;
  }

  async complete(modelId: string, request: ModelRequest, _options: ProviderCallOptions): Promise<ProviderOutcome> {
    this.calls.push({ modelId, purpose: request.purpose });
    const step = this.queues.get(request.purpose)?.shift() ?? this.defaults.get(request.purpose);
    if (!step) {
      return { kind: 'transient', reason: 'server_error', message: `no script for ${request.purpose}` };
    }
    return typeof step === 'function' ? step(modelId, request) : step;
  }

  async ping(modelId: string): Promise<void> {
    if (this.unreachable.has(modelId)) {
      throw new Error(`${modelId} unreachable`);
    }
  }
}

export const answer = (value: unknown): ProviderOutcome => ({ kind: 'success', text: JSON.stringify(value) });

export const transient = (reason: TransientReason = 'server_error'): ProviderOutcome => ({
  kind: 'transient',
  reason,
  message: 'simulated failure',
});

export const refused = (): ProviderOutcome => ({
  kind: 'policy',
  reason: 'content_blocked',
  message: 'simulated refusal',
});

/** Never settles; only an abort gets the caller out. */
export const hang = (): Promise<ProviderOutcome> => new Promise<ProviderOutcome>(() => undefined);

export class UnreachableKnowledgeStore implements KnowledgeStore {
  lookups = 0;

  async lookup(): Promise<KnowledgeEntry[]> {
    this.lookups++;
    throw new Error('connection refused');
  }

  async search(): Promise<KnowledgeEntry[]> {
    throw new Error('connection refused');
  }

  async ping(): Promise<void> {
    throw new Error('connection refused');
  }
}

export const TEST_VOCABULARY: KnowledgeEntry[] = [
  {
    code: 'RX-0001',
    canonicalName: 'amoxicillin',
    synonyms: ['amoxycillin'],
    brandNames: ['Amoxil'],
    ingredients: ['amoxicillin'],
  },
  {
    code: 'RX-0003',
    canonicalName: 'cephalexin',
    synonyms: ['cefalexin'],
    brandNames: ['Keflex'],
    ingredients: ['cephalexin'],
  },
  {
    code: 'RX-0007',
    canonicalName: 'metformin',
    synonyms: ['metformin hydrochloride'],
    brandNames: ['Glucophage'],
    ingredients: ['metformin'],
  },
  {
    code: 'RX-0014',
    canonicalName: 'atorvastatin',
    synonyms: [],
    brandNames: ['Lipitor'],
    ingredients: ['atorvastatin'],
  },
  {
    code: 'RX-0017',
    canonicalName: 'ibuprofen',
    synonyms: [],
    brandNames: ['Advil'],
    ingredients: ['ibuprofen'],
  },
];

export const TEST_ALIASES = [
  'brand,generic,confidence',
  'Keflex,cephalexin,0.9',
  'Lipitor,atorvastatin,0.94',
  'Advil,ibuprofen,',
].join('\n');

export const GATEWAY_OPTIONS: ModelGatewayOptions = {
  models: ['model-a', 'model-b', 'model-c'],
  timeoutMs: 1000,
  retryBudget: 2,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
};

export const testImage = (): SourceImage => ({
  data: Buffer.from('not-really-a-png'),
  mimeType: 'image/png',
  originalName: 'rx-scan.png',
});

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/** Lets fire-and-forget trace deliveries land. */
export const flushTraces = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/** Scripted provider, gateway and context for running one stage directly. */
export const stageHarness = (options: RunOptions = {}, signal: AbortSignal = new AbortController().signal) => {
  const provider = new ScriptedModelProvider();
  const sink = new MemoryTraceSink();
  const tracer = new Tracer([sink], silentLogger);
  const gateway = new ModelGateway(provider, GATEWAY_OPTIONS, tracer, silentLogger);
  const context: StageContext = { recordId: 'rec-1', signal, tracer, options };
  return { provider, sink, gateway, context };
};

/** Fresh record whose image has already been transcribed. */
export const extractedRecord = (extraction: Partial<RawExtraction> = {}): PrescriptionRecord => {
  const record = createRecord(testImage());
  applyUpdate(record, 'image_extraction', {
    raw_extraction: {
      text: 'Jane Roe DOB 1980-06-16\nKeflex 500mg BID\nDr. Alan Smith',
      patient_section: 'Jane Roe DOB 1980-06-16',
      prescriber_section: 'Dr. Alan Smith',
      medication_lines: ['Keflex 500mg BID'],
      date_written: null,
      legible: true,
      confidence: 0.9,
      ocr_hint: null,
      ...extraction,
    },
  });
  return record;
};
