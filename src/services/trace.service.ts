import {
  AttemptOutcome,
  RecordStatus,
  StageId,
  StageStatus,
} from '../types/PrescriptionTypes';
import { createLogger, Logger } from '../utils/logger';

export interface ModelCallEvent {
  kind: 'model_call';
  recordId: string;
  stage: StageId;
  modelId: string;
  attempt: number;
  retryCount: number;
  latencyMs: number;
  outcome: AttemptOutcome;
  reason?: string;
  rawOutput?: string;
}

export interface KnowledgeLookupEvent {
  kind: 'knowledge_lookup';
  recordId: string;
  stage: StageId;
  query: string;
  matchCount: number;
  /** Alias or fuzzy search was needed. */
  extendedSearch: boolean;
  degraded: boolean;
}

export interface StageEvent {
  kind: 'stage';
  recordId: string;
  stage: StageId;
  status: StageStatus;
  latencyMs: number;
  modelId: string | null;
}

export interface PipelineEvent {
  kind: 'pipeline';
  recordId: string;
  from: RecordStatus;
  to: RecordStatus;
}

export type TraceEvent = ModelCallEvent | KnowledgeLookupEvent | StageEvent | PipelineEvent;

export interface TraceSink {
  record(event: TraceEvent): void | Promise<void>;
}

export class LoggerTraceSink implements TraceSink {
  constructor(private readonly logger: Logger = createLogger('trace')) {}

  record(event: TraceEvent): void {
    this.logger.debug(event.kind, { ...event });
  }
}

export class MemoryTraceSink implements TraceSink {
  readonly events: TraceEvent[] = [];

  record(event: TraceEvent): void {
    this.events.push(event);
  }

  ofKind<K extends TraceEvent['kind']>(kind: K): Extract<TraceEvent, { kind: K }>[] {
    return this.events.filter(
      (event): event is Extract<TraceEvent, { kind: K }> => event.kind === kind
    );
  }
}

/**
 * Hands events to every sink without waiting on them. Sink failures are
 * logged and otherwise ignored.
 */
export class Tracer {
  private readonly logger: Logger;

  constructor(
    private readonly sinks: TraceSink[],
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('tracer');
  }

  emit(event: TraceEvent): void {
    for (const sink of this.sinks) {
      void Promise.resolve()
        .then(() => sink.record(event))
        .catch((error: unknown) => {
          this.logger.warn('Trace sink rejected event', {
            kind: event.kind,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    }
  }
}
