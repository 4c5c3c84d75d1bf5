import { PipelineConfig } from '../config';
import {
  FieldOwnershipError,
  PipelineError,
  PipelineTimeoutError,
  StageHardDependencyMissingError,
  errorMessage,
} from '../errors/PipelineErrors';
import { Tracer } from '../services/trace.service';
import { RunOptions, Stage } from '../stages/stage';
import {
  FailureSummary,
  PrescriptionRecord,
  RecordStatus,
  SourceImage,
  StageId,
  StageStatus,
  StageTraceEntry,
} from '../types/PrescriptionTypes';
import { raceAbort } from '../utils/async';
import { createLogger, Logger } from '../utils/logger';
import { applyUpdate, createRecord, transitionStatus } from './prescription.record';

export interface ProcessOptions extends RunOptions {
  /** Overrides the configured per-invocation deadline. */
  deadlineMs?: number;
}

export const STAGE_ORDER: readonly StageId[] = [
  'image_extraction',
  'patient_info',
  'drug_resolution',
  'prescriber',
  'hallucination_detection',
  'translation',
];

const traceEntry = (
  stage: StageId,
  status: StageStatus,
  extra: Partial<StageTraceEntry> = {}
): StageTraceEntry => ({
  stage,
  status,
  started_at: null,
  latency_ms: 0,
  model_id: null,
  attempts: [],
  degraded: false,
  warnings: [],
  ...extra,
});

/**
 * Drives one record through the stage list, strictly one stage at a time.
 * Every stage ends up in the trace, including the ones that never ran.
 */
export class PrescriptionPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly stages: readonly Stage[],
    private readonly tracer: Tracer,
    private readonly config: Pick<PipelineConfig, 'deadlineMs'>,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('pipeline');
    const ids = stages.map((stage) => stage.id);
    const ordered = STAGE_ORDER.filter((id) => ids.includes(id));
    if (ids.length !== new Set(ids).size || ids.some((id, i) => id !== ordered[i])) {
      throw new Error(`Stages must be unique and follow the order ${STAGE_ORDER.join(' -> ')}.`);
    }
  }

  async process(image: SourceImage, options: ProcessOptions = {}): Promise<PrescriptionRecord> {
    const record = createRecord(image);
    this.transition(record, 'IN_PROGRESS');

    const deadlineMs = options.deadlineMs ?? this.config.deadlineMs;
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new PipelineTimeoutError(deadlineMs)), deadlineMs);

    let failure: FailureSummary | null = null;
    let recoverable = false;

    try {
      for (const stage of this.stages) {
        let entry: StageTraceEntry;
        if (failure) {
          entry = traceEntry(stage.id, 'SKIPPED', { warnings: [`Skipped after ${failure.stage} failed.`] });
        } else if (stage.isRequested && !stage.isRequested(options)) {
          entry = traceEntry(stage.id, 'SKIPPED');
        } else {
          entry = await this.runStage(stage, record, options, deadline.signal);
        }

        record.stage_trace.push(entry);
        this.tracer.emit({
          kind: 'stage',
          recordId: record.id,
          stage: stage.id,
          status: entry.status,
          latencyMs: entry.latency_ms,
          modelId: entry.model_id,
        });

        if (entry.status === 'FAILED_FATAL' || entry.status === 'CANCELLED') {
          failure = {
            stage: stage.id,
            code: entry.error?.code ?? 'STAGE_FAILED',
            message: entry.error?.message ?? `Stage ${stage.id} failed.`,
          };
          this.logger.error('Stage failed fatally, aborting pipeline', { recordId: record.id, ...failure });
        } else if (entry.status === 'FAILED_RECOVERABLE') {
          recoverable = true;
        }
      }
    } finally {
      clearTimeout(timer);
    }

    record.failure = failure;
    this.transition(record, failure ? 'FAILED' : recoverable ? 'PARTIALLY_COMPLETED' : 'COMPLETED');
    // the image is only held for the duration of the invocation
    record.source_image = null;
    return record;
  }

  private async runStage(
    stage: Stage,
    record: PrescriptionRecord,
    options: RunOptions,
    signal: AbortSignal
  ): Promise<StageTraceEntry> {
    const startedAt = new Date().toISOString();
    const started = Date.now();
    const elapsed = (): Partial<StageTraceEntry> => ({ started_at: startedAt, latency_ms: Date.now() - started });

    if (signal.aborted) {
      return traceEntry(stage.id, 'CANCELLED', { ...elapsed(), error: this.abortDetails(signal) });
    }

    const missing = stage.hardDependencies.find((field) => record[field] === null);
    if (missing) {
      const error = new StageHardDependencyMissingError(stage.id, missing);
      return traceEntry(stage.id, 'FAILED_FATAL', {
        ...elapsed(),
        error: { code: error.code, message: error.message },
      });
    }

    this.logger.info('Stage started', { recordId: record.id, stage: stage.id });
    try {
      const result = await raceAbort(
        stage.run(record, { recordId: record.id, signal, tracer: this.tracer, options }),
        signal
      );
      applyUpdate(record, stage.id, result.updates);

      const entry = traceEntry(stage.id, result.status, {
        ...elapsed(),
        model_id: result.modelId,
        attempts: result.attempts,
        degraded: result.degraded ?? false,
        warnings: result.warnings,
        ...(result.error ? { error: result.error } : {}),
      });
      const log = result.status.startsWith('FAILED') ? this.logger.warn : this.logger.info;
      log('Stage finished', {
        recordId: record.id,
        stage: stage.id,
        status: entry.status,
        latencyMs: entry.latency_ms,
        modelId: entry.model_id,
      });
      return entry;
    } catch (error) {
      if (signal.aborted) {
        this.logger.error('Stage cancelled by pipeline deadline', { recordId: record.id, stage: stage.id });
        return traceEntry(stage.id, 'CANCELLED', { ...elapsed(), error: this.abortDetails(signal) });
      }

      const fatal =
        stage.critical ||
        error instanceof FieldOwnershipError ||
        error instanceof StageHardDependencyMissingError;
      this.logger.error('Stage threw', { recordId: record.id, stage: stage.id, error: errorMessage(error) });
      return traceEntry(stage.id, fatal ? 'FAILED_FATAL' : 'FAILED_RECOVERABLE', {
        ...elapsed(),
        error: {
          code: error instanceof PipelineError ? error.code : 'STAGE_ERROR',
          message: errorMessage(error),
        },
      });
    }
  }

  private abortDetails(signal: AbortSignal): { code: string; message: string } {
    const reason: unknown = signal.reason;
    return reason instanceof PipelineError
      ? { code: reason.code, message: reason.message }
      : { code: 'PIPELINE_TIMEOUT', message: errorMessage(reason, 'Pipeline cancelled.') };
  }

  private transition(record: PrescriptionRecord, next: RecordStatus): void {
    const from = transitionStatus(record, next);
    this.tracer.emit({ kind: 'pipeline', recordId: record.id, from, to: next });
  }
}
