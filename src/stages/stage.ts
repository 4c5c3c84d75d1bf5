import { ModelUnavailableError } from '../errors/PipelineErrors';
import { RecordUpdate } from '../pipeline/prescription.record';
import { Tracer } from '../services/trace.service';
import {
  ModelAttempt,
  PrescriptionRecord,
  StageId,
  StageStatus,
} from '../types/PrescriptionTypes';

export interface RunOptions {
  /** Target language for the optional translation stage. */
  translateTo?: string;
}

export interface StageContext {
  recordId: string;
  signal: AbortSignal;
  tracer: Tracer;
  options: RunOptions;
}

export type StageRunStatus = Exclude<StageStatus, 'SKIPPED' | 'CANCELLED'>;

export interface StageResult {
  status: StageRunStatus;
  updates: RecordUpdate;
  warnings: string[];
  modelId: string | null;
  attempts: ModelAttempt[];
  degraded?: boolean;
  error?: { code: string; message: string };
}

/** Record fields a stage may read; the orchestrator never exposes a writable record. */
export type RecordView = Readonly<Omit<PrescriptionRecord, 'drug_entries' | 'stage_trace'>> & {
  readonly drug_entries: readonly Readonly<PrescriptionRecord['drug_entries'][number]>[];
};

export interface Stage {
  readonly id: StageId;
  /** An unexpected failure in a critical stage ends the pipeline. */
  readonly critical: boolean;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[];
  isRequested?(options: RunOptions): boolean;
  run(record: RecordView, context: StageContext): Promise<StageResult>;
}

export const modelFailure = (
  error: ModelUnavailableError,
  status: 'FAILED_RECOVERABLE' | 'FAILED_FATAL',
  warnings: string[] = []
): StageResult => ({
  status,
  updates: {},
  warnings,
  modelId: null,
  attempts: error.attempts,
  error: { code: error.code, message: error.message },
});

/** SUCCESS, or SUCCESS_WITH_WARNINGS when anything was noted. */
export const successStatus = (warnings: readonly string[]): StageRunStatus =>
  warnings.length ? 'SUCCESS_WITH_WARNINGS' : 'SUCCESS';
