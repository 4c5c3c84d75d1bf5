import { ModelAttempt, RecordStatus, StageId } from '../types/PrescriptionTypes';

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ModelUnavailableError extends PipelineError {
  readonly attempts: ModelAttempt[];

  constructor(attempts: ModelAttempt[]) {
    const tried = [...new Set(attempts.map((a) => a.model_id))].join(', ');
    super('MODEL_UNAVAILABLE', `All configured models failed (${tried || 'none configured'}).`);
    this.attempts = attempts;
  }
}

export class SchemaValidationError extends PipelineError {
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string) {
    super('SCHEMA_VALIDATION_FAILED', message);
    this.rawOutput = rawOutput;
  }
}

/** Upload that cannot be decoded or does not meet the size rules. */
export class InvalidImageError extends PipelineError {
  constructor(message: string) {
    super('INVALID_IMAGE', message);
  }
}

export class KnowledgeStoreDegradedError extends PipelineError {
  constructor(message: string) {
    super('KNOWLEDGE_STORE_DEGRADED', message);
  }
}

export class StageHardDependencyMissingError extends PipelineError {
  readonly stage: StageId;
  readonly field: string;

  constructor(stage: StageId, field: string) {
    super('STAGE_HARD_DEPENDENCY_MISSING', `Stage ${stage} requires ${field}, which is not populated.`);
    this.stage = stage;
    this.field = field;
  }
}

export class PipelineTimeoutError extends PipelineError {
  constructor(deadlineMs: number) {
    super('PIPELINE_TIMEOUT', `Pipeline deadline of ${deadlineMs}ms exceeded.`);
  }
}

export class FieldOwnershipError extends PipelineError {
  constructor(stage: StageId, field: string) {
    super('FIELD_OWNERSHIP_VIOLATION', `Stage ${stage} may not write ${field}.`);
  }
}

export class InvalidStatusTransitionError extends PipelineError {
  constructor(from: RecordStatus, to: RecordStatus) {
    super('INVALID_STATUS_TRANSITION', `Cannot move record status from ${from} to ${to}.`);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export const errorMessage = (error: unknown, fallback = 'Unknown error.'): string =>
  error instanceof Error ? error.message : fallback;
