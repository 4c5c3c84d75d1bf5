import { randomUUID } from 'crypto';
import { FieldOwnershipError, InvalidStatusTransitionError } from '../errors/PipelineErrors';
import {
  DrugEntry,
  HallucinationFlag,
  HallucinationReport,
  PatientInfo,
  PrescriberInfo,
  PrescriptionRecord,
  RawExtraction,
  RecordStatus,
  SourceImage,
  StageId,
  Translation,
} from '../types/PrescriptionTypes';

export interface DrugFlagUpdate {
  index: number;
  flag: HallucinationFlag | null;
}

/** Field updates a stage hands back to the orchestrator. */
export interface RecordUpdate {
  raw_extraction?: RawExtraction;
  patient?: PatientInfo;
  prescriber?: PrescriberInfo;
  /** Appended to `drug_entries`. */
  drug_entries?: DrugEntry[];
  /** Annotates existing entries; nothing else on the entry changes. */
  drug_flags?: DrugFlagUpdate[];
  hallucination_report?: HallucinationReport;
  translation?: Translation;
}

export const FIELD_OWNERS: Readonly<Record<keyof RecordUpdate, StageId>> = {
  raw_extraction: 'image_extraction',
  patient: 'patient_info',
  drug_entries: 'drug_resolution',
  prescriber: 'prescriber',
  drug_flags: 'hallucination_detection',
  hallucination_report: 'hallucination_detection',
  translation: 'translation',
};

const UPDATE_FIELDS = [
  'raw_extraction',
  'patient',
  'drug_entries',
  'prescriber',
  'drug_flags',
  'hallucination_report',
  'translation',
] as const satisfies readonly (keyof RecordUpdate)[];

const TRANSITIONS: Readonly<Record<RecordStatus, readonly RecordStatus[]>> = {
  PENDING: ['IN_PROGRESS'],
  IN_PROGRESS: ['COMPLETED', 'FAILED', 'PARTIALLY_COMPLETED'],
  COMPLETED: [],
  FAILED: [],
  PARTIALLY_COMPLETED: [],
};

export const isTerminal = (status: RecordStatus): boolean => TRANSITIONS[status].length === 0;

export const createRecord = (image: SourceImage): PrescriptionRecord => ({
  id: randomUUID(),
  created_at: new Date().toISOString(),
  completed_at: null,
  source_image: image,
  raw_extraction: null,
  patient: null,
  prescriber: null,
  drug_entries: [],
  hallucination_report: null,
  translation: null,
  stage_trace: [],
  status: 'PENDING',
  failure: null,
});

export const transitionStatus = (record: PrescriptionRecord, next: RecordStatus): RecordStatus => {
  const previous = record.status;
  if (!TRANSITIONS[previous].includes(next)) {
    throw new InvalidStatusTransitionError(previous, next);
  }
  record.status = next;
  if (isTerminal(next)) {
    record.completed_at = new Date().toISOString();
  }
  return previous;
};

const writeOnce = <K extends 'raw_extraction' | 'patient' | 'prescriber' | 'hallucination_report' | 'translation'>(
  record: PrescriptionRecord,
  stage: StageId,
  field: K,
  value: PrescriptionRecord[K]
): void => {
  if (record[field] !== null) {
    throw new FieldOwnershipError(stage, `${field} (already written)`);
  }
  record[field] = value;
};

/**
 * Applies a stage's updates, rejecting any field the stage does not own.
 * Ownership is checked for every key before anything is written.
 */
export const applyUpdate = (record: PrescriptionRecord, stage: StageId, update: RecordUpdate): void => {
  for (const key of UPDATE_FIELDS) {
    if (update[key] !== undefined && FIELD_OWNERS[key] !== stage) {
      throw new FieldOwnershipError(stage, key);
    }
  }
  if (update.drug_flags) {
    for (const { index } of update.drug_flags) {
      if (!record.drug_entries[index]) {
        throw new FieldOwnershipError(stage, `drug_entries[${index}] (no such entry)`);
      }
    }
  }

  if (update.raw_extraction) writeOnce(record, stage, 'raw_extraction', update.raw_extraction);
  if (update.patient) writeOnce(record, stage, 'patient', update.patient);
  if (update.prescriber) writeOnce(record, stage, 'prescriber', update.prescriber);
  if (update.hallucination_report) writeOnce(record, stage, 'hallucination_report', update.hallucination_report);
  if (update.translation) writeOnce(record, stage, 'translation', update.translation);
  if (update.drug_entries) record.drug_entries.push(...update.drug_entries);
  for (const { index, flag } of update.drug_flags ?? []) {
    record.drug_entries[index] = { ...record.drug_entries[index], hallucination_flag: flag };
  }
};

export type SerializedRecord = Omit<PrescriptionRecord, 'source_image'> & {
  source_image: { mimeType: string; originalName?: string; bytes: number } | null;
};

/** JSON-safe view: image bytes are replaced by their size. */
export const serializeRecord = (record: PrescriptionRecord): SerializedRecord => ({
  ...record,
  source_image: record.source_image
    ? {
        mimeType: record.source_image.mimeType,
        originalName: record.source_image.originalName,
        bytes: record.source_image.data.length,
      }
    : null,
});
