export type RecordStatus =
  | 'PENDING'
  | 'IN_PROGRESS'
  | 'COMPLETED'
  | 'FAILED'
  | 'PARTIALLY_COMPLETED';

export type StageId =
  | 'image_extraction'
  | 'patient_info'
  | 'drug_resolution'
  | 'prescriber'
  | 'hallucination_detection'
  | 'translation';

export type StageStatus =
  | 'SUCCESS'
  | 'SUCCESS_WITH_WARNINGS'
  | 'SKIPPED'
  | 'FAILED_RECOVERABLE'
  | 'FAILED_FATAL'
  | 'CANCELLED';

export type MatchKind = 'EXACT' | 'NORMALIZED' | 'BRAND_ALIAS' | 'FUZZY';

export type HallucinationFlag =
  | 'UNSUPPORTED_BY_SOURCE'
  | 'CANONICAL_DIVERGENCE'
  | 'AMBIGUOUS_RESOLUTION'
  | 'UNGROUNDED';

export interface SourceImage {
  data: Buffer;
  mimeType: string;
  originalName?: string;
}

export interface RawExtraction {
  text: string;
  patient_section: string;
  prescriber_section: string;
  medication_lines: string[];
  date_written: string | null;
  legible: boolean;
  confidence: number;
  ocr_hint: string | null;
}

export interface PatientIdentifier {
  type: string;
  value: string;
}

export interface PatientInfo {
  name: string | null;
  date_of_birth: string | null;
  age: number | null;
  gender: string | null;
  address: string | null;
  identifiers: PatientIdentifier[];
  confidence: number;
  validated: boolean;
  validation_errors: string[];
}

export interface PrescriberInfo {
  name: string | null;
  credentials: string | null;
  npi: string | null;
  dea: string | null;
  license_number: string | null;
  clinic: string | null;
  address: string | null;
  phone: string | null;
  signature_present: boolean;
  confidence: number;
  validated: boolean;
  validation_errors: string[];
}

export interface KnowledgeRelations {
  brand_names: string[];
  ingredients: string[];
}

export interface KnowledgeMatch {
  code: string;
  canonical_name: string;
  match_kind: MatchKind;
  match_score: number;
  matched_via: string;
  relations?: KnowledgeRelations;
}

export interface DrugEntry {
  raw_text: string;
  name: string;
  candidates: KnowledgeMatch[];
  resolved: KnowledgeMatch | null;
  hallucination_flag: HallucinationFlag | null;
  dosage: string;
  frequency: string;
  route: string;
  quantity: string;
  duration: string;
  instructions: string;
}

export interface HallucinationReport {
  unsupported_patient_fields: string[];
  unsupported_prescriber_fields: string[];
  flagged_drug_count: number;
  verification_model: string | null;
}

export interface TranslatedDrug {
  index: number;
  dosage: string;
  frequency: string;
  route: string;
  instructions: string;
}

export interface Translation {
  language: string;
  patient_summary: string;
  prescriber_summary: string;
  drugs: TranslatedDrug[];
}

export type AttemptOutcome = 'success' | 'transient' | 'policy' | 'schema_invalid';

export interface ModelAttempt {
  model_id: string;
  attempt: number;
  outcome: AttemptOutcome;
  latency_ms: number;
  reason?: string;
  /** Truncated model output of a schema_invalid attempt. */
  raw_output?: string;
}

export interface StageTraceEntry {
  stage: StageId;
  status: StageStatus;
  started_at: string | null;
  latency_ms: number;
  model_id: string | null;
  attempts: ModelAttempt[];
  degraded: boolean;
  warnings: string[];
  error?: { code: string; message: string };
}

export interface FailureSummary {
  stage: StageId;
  code: string;
  message: string;
}

export interface PrescriptionRecord {
  id: string;
  created_at: string;
  completed_at: string | null;
  source_image: SourceImage | null;
  raw_extraction: RawExtraction | null;
  patient: PatientInfo | null;
  prescriber: PrescriberInfo | null;
  drug_entries: DrugEntry[];
  hallucination_report: HallucinationReport | null;
  translation: Translation | null;
  stage_trace: StageTraceEntry[];
  status: RecordStatus;
  failure: FailureSummary | null;
}

export interface ServiceResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
