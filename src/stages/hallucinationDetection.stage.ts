import { PipelineConfig } from '../config';
import { StageHardDependencyMissingError } from '../errors/PipelineErrors';
import { DrugFlagUpdate } from '../pipeline/prescription.record';
import { ModelGateway } from '../services/model/model.gateway';
import {
  DrugEntry,
  HallucinationFlag,
  HallucinationReport,
  PrescriptionRecord,
  StageId,
} from '../types/PrescriptionTypes';
import { nameSimilarity, normalizeKey, stripDrugName } from '../utils/similarity';
import { buildVerificationPrompt, SYSTEM_PROMPT } from './prompts';
import { verificationSchema } from './schemas';
import { RecordView, Stage, StageContext, StageResult } from './stage';

const PATIENT_FIELDS = ['name', 'date_of_birth', 'age', 'gender', 'address'];
const PRESCRIBER_FIELDS = ['name', 'npi', 'dea', 'clinic'];

/** Flag derived from the entry's own grounding, without the verification model. */
export const groundingFlag = (entry: Readonly<DrugEntry>, similarityFloor: number): HallucinationFlag | null => {
  if (!entry.resolved) {
    return entry.candidates.length ? 'AMBIGUOUS_RESOLUTION' : 'UNGROUNDED';
  }
  const written = entry.name || entry.raw_text;
  const similarity = Math.max(
    nameSimilarity(written, entry.resolved.canonical_name),
    nameSimilarity(written, entry.resolved.matched_via)
  );
  return similarity < similarityFloor ? 'CANONICAL_DIVERGENCE' : null;
};

/** True when every word of the drug name occurs in the source text. */
export const tracedInSource = (entry: Readonly<DrugEntry>, sourceText: string): boolean => {
  const words = stripDrugName(entry.name || entry.raw_text).split(' ').filter(Boolean);
  const source = normalizeKey(sourceText);
  return words.every((word) => source.includes(word));
};

/**
 * Cross-checks extracted content against the transcription. Only annotates:
 * drug entries receive a flag, everything else is left untouched.
 */
export class HallucinationDetectionStage implements Stage {
  readonly id: StageId = 'hallucination_detection';
  readonly critical = false;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = ['raw_extraction'];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly config: Pick<PipelineConfig, 'hallucinationSimilarityFloor'>
  ) {}

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const extraction = record.raw_extraction;
    if (!extraction) throw new StageHardDependencyMissingError(this.id, 'raw_extraction');

    const entries = record.drug_entries;
    const result = await this.gateway.completeStructured(
      {
        purpose: this.id,
        systemInstruction: SYSTEM_PROMPT,
        prompt: buildVerificationPrompt({
          extraction,
          patient: record.patient,
          prescriber: record.prescriber,
          drugs: entries.map((entry, index) => ({
            index,
            raw_text: entry.raw_text,
            name: entry.name,
            dosage: entry.dosage,
            frequency: entry.frequency,
            resolved: entry.resolved?.canonical_name ?? null,
          })),
        }),
      },
      verificationSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );

    const unsupported = new Set<number>();
    let unsupportedPatient: string[] = [];
    let unsupportedPrescriber: string[] = [];

    if (result.ok) {
      const verification = result.value.value;
      for (const drug of verification.drugs) {
        if (!drug.supported && drug.index < entries.length) unsupported.add(drug.index);
      }
      unsupportedPatient = record.patient
        ? verification.unsupported_patient_fields.filter((field) => PATIENT_FIELDS.includes(field))
        : [];
      unsupportedPrescriber = record.prescriber
        ? verification.unsupported_prescriber_fields.filter((field) => PRESCRIBER_FIELDS.includes(field))
        : [];
    } else {
      entries.forEach((entry, index) => {
        if (!tracedInSource(entry, extraction.text)) unsupported.add(index);
      });
    }

    const flags: DrugFlagUpdate[] = [];
    entries.forEach((entry, index) => {
      const flag = unsupported.has(index)
        ? 'UNSUPPORTED_BY_SOURCE'
        : groundingFlag(entry, this.config.hallucinationSimilarityFloor);
      if (flag) flags.push({ index, flag });
    });

    const report: HallucinationReport = {
      unsupported_patient_fields: unsupportedPatient,
      unsupported_prescriber_fields: unsupportedPrescriber,
      flagged_drug_count: flags.length,
      verification_model: result.ok ? result.value.modelId : null,
    };

    const warnings: string[] = [];
    if (flags.length) warnings.push(`${flags.length} drug entr${flags.length === 1 ? 'y' : 'ies'} flagged.`);
    if (unsupportedPatient.length) warnings.push(`Unsupported patient fields: ${unsupportedPatient.join(', ')}.`);
    if (unsupportedPrescriber.length) {
      warnings.push(`Unsupported prescriber fields: ${unsupportedPrescriber.join(', ')}.`);
    }

    const updates = { drug_flags: flags, hallucination_report: report };
    if (!result.ok) {
      return {
        status: 'FAILED_RECOVERABLE',
        updates,
        warnings: ['Verification model unavailable; only local grounding checks were applied.', ...warnings],
        modelId: null,
        attempts: result.error.attempts,
        error: { code: result.error.code, message: result.error.message },
      };
    }

    return {
      status: warnings.length ? 'SUCCESS_WITH_WARNINGS' : 'SUCCESS',
      updates,
      warnings,
      modelId: result.value.modelId,
      attempts: result.value.attempts,
    };
  }
}
