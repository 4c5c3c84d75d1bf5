import { ModelGateway } from '../services/model/model.gateway';
import { PrescriptionRecord, StageId, Translation } from '../types/PrescriptionTypes';
import { buildTranslationPrompt, SYSTEM_PROMPT } from './prompts';
import { translationSchema } from './schemas';
import { modelFailure, RecordView, RunOptions, Stage, StageContext, StageResult } from './stage';

/** Optional localized view of the record; upstream fields are never touched. */
export class TranslationStage implements Stage {
  readonly id: StageId = 'translation';
  readonly critical = false;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = [];

  constructor(private readonly gateway: ModelGateway) {}

  isRequested(options: RunOptions): boolean {
    return Boolean(options.translateTo?.trim());
  }

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const language = context.options.translateTo?.trim() || 'Spanish';
    const entries = record.drug_entries;

    const result = await this.gateway.completeStructured(
      {
        purpose: this.id,
        systemInstruction: SYSTEM_PROMPT,
        prompt: buildTranslationPrompt({
          language,
          patient: record.patient,
          prescriber: record.prescriber,
          drugs: entries.map((entry, index) => ({
            index,
            name: entry.resolved?.canonical_name ?? entry.name,
            dosage: entry.dosage,
            frequency: entry.frequency,
            route: entry.route,
            instructions: entry.instructions,
          })),
        }),
      },
      translationSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );
    if (!result.ok) {
      return modelFailure(result.error, 'FAILED_RECOVERABLE');
    }

    const { value: output, modelId, attempts } = result.value;
    const seen = new Set<number>();
    const drugs = output.drugs.filter((drug) => {
      if (drug.index >= entries.length || seen.has(drug.index)) return false;
      seen.add(drug.index);
      return true;
    });
    const warnings =
      drugs.length < entries.length ? [`${entries.length - drugs.length} drug line(s) were not translated.`] : [];

    const translation: Translation = {
      language: output.language || language,
      patient_summary: output.patient_summary,
      prescriber_summary: output.prescriber_summary,
      drugs,
    };
    return {
      status: warnings.length ? 'SUCCESS_WITH_WARNINGS' : 'SUCCESS',
      updates: { translation },
      warnings,
      modelId,
      attempts,
    };
  }
}
