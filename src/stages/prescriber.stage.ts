import { PipelineConfig } from '../config';
import { StageHardDependencyMissingError } from '../errors/PipelineErrors';
import { ModelGateway } from '../services/model/model.gateway';
import { PrescriberInfo, PrescriptionRecord, StageId } from '../types/PrescriptionTypes';
import { buildPrescriberPrompt, SYSTEM_PROMPT } from './prompts';
import { prescriberSchema } from './schemas';
import { modelFailure, RecordView, Stage, StageContext, StageResult, successStatus } from './stage';
import { validatePrescriber } from './validation';

export class PrescriberStage implements Stage {
  readonly id: StageId = 'prescriber';
  readonly critical = false;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = ['raw_extraction'];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly config: Pick<PipelineConfig, 'lowConfidenceThreshold'>
  ) {}

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const extraction = record.raw_extraction;
    if (!extraction) throw new StageHardDependencyMissingError(this.id, 'raw_extraction');

    const result = await this.gateway.completeStructured(
      { purpose: this.id, systemInstruction: SYSTEM_PROMPT, prompt: buildPrescriberPrompt(extraction) },
      prescriberSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );
    if (!result.ok) {
      return modelFailure(result.error, 'FAILED_RECOVERABLE');
    }

    const { value: output, modelId, attempts } = result.value;
    const errors = validatePrescriber(output);
    const warnings = errors.map((error) => `prescriber ${error}`);
    if (!output.signature_present) {
      warnings.push('No prescriber signature detected.');
    }
    if (output.confidence < this.config.lowConfidenceThreshold) {
      warnings.push(`Low prescriber extraction confidence (${output.confidence}).`);
    }

    const prescriber: PrescriberInfo = {
      ...output,
      validated: errors.length === 0,
      validation_errors: errors,
    };
    return { status: successStatus(warnings), updates: { prescriber }, warnings, modelId, attempts };
  }
}
