import { PipelineConfig } from '../config';
import { StageHardDependencyMissingError } from '../errors/PipelineErrors';
import { ModelGateway } from '../services/model/model.gateway';
import { PatientInfo, PrescriptionRecord, StageId } from '../types/PrescriptionTypes';
import { buildPatientPrompt, SYSTEM_PROMPT } from './prompts';
import { patientSchema } from './schemas';
import { modelFailure, RecordView, Stage, StageContext, StageResult, successStatus } from './stage';
import { validatePatient } from './validation';

export class PatientInfoStage implements Stage {
  readonly id: StageId = 'patient_info';
  readonly critical = false;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = ['raw_extraction'];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly config: Pick<PipelineConfig, 'lowConfidenceThreshold'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const extraction = record.raw_extraction;
    if (!extraction) throw new StageHardDependencyMissingError(this.id, 'raw_extraction');

    const result = await this.gateway.completeStructured(
      { purpose: this.id, systemInstruction: SYSTEM_PROMPT, prompt: buildPatientPrompt(extraction) },
      patientSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );
    if (!result.ok) {
      return modelFailure(result.error, 'FAILED_RECOVERABLE');
    }

    const { value: output, modelId, attempts } = result.value;
    const errors = validatePatient(output, this.now());
    const warnings = errors.map((error) => `patient ${error}`);
    if (output.confidence < this.config.lowConfidenceThreshold) {
      warnings.push(`Low patient extraction confidence (${output.confidence}).`);
    }

    const patient: PatientInfo = {
      ...output,
      validated: errors.length === 0,
      validation_errors: errors,
    };
    return { status: successStatus(warnings), updates: { patient }, warnings, modelId, attempts };
  }
}
