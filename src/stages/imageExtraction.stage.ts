import { PipelineConfig } from '../config';
import { StageHardDependencyMissingError, errorMessage } from '../errors/PipelineErrors';
import { ModelGateway } from '../services/model/model.gateway';
import { OcrHintProvider } from '../services/vision.service';
import { PrescriptionRecord, RawExtraction, StageId } from '../types/PrescriptionTypes';
import { raceAbort, timeoutScope } from '../utils/async';
import { buildExtractionPrompt, SYSTEM_PROMPT } from './prompts';
import { extractionSchema } from './schemas';
import { modelFailure, RecordView, Stage, StageContext, StageResult, successStatus } from './stage';

export interface OcrHintOptions {
  provider: OcrHintProvider;
  /** Budget for the hint alone; expiry only adds a warning. */
  timeoutMs: number;
}

export class ImageExtractionStage implements Stage {
  readonly id: StageId = 'image_extraction';
  readonly critical = true;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = ['source_image'];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly config: Pick<PipelineConfig, 'lowConfidenceThreshold'>,
    private readonly ocr?: OcrHintOptions
  ) {}

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const image = record.source_image;
    if (!image) throw new StageHardDependencyMissingError(this.id, 'source_image');

    const warnings: string[] = [];
    let ocrHint: string | null = null;
    if (this.ocr) {
      const scope = timeoutScope(this.ocr.timeoutMs, context.signal);
      try {
        ocrHint = await raceAbort(this.ocr.provider.extractText(image, scope.signal), scope.signal);
      } catch (error) {
        context.signal.throwIfAborted();
        warnings.push(`OCR hint unavailable: ${errorMessage(error)}`);
      } finally {
        scope.dispose();
      }
    }

    const result = await this.gateway.completeStructured(
      {
        purpose: this.id,
        systemInstruction: SYSTEM_PROMPT,
        prompt: buildExtractionPrompt(ocrHint, image.originalName),
        image: { data: image.data, mimeType: image.mimeType },
      },
      extractionSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );
    if (!result.ok) {
      return modelFailure(result.error, 'FAILED_FATAL', warnings);
    }

    const { value: output, modelId, attempts } = result.value;
    const text = output.raw_text.trim();
    if (!text) {
      return {
        status: 'FAILED_FATAL',
        updates: {},
        warnings,
        modelId,
        attempts,
        error: { code: 'EMPTY_EXTRACTION', message: 'No text could be extracted from the image.' },
      };
    }

    if (!output.legible) {
      warnings.push('Prescription reported as largely illegible.');
    }
    if (output.confidence < this.config.lowConfidenceThreshold) {
      warnings.push(`Low extraction confidence (${output.confidence}).`);
    }

    const extraction: RawExtraction = {
      text,
      patient_section: output.patient_section,
      prescriber_section: output.prescriber_section,
      medication_lines: output.medication_lines.map((line) => line.trim()).filter(Boolean),
      date_written: output.date_written,
      legible: output.legible,
      confidence: output.confidence,
      ocr_hint: ocrHint,
    };

    return {
      status: successStatus(warnings),
      updates: { raw_extraction: extraction },
      warnings,
      modelId,
      attempts,
    };
  }
}
