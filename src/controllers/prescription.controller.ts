import { Request, Response } from 'express';
import { PrescriptionPipeline } from '../pipeline/pipeline.orchestrator';
import { SerializedRecord, serializeRecord } from '../pipeline/prescription.record';
import { AuditWriter } from '../services/audit.service';
import { ImagePreparer } from '../services/image.service';
import { PrescriptionRecord, ServiceResponse, SourceImage } from '../types/PrescriptionTypes';
import { errorMessage, InvalidImageError } from '../errors/PipelineErrors';
import { createLogger, Logger } from '../utils/logger';

export interface PrescriptionControllerDeps {
  pipeline: Pick<PrescriptionPipeline, 'process'>;
  images: ImagePreparer;
  audit?: AuditWriter;
  logger?: Logger;
}

/** Every model was unreachable before anything could be read from the image. */
export const isInfrastructureFailure = (record: PrescriptionRecord): boolean =>
  record.status === 'FAILED' &&
  record.failure?.stage === 'image_extraction' &&
  record.failure.code === 'MODEL_UNAVAILABLE';

export const translateTarget = (query: Request['query']): string | undefined => {
  const value = query.translate;
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

export const createPrescriptionController = ({ pipeline, images, audit, logger: parent }: PrescriptionControllerDeps) => {
  const logger = parent ?? createLogger('prescription-controller');

  const handleProcess = async (
    req: Pick<Request, 'file' | 'query'>,
    res: Pick<Response<ServiceResponse<SerializedRecord>>, 'status' | 'json'>
  ): Promise<void> => {
    try {
      if (!req.file) {
        res.status(400).json({ success: false, error: 'No file uploaded.' });
        return;
      }

      let image: SourceImage;
      try {
        image = await images.prepare({
          data: req.file.buffer,
          mimeType: req.file.mimetype,
          originalName: req.file.originalname,
        });
      } catch (imageError) {
        if (!(imageError instanceof InvalidImageError)) throw imageError;
        res.status(400).json({ success: false, error: imageError.message });
        return;
      }

      const record = await pipeline.process(image, { translateTo: translateTarget(req.query) });

      if (audit) {
        try {
          await audit.write(record, req.file.originalname);
        } catch (auditError) {
          logger.warn('Failed to persist audit record', { recordId: record.id, error: errorMessage(auditError) });
        }
      }

      if (isInfrastructureFailure(record)) {
        res.status(503).json({
          success: false,
          error: record.failure?.message ?? 'Model service unavailable.',
          data: serializeRecord(record),
        });
        return;
      }

      res.json({ success: record.status !== 'FAILED', data: serializeRecord(record) });
    } catch (error) {
      logger.error('Prescription processing failed', { error: errorMessage(error) });
      res.status(500).json({
        success: false,
        error: errorMessage(error, 'Failed to process prescription.'),
      });
    }
  };

  return { handleProcess };
};
