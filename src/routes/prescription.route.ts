import { Router } from 'express';
import multer from 'multer';
import { createPrescriptionController, PrescriptionControllerDeps } from '../controllers/prescription.controller';

export const ALLOWED_MIME_TYPES = ['image/png', 'image/jpeg', 'image/jpg', 'image/webp'];

export class UploadRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadRejectedError';
  }
}

export const createPrescriptionRouter = (deps: PrescriptionControllerDeps, maxUploadBytes: number): Router => {
  // images stay in memory; nothing is written to disk
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (!ALLOWED_MIME_TYPES.includes(file.mimetype)) {
        cb(new UploadRejectedError('Only image uploads are allowed.'));
        return;
      }
      cb(null, true);
    },
  });

  const { handleProcess } = createPrescriptionController(deps);
  const router = Router();

  router.post('/', upload.single('file'), handleProcess);

  return router;
};
