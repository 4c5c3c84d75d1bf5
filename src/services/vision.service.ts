import { ImageAnnotatorClient } from '@google-cloud/vision';
import path from 'path';
import { errorMessage } from '../errors/PipelineErrors';
import { ImagePart } from './model/model.provider';

/** Plain-text OCR used as a hint for the extraction model. */
export interface OcrHintProvider {
  extractText(image: ImagePart, signal?: AbortSignal): Promise<string>;
}

export interface VisionServiceOptions {
  keyFilename?: string;
  languageHints?: string[];
}

export class VisionService implements OcrHintProvider {
  private client: ImageAnnotatorClient;
  private languageHints: string[];

  constructor(options: VisionServiceOptions = {}) {
    this.client = new ImageAnnotatorClient({
      keyFilename: options.keyFilename || path.join(process.cwd(), 'keys', 'google-vision.json'),
    });
    this.languageHints = options.languageHints ?? ['en'];
  }

  async extractText(image: ImagePart, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    try {
      const [result] = await this.client.documentTextDetection({
        image: { content: image.data },
        imageContext: { languageHints: this.languageHints },
      });
      const text =
        result.fullTextAnnotation?.text ||
        result.textAnnotations?.[0]?.description ||
        '';

      if (!text.trim()) {
        throw new Error('No text detected from OCR.');
      }
      return text.trim();
    } catch (error) {
      throw new Error(`Vision OCR failed: ${errorMessage(error, 'Unknown error during OCR.')}`);
    }
  }
}
