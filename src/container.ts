import { AppConfig } from './config';
import { PrescriptionPipeline } from './pipeline/pipeline.orchestrator';
import { AuditWriter, FileAuditWriter } from './services/audit.service';
import { HealthService } from './services/health.service';
import { ImagePreparer, ImageService } from './services/image.service';
import { AliasTable } from './services/knowledge/alias.table';
import { KnowledgeResolver } from './services/knowledge/knowledge.resolver';
import { JsonKnowledgeStore, KnowledgeStore, VocabularyIndex, readVocabularyFile } from './services/knowledge/knowledge.store';
import { GeminiProvider } from './services/model/gemini.provider';
import { ModelGateway } from './services/model/model.gateway';
import { ModelProvider } from './services/model/model.provider';
import { LoggerTraceSink, TraceSink, Tracer } from './services/trace.service';
import { OcrHintProvider, VisionService } from './services/vision.service';
import { DrugResolutionStage } from './stages/drugResolution.stage';
import { HallucinationDetectionStage } from './stages/hallucinationDetection.stage';
import { ImageExtractionStage } from './stages/imageExtraction.stage';
import { PatientInfoStage } from './stages/patientInfo.stage';
import { PrescriberStage } from './stages/prescriber.stage';
import { TranslationStage } from './stages/translation.stage';
import { createLogger, Logger } from './utils/logger';

export interface Container {
  pipeline: PrescriptionPipeline;
  health: HealthService;
  images: ImagePreparer;
  audit?: AuditWriter;
  gateway: ModelGateway;
}

export interface ContainerOverrides {
  provider?: ModelProvider;
  store?: KnowledgeStore;
  ocr?: OcrHintProvider;
  sinks?: TraceSink[];
  logger?: Logger;
}

export const buildContainer = async (config: AppConfig, overrides: ContainerOverrides = {}): Promise<Container> => {
  const logger = overrides.logger ?? createLogger('app');
  const tracer = new Tracer(overrides.sinks ?? [new LoggerTraceSink(logger.child('trace'))], logger.child('tracer'));

  const provider =
    overrides.provider ??
    new GeminiProvider({
      apiKey: config.gemini.apiKey,
      apiVersion: config.gemini.apiVersion,
      temperature: config.gemini.temperature,
      maxOutputTokens: config.gemini.maxOutputTokens,
    });
  const gateway = new ModelGateway(provider, config.gemini, tracer, logger.child('model-gateway'));

  const vocabulary = await readVocabularyFile(config.knowledge.vocabularyPath);
  const store = overrides.store ?? new JsonKnowledgeStore(vocabulary);
  const aliases = await AliasTable.loadFiles(config.knowledge.aliasTablePaths, config.knowledge.aliasDefaultConfidence);
  logger.info('Knowledge loaded', { concepts: vocabulary.length, aliases: aliases.size });

  const resolver = new KnowledgeResolver(
    new VocabularyIndex(vocabulary),
    aliases,
    store,
    config.knowledge,
    logger.child('knowledge-resolver')
  );

  const ocr =
    overrides.ocr ??
    (config.vision.ocrHintsEnabled ? new VisionService({ keyFilename: config.vision.keyFilename }) : undefined);

  const pipeline = new PrescriptionPipeline(
    [
      new ImageExtractionStage(gateway, config.pipeline, ocr && { provider: ocr, timeoutMs: config.vision.timeoutMs }),
      new PatientInfoStage(gateway, config.pipeline),
      new DrugResolutionStage(gateway, resolver, config.pipeline),
      new PrescriberStage(gateway, config.pipeline),
      new HallucinationDetectionStage(gateway, config.pipeline),
      new TranslationStage(gateway),
    ],
    tracer,
    config.pipeline,
    logger.child('pipeline')
  );

  return {
    pipeline,
    health: new HealthService(gateway, store, config.knowledge.storeTimeoutMs, logger.child('health')),
    images: new ImageService(config.image, logger.child('image-service')),
    audit: config.audit.dir ? new FileAuditWriter(config.audit.dir) : undefined,
    gateway,
  };
};
