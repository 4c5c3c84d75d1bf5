import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors/PipelineErrors';
import type { LogLevel } from '../utils/logger';

export interface PipelineConfig {
  deadlineMs: number;
  lowConfidenceThreshold: number;
  /** Auto-commit thresholds per match kind. */
  acceptanceThreshold: number;
  aliasAcceptanceThreshold: number;
  fuzzyAcceptanceThreshold: number;
  hallucinationSimilarityFloor: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  server: { port: number; maxUploadBytes: number };
  gemini: {
    apiKey?: string;
    apiVersion: string;
    models: string[];
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    retryBudget: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  image: { minDimension: number; maxDimension: number; jpegQuality: number };
  vision: { ocrHintsEnabled: boolean; keyFilename: string; timeoutMs: number };
  knowledge: {
    vocabularyPath: string;
    aliasTablePaths: string[];
    aliasDefaultConfidence: number;
    storeTimeoutMs: number;
    fuzzyFloor: number;
    fuzzyTopK: number;
  };
  pipeline: PipelineConfig;
  audit: { dir?: string };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  deadlineMs: 120_000,
  lowConfidenceThreshold: 0.6,
  acceptanceThreshold: 0.95,
  aliasAcceptanceThreshold: 0.85,
  fuzzyAcceptanceThreshold: 1.0,
  hallucinationSimilarityFloor: 0.5,
};

const unit = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const list = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter(Boolean));

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  MAX_UPLOAD_MB: positiveInt.default(10),

  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_API_VERSION: z.string().default('v1beta'),
  GEMINI_MODEL_PRIMARY: z.string().min(1).default('gemini-2.5-pro'),
  GEMINI_MODEL_SECONDARY: z.string().default('gemini-2.5-flash'),
  GEMINI_MODEL_FALLBACK: z.string().default('gemini-2.0-flash'),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  GEMINI_MAX_OUTPUT_TOKENS: positiveInt.default(8192),
  MODEL_TIMEOUT_MS: positiveInt.default(30_000),
  MODEL_RETRY_BUDGET: z.coerce.number().int().min(0).max(10).default(2),
  MODEL_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MODEL_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(4000),

  PIPELINE_DEADLINE_MS: positiveInt.default(DEFAULT_PIPELINE_CONFIG.deadlineMs),
  LOW_CONFIDENCE_THRESHOLD: unit.default(DEFAULT_PIPELINE_CONFIG.lowConfidenceThreshold),
  ACCEPTANCE_THRESHOLD: unit.default(DEFAULT_PIPELINE_CONFIG.acceptanceThreshold),
  ALIAS_ACCEPTANCE_THRESHOLD: unit.default(DEFAULT_PIPELINE_CONFIG.aliasAcceptanceThreshold),
  FUZZY_ACCEPTANCE_THRESHOLD: unit.default(DEFAULT_PIPELINE_CONFIG.fuzzyAcceptanceThreshold),
  HALLUCINATION_SIMILARITY_FLOOR: unit.default(DEFAULT_PIPELINE_CONFIG.hallucinationSimilarityFloor),

  VOCABULARY_PATH: z.string().default('data/vocabulary.json'),
  ALIAS_TABLE_PATHS: list.default('data/aliases/brand_generic.csv'),
  ALIAS_DEFAULT_CONFIDENCE: z.coerce.number().min(0.85).max(0.95).default(0.9),
  KNOWLEDGE_STORE_TIMEOUT_MS: positiveInt.default(5000),
  FUZZY_SIMILARITY_FLOOR: unit.default(0.7),
  FUZZY_TOP_K: positiveInt.default(5),

  IMAGE_MIN_DIMENSION: positiveInt.default(100),
  IMAGE_MAX_DIMENSION: positiveInt.default(2048),
  IMAGE_JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(85),

  OCR_HINTS_ENABLED: flag,
  OCR_TIMEOUT_MS: positiveInt.default(10_000),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  AUDIT_DIR: z.string().optional(),
});

export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    logLevel: e.LOG_LEVEL,
    server: { port: e.PORT, maxUploadBytes: e.MAX_UPLOAD_MB * 1024 * 1024 },
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      apiVersion: e.GEMINI_API_VERSION,
      models: [e.GEMINI_MODEL_PRIMARY, e.GEMINI_MODEL_SECONDARY, e.GEMINI_MODEL_FALLBACK].filter(Boolean),
      temperature: e.GEMINI_TEMPERATURE,
      maxOutputTokens: e.GEMINI_MAX_OUTPUT_TOKENS,
      timeoutMs: e.MODEL_TIMEOUT_MS,
      retryBudget: e.MODEL_RETRY_BUDGET,
      retryBaseDelayMs: e.MODEL_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: e.MODEL_RETRY_MAX_DELAY_MS,
    },
    image: {
      minDimension: e.IMAGE_MIN_DIMENSION,
      maxDimension: e.IMAGE_MAX_DIMENSION,
      jpegQuality: e.IMAGE_JPEG_QUALITY,
    },
    vision: {
      ocrHintsEnabled: e.OCR_HINTS_ENABLED,
      keyFilename: e.GOOGLE_APPLICATION_CREDENTIALS || path.join(cwd, 'keys', 'google-vision.json'),
      timeoutMs: e.OCR_TIMEOUT_MS,
    },
    knowledge: {
      vocabularyPath: path.resolve(cwd, e.VOCABULARY_PATH),
      aliasTablePaths: e.ALIAS_TABLE_PATHS.map((p) => path.resolve(cwd, p)),
      aliasDefaultConfidence: e.ALIAS_DEFAULT_CONFIDENCE,
      storeTimeoutMs: e.KNOWLEDGE_STORE_TIMEOUT_MS,
      fuzzyFloor: e.FUZZY_SIMILARITY_FLOOR,
      fuzzyTopK: e.FUZZY_TOP_K,
    },
    pipeline: {
      deadlineMs: e.PIPELINE_DEADLINE_MS,
      lowConfidenceThreshold: e.LOW_CONFIDENCE_THRESHOLD,
      acceptanceThreshold: e.ACCEPTANCE_THRESHOLD,
      aliasAcceptanceThreshold: e.ALIAS_ACCEPTANCE_THRESHOLD,
      fuzzyAcceptanceThreshold: e.FUZZY_ACCEPTANCE_THRESHOLD,
      hallucinationSimilarityFloor: e.HALLUCINATION_SIMILARITY_FLOOR,
    },
    audit: { dir: e.AUDIT_DIR ? path.resolve(cwd, e.AUDIT_DIR) : undefined },
  };
};
