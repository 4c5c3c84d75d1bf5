import { Schema, SchemaType } from '@google/generative-ai';
import { z } from 'zod';
import { OutputSchema } from '../services/model/model.gateway';

const clamp01 = (value: number): number => Math.min(Math.max(value, 0), 1);

const confidence = z
  .number()
  .nullish()
  .transform((value) => (typeof value === 'number' ? clamp01(value) : 0));

const text = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const str: Schema = { type: SchemaType.STRING };
const nullableStr: Schema = { type: SchemaType.STRING, nullable: true };
const num: Schema = { type: SchemaType.NUMBER };

// --- image extraction ---

const extractionValidator = z.object({
  raw_text: z.string(),
  patient_section: text,
  prescriber_section: text,
  medication_lines: z.array(z.string()).nullish().transform((lines) => lines ?? []),
  date_written: optionalText,
  legible: z.boolean().nullish().transform((value) => value ?? true),
  confidence,
});

export type ExtractionOutput = z.infer<typeof extractionValidator>;

export const extractionSchema: OutputSchema<ExtractionOutput> = {
  name: 'image_extraction',
  validator: extractionValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      raw_text: str,
      patient_section: str,
      prescriber_section: str,
      medication_lines: { type: SchemaType.ARRAY, items: str },
      date_written: nullableStr,
      legible: { type: SchemaType.BOOLEAN },
      confidence: num,
    },
    required: ['raw_text', 'medication_lines', 'legible', 'confidence'],
  },
};

// --- patient ---

const patientValidator = z.object({
  name: optionalText,
  date_of_birth: optionalText,
  age: z.number().nullish().transform((value) => value ?? null),
  gender: optionalText,
  address: optionalText,
  identifiers: z
    .array(z.object({ type: z.string(), value: z.string() }))
    .nullish()
    .transform((items) => items ?? []),
  confidence,
});

export type PatientOutput = z.infer<typeof patientValidator>;

export const patientSchema: OutputSchema<PatientOutput> = {
  name: 'patient_info',
  validator: patientValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      name: nullableStr,
      date_of_birth: nullableStr,
      age: { type: SchemaType.NUMBER, nullable: true },
      gender: nullableStr,
      address: nullableStr,
      identifiers: {
        type: SchemaType.ARRAY,
        items: {
          type: SchemaType.OBJECT,
          properties: { type: str, value: str },
          required: ['type', 'value'],
        },
      },
      confidence: num,
    },
    required: ['name', 'date_of_birth', 'confidence'],
  },
};

// --- prescriber ---

const prescriberValidator = z.object({
  name: optionalText,
  credentials: optionalText,
  npi: optionalText,
  dea: optionalText,
  license_number: optionalText,
  clinic: optionalText,
  address: optionalText,
  phone: optionalText,
  signature_present: z.boolean().nullish().transform((value) => value ?? false),
  confidence,
});

export type PrescriberOutput = z.infer<typeof prescriberValidator>;

export const prescriberSchema: OutputSchema<PrescriberOutput> = {
  name: 'prescriber',
  validator: prescriberValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      name: nullableStr,
      credentials: nullableStr,
      npi: nullableStr,
      dea: nullableStr,
      license_number: nullableStr,
      clinic: nullableStr,
      address: nullableStr,
      phone: nullableStr,
      signature_present: { type: SchemaType.BOOLEAN },
      confidence: num,
    },
    required: ['name', 'confidence'],
  },
};

// --- drug lines ---

const drugLineValidator = z
  .object({
    raw_text: text,
    name: text,
    dosage: text,
    frequency: text,
    route: text,
    quantity: text,
    duration: text,
    instructions: text,
  })
  .transform((line) => ({ ...line, raw_text: line.raw_text || line.name }));

const drugsValidator = z.object({ drugs: z.array(drugLineValidator) });

export type DrugLineOutput = z.infer<typeof drugLineValidator>;
export type DrugsOutput = z.infer<typeof drugsValidator>;

export const drugsSchema: OutputSchema<DrugsOutput> = {
  name: 'drug_lines',
  validator: drugsValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      drugs: {
        type: SchemaType.ARRAY,
        items: {
          type: SchemaType.OBJECT,
          properties: {
            raw_text: str,
            name: str,
            dosage: str,
            frequency: str,
            route: str,
            quantity: str,
            duration: str,
            instructions: str,
          },
          required: ['raw_text', 'name'],
        },
      },
    },
    required: ['drugs'],
  },
};

// --- verification ---

const verificationValidator = z.object({
  drugs: z.array(
    z.object({
      index: z.number().int().min(0),
      supported: z.boolean(),
      note: text,
    })
  ),
  unsupported_patient_fields: z.array(z.string()).nullish().transform((items) => items ?? []),
  unsupported_prescriber_fields: z.array(z.string()).nullish().transform((items) => items ?? []),
});

export type VerificationOutput = z.infer<typeof verificationValidator>;

export const verificationSchema: OutputSchema<VerificationOutput> = {
  name: 'hallucination_check',
  validator: verificationValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      drugs: {
        type: SchemaType.ARRAY,
        items: {
          type: SchemaType.OBJECT,
          properties: {
            index: { type: SchemaType.INTEGER },
            supported: { type: SchemaType.BOOLEAN },
            note: str,
          },
          required: ['index', 'supported'],
        },
      },
      unsupported_patient_fields: { type: SchemaType.ARRAY, items: str },
      unsupported_prescriber_fields: { type: SchemaType.ARRAY, items: str },
    },
    required: ['drugs', 'unsupported_patient_fields', 'unsupported_prescriber_fields'],
  },
};

// --- translation ---

const translationValidator = z.object({
  language: z.string().min(1),
  patient_summary: text,
  prescriber_summary: text,
  drugs: z.array(
    z.object({
      index: z.number().int().min(0),
      dosage: text,
      frequency: text,
      route: text,
      instructions: text,
    })
  ),
});

export type TranslationOutput = z.infer<typeof translationValidator>;

export const translationSchema: OutputSchema<TranslationOutput> = {
  name: 'translation',
  validator: translationValidator,
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      language: str,
      patient_summary: str,
      prescriber_summary: str,
      drugs: {
        type: SchemaType.ARRAY,
        items: {
          type: SchemaType.OBJECT,
          properties: {
            index: { type: SchemaType.INTEGER },
            dosage: str,
            frequency: str,
            route: str,
            instructions: str,
          },
          required: ['index'],
        },
      },
    },
    required: ['language', 'drugs'],
  },
};
