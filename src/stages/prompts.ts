import { PatientInfo, PrescriberInfo, RawExtraction } from '../types/PrescriptionTypes';

export const SYSTEM_PROMPT = [
  'You are a pharmacy intern transcribing handwritten medical prescriptions for review by a supervising pharmacist.',
  'Work only from the material you are given; never invent names, numbers or medications that are not present.',
  'When something is illegible, leave the field empty or null instead of guessing.',
  'Return JSON that matches the provided schema. No explanations.',
].join(' ');

export const buildExtractionPrompt = (ocrHint: string | null, fileName?: string): string =>
  [
    fileName ? `File: ${fileName}` : 'Prescription image attached.',
    'Transcribe all visible text, line by line, into raw_text.',
    'Copy the patient block into patient_section and the prescriber block (name, credentials, registration numbers, clinic, signature) into prescriber_section.',
    'List every medication line verbatim in medication_lines, one line per prescribed item, keeping strength, route and directions on the same line.',
    'Set date_written when a prescription date is visible, legible=false when the handwriting cannot be read at all, and confidence (0-1) for the overall transcription.',
    ocrHint ? `An OCR pass produced the following text; use it only to confirm what you can see:\n${ocrHint}` : '',
  ]
    .filter(Boolean)
    .join('\n');

const sourceBlock = (extraction: RawExtraction): string =>
  [
    'Transcribed prescription:',
    extraction.text,
    extraction.medication_lines.length
      ? `Medication lines:\n${extraction.medication_lines.map((line) => `- ${line}`).join('\n')}`
      : '',
  ]
    .filter(Boolean)
    .join('\n');

export const buildPatientPrompt = (extraction: RawExtraction): string =>
  [
    sourceBlock(extraction),
    extraction.patient_section ? `Patient block:\n${extraction.patient_section}` : '',
    'Extract the patient: name, date_of_birth (YYYY-MM-DD), age in years, gender, address, identifiers (type and value, e.g. MRN or insurance number) and confidence (0-1).',
    'Use null for anything not written on the prescription.',
  ]
    .filter(Boolean)
    .join('\n\n');

export const buildPrescriberPrompt = (extraction: RawExtraction): string =>
  [
    sourceBlock(extraction),
    extraction.prescriber_section ? `Prescriber block:\n${extraction.prescriber_section}` : '',
    'Extract the prescriber: name, credentials (MD, DO, NP, PA...), npi, dea, license_number, clinic, address, phone, signature_present and confidence (0-1).',
    'Use null for anything not written on the prescription.',
  ]
    .filter(Boolean)
    .join('\n\n');

export const buildDrugsPrompt = (extraction: RawExtraction): string =>
  [
    sourceBlock(extraction),
    'List every prescribed medication. For each one give raw_text (the line exactly as written), name (the drug name only, as written, without strength or form), dosage (strength and amount per dose), frequency, route, quantity, duration and instructions.',
    'Abbreviations such as BID, TID, PO, PRN stay as written.',
    'Do not merge or drop lines, and do not correct drug names to something that is not on the page.',
  ].join('\n\n');

export interface VerificationInput {
  extraction: RawExtraction;
  patient: PatientInfo | null;
  prescriber: PrescriberInfo | null;
  drugs: { index: number; raw_text: string; name: string; dosage: string; frequency: string; resolved: string | null }[];
}

export const buildVerificationPrompt = (input: VerificationInput): string =>
  [
    'Source transcription:',
    input.extraction.text,
    'Extracted data to verify:',
    JSON.stringify(
      {
        patient: input.patient
          ? { name: input.patient.name, date_of_birth: input.patient.date_of_birth, age: input.patient.age, gender: input.patient.gender, address: input.patient.address }
          : null,
        prescriber: input.prescriber
          ? { name: input.prescriber.name, npi: input.prescriber.npi, dea: input.prescriber.dea, clinic: input.prescriber.clinic }
          : null,
        drugs: input.drugs,
      },
      null,
      2
    ),
    'For every drug (by index) set supported=false when the name, dosage or frequency cannot be traced to the source transcription, with a short note.',
    'List in unsupported_patient_fields and unsupported_prescriber_fields the field names whose values do not appear in the source.',
  ].join('\n\n');

export interface TranslationInput {
  language: string;
  patient: PatientInfo | null;
  prescriber: PrescriberInfo | null;
  drugs: { index: number; name: string; dosage: string; frequency: string; route: string; instructions: string }[];
}

export const buildTranslationPrompt = (input: TranslationInput): string =>
  [
    `Translate the human-readable parts of this prescription into ${input.language}.`,
    'Keep drug names, numbers and units unchanged; translate directions, frequency and route into plain patient language.',
    'Write patient_summary and prescriber_summary as one sentence each.',
    JSON.stringify({ patient: input.patient, prescriber: input.prescriber, drugs: input.drugs }, null, 2),
  ].join('\n\n');
