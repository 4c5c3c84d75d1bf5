import { PipelineConfig } from '../config';
import { KnowledgeMatch } from '../types/PrescriptionTypes';
import { PatientOutput, PrescriberOutput } from './schemas';

const MAX_AGE_YEARS = 130;

export const parseIsoDate = (value: string): Date | null => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
};

/** Whole years between `dateOfBirth` and `now`. */
export const ageOn = (dateOfBirth: Date, now: Date): number => {
  let years = now.getUTCFullYear() - dateOfBirth.getUTCFullYear();
  const beforeBirthday =
    now.getUTCMonth() < dateOfBirth.getUTCMonth() ||
    (now.getUTCMonth() === dateOfBirth.getUTCMonth() && now.getUTCDate() < dateOfBirth.getUTCDate());
  if (beforeBirthday) years--;
  return years;
};

export const validatePatient = (patient: PatientOutput, now: Date = new Date()): string[] => {
  const errors: string[] = [];
  if (!patient.name) errors.push('name is missing');

  if (patient.age !== null && (patient.age < 0 || patient.age > MAX_AGE_YEARS)) {
    errors.push('age is out of range');
  }

  if (!patient.date_of_birth) {
    errors.push('date_of_birth is missing');
    return errors;
  }

  const dob = parseIsoDate(patient.date_of_birth);
  if (!dob) {
    errors.push('date_of_birth is not a valid date');
  } else if (dob.getTime() > now.getTime()) {
    errors.push('date_of_birth is in the future');
  } else if (ageOn(dob, now) > MAX_AGE_YEARS) {
    errors.push('date_of_birth is implausibly old');
  } else if (patient.age !== null && Math.abs(ageOn(dob, now) - patient.age) > 1) {
    errors.push('age does not match date_of_birth');
  }
  return errors;
};

const NPI_PATTERN = /^\d{10}$/;
const DEA_PATTERN = /^[A-Z]{2}\d{7}$/;

export const validatePrescriber = (prescriber: PrescriberOutput): string[] => {
  const errors: string[] = [];
  if (!prescriber.name) errors.push('name is missing');
  if (prescriber.npi && !NPI_PATTERN.test(prescriber.npi.replace(/[\s-]/g, ''))) {
    errors.push('npi must be 10 digits');
  }
  if (prescriber.dea && !DEA_PATTERN.test(prescriber.dea.replace(/[\s-]/g, '').toUpperCase())) {
    errors.push('dea must be two letters followed by seven digits');
  }
  return errors;
};

type AcceptancePolicy = Pick<
  PipelineConfig,
  'acceptanceThreshold' | 'aliasAcceptanceThreshold' | 'fuzzyAcceptanceThreshold'
>;

/** Top candidate when it clears the threshold for its match kind, else null. */
export const chooseResolution = (
  candidates: readonly KnowledgeMatch[],
  policy: AcceptancePolicy
): KnowledgeMatch | null => {
  const top = candidates[0];
  if (!top) return null;

  const threshold =
    top.match_kind === 'BRAND_ALIAS'
      ? policy.aliasAcceptanceThreshold
      : top.match_kind === 'FUZZY'
        ? policy.fuzzyAcceptanceThreshold
        : policy.acceptanceThreshold;
  return top.match_score >= threshold ? top : null;
};
