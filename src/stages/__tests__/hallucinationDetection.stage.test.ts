import { describe, expect, it } from 'vitest';
import { applyUpdate, createRecord } from '../../pipeline/prescription.record';
import { ModelGateway } from '../../services/model/model.gateway';
import { Tracer } from '../../services/trace.service';
import { DrugEntry, KnowledgeMatch, PrescriptionRecord } from '../../types/PrescriptionTypes';
import { answer, GATEWAY_OPTIONS, refused, ScriptedModelProvider, silentLogger, testImage } from '../../__tests__/support/fakes';
import { groundingFlag, HallucinationDetectionStage, tracedInSource } from '../hallucinationDetection.stage';
import { StageContext } from '../stage';

const SOURCE = 'Jane Roe\nKeflex 500mg BID\nAmoxcilin 250mg TID\nDr. Alan Smith';

const resolvedAs = (canonical: string, via: string, kind: KnowledgeMatch['match_kind']): KnowledgeMatch => ({
  code: `RX-${canonical}`,
  canonical_name: canonical,
  match_kind: kind,
  match_score: kind === 'BRAND_ALIAS' ? 0.9 : 1,
  matched_via: via,
});

const entry = (name: string, resolved: KnowledgeMatch | null, candidates: KnowledgeMatch[] = []): DrugEntry => ({
  raw_text: `${name} 500mg`,
  name,
  candidates: resolved ? [resolved, ...candidates] : candidates,
  resolved,
  hallucination_flag: null,
  dosage: '500mg',
  frequency: '',
  route: '',
  quantity: '',
  duration: '',
  instructions: '',
});

const recordWith = (entries: DrugEntry[]): PrescriptionRecord => {
  const record = createRecord(testImage());
  applyUpdate(record, 'image_extraction', {
    raw_extraction: {
      text: SOURCE,
      patient_section: 'Jane Roe',
      prescriber_section: 'Dr. Alan Smith',
      medication_lines: ['Keflex 500mg BID', 'Amoxcilin 250mg TID'],
      date_written: null,
      legible: true,
      confidence: 0.9,
      ocr_hint: null,
    },
  });
  applyUpdate(record, 'patient_info', {
    patient: {
      name: 'Jane Roe',
      date_of_birth: null,
      age: 45,
      gender: null,
      address: null,
      identifiers: [],
      confidence: 0.8,
      validated: false,
      validation_errors: ['date_of_birth is missing'],
    },
  });
  applyUpdate(record, 'drug_resolution', { drug_entries: entries });
  return record;
};

const setup = () => {
  const provider = new ScriptedModelProvider();
  const tracer = new Tracer([], silentLogger);
  const gateway = new ModelGateway(provider, GATEWAY_OPTIONS, tracer, silentLogger);
  const stage = new HallucinationDetectionStage(gateway, { hallucinationSimilarityFloor: 0.5 });
  const context: StageContext = { recordId: 'rec-1', signal: new AbortController().signal, tracer, options: {} };
  return { provider, stage, context };
};

const ENTRIES = (): DrugEntry[] => [
  entry('Keflex', resolvedAs('cephalexin', 'Keflex', 'BRAND_ALIAS')),
  entry('Lipitor', resolvedAs('atorvastatin', 'Lipitor', 'BRAND_ALIAS')),
  entry('Amoxcilin', null, [resolvedAs('amoxicillin', 'amoxicillin', 'FUZZY')]),
];

describe('groundingFlag', () => {
  it('marks unresolved entries by whether candidates exist', () => {
    expect(groundingFlag(entry('Amoxcilin', null, [resolvedAs('amoxicillin', 'amoxicillin', 'FUZZY')]), 0.5)).toBe(
      'AMBIGUOUS_RESOLUTION'
    );
    expect(groundingFlag(entry('Zyrtec', null), 0.5)).toBe('UNGROUNDED');
  });

  it('compares brand matches against the brand spelling', () => {
    expect(groundingFlag(entry('Keflex', resolvedAs('cephalexin', 'Keflex', 'BRAND_ALIAS')), 0.5)).toBeNull();
  });

  it('flags a resolution that diverges from what was written', () => {
    expect(groundingFlag(entry('Zyrtec', resolvedAs('cephalexin', 'cephalexin', 'EXACT')), 0.5)).toBe(
      'CANONICAL_DIVERGENCE'
    );
  });
});

describe('tracedInSource', () => {
  it('looks for the drug name in the transcription', () => {
    expect(tracedInSource(entry('Keflex', null), SOURCE)).toBe(true);
    expect(tracedInSource(entry('Lipitor', null), SOURCE)).toBe(false);
  });
});

describe('HallucinationDetectionStage', () => {
  it('flags entries the verifier could not trace and only annotates the record', async () => {
    const { provider, stage, context } = setup();
    provider.script(
      'hallucination_detection',
      answer({
        drugs: [
          { index: 0, supported: true, note: '' },
          { index: 1, supported: false, note: 'not on the image' },
          { index: 7, supported: false, note: 'out of range' },
        ],
        unsupported_patient_fields: ['age', 'favourite_colour'],
        unsupported_prescriber_fields: [],
      })
    );
    const record = recordWith(ENTRIES());
    const before = record.drug_entries.map((e) => ({ raw_text: e.raw_text, resolved: e.resolved }));

    const result = await stage.run(record, context);
    applyUpdate(record, stage.id, result.updates);

    expect(result.status).toBe('SUCCESS_WITH_WARNINGS');
    expect(result.warnings).toEqual(['2 drug entries flagged.', 'Unsupported patient fields: age.']);
    expect(record.drug_entries.map((e) => e.hallucination_flag)).toEqual([
      null,
      'UNSUPPORTED_BY_SOURCE',
      'AMBIGUOUS_RESOLUTION',
    ]);
    expect(record.drug_entries.map((e) => ({ raw_text: e.raw_text, resolved: e.resolved }))).toEqual(before);
    expect(record.hallucination_report).toEqual({
      unsupported_patient_fields: ['age'],
      unsupported_prescriber_fields: [],
      flagged_drug_count: 2,
      verification_model: 'model-a',
    });
  });

  it('falls back to local checks when the verifier is unavailable', async () => {
    const { provider, stage, context } = setup();
    provider.always('hallucination_detection', refused());
    const record = recordWith(ENTRIES());

    const result = await stage.run(record, context);

    expect(result.status).toBe('FAILED_RECOVERABLE');
    expect(result.error?.code).toBe('MODEL_UNAVAILABLE');
    expect(result.warnings[0]).toBe('Verification model unavailable; only local grounding checks were applied.');
    expect(result.updates.drug_flags).toEqual([
      { index: 1, flag: 'UNSUPPORTED_BY_SOURCE' },
      { index: 2, flag: 'AMBIGUOUS_RESOLUTION' },
    ]);
    expect(result.updates.hallucination_report?.verification_model).toBeNull();
  });
});
