import { describe, expect, it } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG } from '../../config';
import { StageHardDependencyMissingError } from '../../errors/PipelineErrors';
import { createRecord } from '../../pipeline/prescription.record';
import { answer, extractedRecord, refused, stageHarness, testImage } from '../../__tests__/support/fakes';
import { PatientInfoStage } from '../patientInfo.stage';

const NOW = new Date('2026-01-15T00:00:00Z');

const setup = () => {
  const harness = stageHarness();
  const stage = new PatientInfoStage(harness.gateway, DEFAULT_PIPELINE_CONFIG, () => NOW);
  return { ...harness, stage };
};

describe('PatientInfoStage', () => {
  it('validates a complete patient block', async () => {
    const { provider, stage, context } = setup();
    provider.script(
      'patient_info',
      answer({
        name: 'Jane Roe',
        date_of_birth: '1980-06-16',
        age: 45,
        gender: 'F',
        identifiers: [{ type: 'MRN', value: 'MRN-0001' }],
        confidence: 0.9,
      })
    );

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('SUCCESS');
    expect(result.warnings).toEqual([]);
    expect(result.updates.patient).toEqual({
      name: 'Jane Roe',
      date_of_birth: '1980-06-16',
      age: 45,
      gender: 'F',
      address: null,
      identifiers: [{ type: 'MRN', value: 'MRN-0001' }],
      confidence: 0.9,
      validated: true,
      validation_errors: [],
    });
  });

  it('keeps a patient without date of birth as unvalidated', async () => {
    const { provider, stage, context } = setup();
    provider.script('patient_info', answer({ name: 'Jane Roe', date_of_birth: null, age: 45, confidence: 0.9 }));

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('SUCCESS_WITH_WARNINGS');
    expect(result.warnings).toEqual(['patient date_of_birth is missing']);
    expect(result.updates.patient).toMatchObject({
      name: 'Jane Roe',
      validated: false,
      validation_errors: ['date_of_birth is missing'],
    });
  });

  it('warns on low confidence', async () => {
    const { provider, stage, context } = setup();
    provider.script('patient_info', answer({ name: 'Jane Roe', date_of_birth: '1980-06-16', confidence: 0.3 }));

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('SUCCESS_WITH_WARNINGS');
    expect(result.warnings).toEqual(['Low patient extraction confidence (0.3).']);
    expect(result.updates.patient?.validated).toBe(true);
  });

  it('fails recoverably without writing when no model answers', async () => {
    const { provider, stage, context } = setup();
    provider.always('patient_info', refused());

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('FAILED_RECOVERABLE');
    expect(result.error?.code).toBe('MODEL_UNAVAILABLE');
    expect(result.updates).toEqual({});
  });

  it('requires the transcription', async () => {
    const { stage, context } = setup();

    await expect(stage.run(createRecord(testImage()), context)).rejects.toBeInstanceOf(
      StageHardDependencyMissingError
    );
  });
});
