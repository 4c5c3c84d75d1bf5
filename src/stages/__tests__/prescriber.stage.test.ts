import { describe, expect, it } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG } from '../../config';
import { answer, extractedRecord, stageHarness } from '../../__tests__/support/fakes';
import { PrescriberStage } from '../prescriber.stage';

const setup = () => {
  const harness = stageHarness();
  return { ...harness, stage: new PrescriberStage(harness.gateway, DEFAULT_PIPELINE_CONFIG) };
};

describe('PrescriberStage', () => {
  it('accepts formatted registration numbers', async () => {
    const { provider, stage, context } = setup();
    provider.script(
      'prescriber',
      answer({
        name: 'Dr. Alan Smith',
        credentials: 'MD',
        npi: '123-456-7893',
        dea: 'ab1234563',
        signature_present: true,
        confidence: 0.9,
      })
    );

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('SUCCESS');
    expect(result.updates.prescriber).toMatchObject({
      name: 'Dr. Alan Smith',
      credentials: 'MD',
      npi: '123-456-7893',
      clinic: null,
      signature_present: true,
      validated: true,
      validation_errors: [],
    });
    expect(result.modelId).toBe('model-a');
  });

  it('records malformed numbers and a missing signature as warnings', async () => {
    const { provider, stage, context } = setup();
    provider.script('prescriber', answer({ name: 'Dr. Alan Smith', npi: '12345', dea: 'A1234567', confidence: 0.9 }));

    const result = await stage.run(extractedRecord(), context);

    expect(result.status).toBe('SUCCESS_WITH_WARNINGS');
    expect(result.warnings).toEqual([
      'prescriber npi must be 10 digits',
      'prescriber dea must be two letters followed by seven digits',
      'No prescriber signature detected.',
    ]);
    expect(result.updates.prescriber).toMatchObject({
      signature_present: false,
      validated: false,
      validation_errors: ['npi must be 10 digits', 'dea must be two letters followed by seven digits'],
    });
  });

  it('flags a missing name', async () => {
    const { provider, stage, context } = setup();
    provider.script('prescriber', answer({ name: '  ', signature_present: true, confidence: 0.8 }));

    const result = await stage.run(extractedRecord(), context);

    expect(result.updates.prescriber).toMatchObject({ name: null, validation_errors: ['name is missing'] });
  });
});
