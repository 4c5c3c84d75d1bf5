import { PipelineConfig } from '../config';
import { KnowledgeStoreDegradedError, StageHardDependencyMissingError } from '../errors/PipelineErrors';
import { KnowledgeResolver } from '../services/knowledge/knowledge.resolver';
import { ModelGateway } from '../services/model/model.gateway';
import { DrugEntry, PrescriptionRecord, StageId } from '../types/PrescriptionTypes';
import { buildDrugsPrompt, SYSTEM_PROMPT } from './prompts';
import { drugsSchema } from './schemas';
import { modelFailure, RecordView, Stage, StageContext, StageResult, successStatus } from './stage';
import { chooseResolution } from './validation';

type DrugResolutionPolicy = Pick<
  PipelineConfig,
  'acceptanceThreshold' | 'aliasAcceptanceThreshold' | 'fuzzyAcceptanceThreshold'
>;

/**
 * Lists the prescribed drug lines and grounds each one against the knowledge
 * graph. Every line the model returns becomes an entry, resolved or not.
 */
export class DrugResolutionStage implements Stage {
  readonly id: StageId = 'drug_resolution';
  readonly critical = false;
  readonly hardDependencies: readonly (keyof PrescriptionRecord)[] = ['raw_extraction'];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly resolver: KnowledgeResolver,
    private readonly policy: DrugResolutionPolicy
  ) {}

  async run(record: RecordView, context: StageContext): Promise<StageResult> {
    const extraction = record.raw_extraction;
    if (!extraction) throw new StageHardDependencyMissingError(this.id, 'raw_extraction');

    const result = await this.gateway.completeStructured(
      { purpose: this.id, systemInstruction: SYSTEM_PROMPT, prompt: buildDrugsPrompt(extraction) },
      drugsSchema,
      { recordId: context.recordId, stage: this.id, signal: context.signal }
    );
    if (!result.ok) {
      return modelFailure(result.error, 'FAILED_RECOVERABLE');
    }

    const { value: output, modelId, attempts } = result.value;
    const entries: DrugEntry[] = [];
    const warnings: string[] = [];
    let degraded = false;
    let degradedUnresolved = 0;

    for (const line of output.drugs) {
      const query = line.name || line.raw_text;
      const resolution = await this.resolver.resolve(query, context.signal);
      context.tracer.emit({
        kind: 'knowledge_lookup',
        recordId: context.recordId,
        stage: this.id,
        query: resolution.query,
        matchCount: resolution.matches.length,
        extendedSearch: resolution.usedExtendedSearch,
        degraded: resolution.degraded,
      });

      const resolved = chooseResolution(resolution.matches, this.policy);
      if (resolution.degraded) {
        degraded = true;
        if (resolution.usedExtendedSearch && !resolved) degradedUnresolved++;
      }
      if (!resolved) {
        warnings.push(
          resolution.matches.length
            ? `"${line.raw_text}" left unresolved with ${resolution.matches.length} candidate(s).`
            : `"${line.raw_text}" has no knowledge graph match.`
        );
      }

      entries.push({
        raw_text: line.raw_text,
        name: line.name,
        candidates: resolution.matches,
        resolved,
        hallucination_flag: null,
        dosage: line.dosage,
        frequency: line.frequency,
        route: line.route,
        quantity: line.quantity,
        duration: line.duration,
        instructions: line.instructions,
      });
    }

    if (!entries.length) {
      warnings.push('No drug lines found on the prescription.');
    }

    if (degradedUnresolved > 0) {
      const error = new KnowledgeStoreDegradedError(
        `${degradedUnresolved} drug line(s) could not be resolved while the knowledge store was unavailable.`
      );
      return {
        status: 'FAILED_RECOVERABLE',
        updates: { drug_entries: entries },
        warnings,
        modelId,
        attempts,
        degraded,
        error: { code: error.code, message: error.message },
      };
    }
    if (degraded) {
      warnings.push('Knowledge store unavailable; relation data may be incomplete.');
    }

    return {
      status: successStatus(warnings),
      updates: { drug_entries: entries },
      warnings,
      modelId,
      attempts,
      degraded,
    };
  }
}
