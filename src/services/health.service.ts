import { errorMessage } from '../errors/PipelineErrors';
import { raceAbort, timeoutScope } from '../utils/async';
import { createLogger, Logger } from '../utils/logger';
import { KnowledgeStore } from './knowledge/knowledge.store';

export interface DependencyHealth {
  reachable: boolean;
  latency_ms: number;
  detail?: string;
  error?: string;
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  checked_at: string;
  dependencies: {
    model_gateway: DependencyHealth;
    knowledge_store: DependencyHealth;
  };
}

/** Anything that can answer a ping; resolves with an optional detail string. */
export interface Pingable {
  ping(signal?: AbortSignal): Promise<string | void>;
}

export class HealthService {
  private readonly logger: Logger;

  constructor(
    private readonly gateway: Pingable,
    private readonly store: Pick<KnowledgeStore, 'ping'>,
    private readonly timeoutMs: number,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('health');
  }

  async status(): Promise<HealthStatus> {
    const [modelGateway, knowledgeStore] = await Promise.all([
      this.probe('model_gateway', this.gateway),
      this.probe('knowledge_store', this.store),
    ]);
    return {
      status: modelGateway.reachable && knowledgeStore.reachable ? 'ok' : 'degraded',
      checked_at: new Date().toISOString(),
      dependencies: { model_gateway: modelGateway, knowledge_store: knowledgeStore },
    };
  }

  private async probe(name: string, target: Pingable): Promise<DependencyHealth> {
    const started = Date.now();
    const scope = timeoutScope(this.timeoutMs);
    try {
      const detail = await raceAbort(target.ping(scope.signal), scope.signal);
      return {
        reachable: true,
        latency_ms: Date.now() - started,
        ...(typeof detail === 'string' ? { detail } : {}),
      };
    } catch (error) {
      const message = scope.timedOut() ? `No answer within ${this.timeoutMs}ms.` : errorMessage(error);
      this.logger.warn('Dependency unreachable', { dependency: name, error: message });
      return { reachable: false, latency_ms: Date.now() - started, error: message };
    } finally {
      scope.dispose();
    }
  }
}
