import { errorMessage } from '../../errors/PipelineErrors';
import { KnowledgeMatch, MatchKind } from '../../types/PrescriptionTypes';
import { raceAbort, timeoutScope } from '../../utils/async';
import { createLogger, Logger } from '../../utils/logger';
import { nameSimilarity, normalizeKey } from '../../utils/similarity';
import { AliasTable } from './alias.table';
import { KnowledgeEntry, KnowledgeStore, VocabularyIndex } from './knowledge.store';

export interface KnowledgeResolverOptions {
  /** Minimum fuzzy score; anything below is discarded. */
  fuzzyFloor: number;
  fuzzyTopK: number;
  storeTimeoutMs: number;
}

export interface Resolution {
  query: string;
  matches: KnowledgeMatch[];
  degraded: boolean;
  degradedReason?: string;
  /** True when steps past exact/normalized were needed. */
  usedExtendedSearch: boolean;
}

export const EXACT_SCORE = 1.0;
export const NORMALIZED_SCORE = 0.95;
export const FUZZY_SCORE_CAP = 0.94;

const KIND_PRIORITY: Record<MatchKind, number> = {
  EXACT: 0,
  NORMALIZED: 1,
  BRAND_ALIAS: 2,
  FUZZY: 3,
};

export const compareMatches = (a: KnowledgeMatch, b: KnowledgeMatch): number =>
  b.match_score - a.match_score ||
  KIND_PRIORITY[a.match_kind] - KIND_PRIORITY[b.match_kind] ||
  a.code.localeCompare(b.code);

/** Keeps the best match per code, then orders by score, kind and code. */
export const mergeMatches = (matches: readonly KnowledgeMatch[]): KnowledgeMatch[] => {
  const best = new Map<string, KnowledgeMatch>();
  for (const match of matches) {
    const current = best.get(match.code);
    if (!current || compareMatches(match, current) < 0) {
      best.set(match.code, match);
    }
  }
  return [...best.values()].sort(compareMatches);
};

const toMatch = (
  entry: KnowledgeEntry,
  kind: MatchKind,
  score: number,
  matchedVia: string
): KnowledgeMatch => ({
  code: entry.code,
  canonical_name: entry.canonicalName,
  match_kind: kind,
  match_score: score,
  matched_via: matchedVia,
  relations: { brand_names: [...entry.brandNames], ingredients: [...entry.ingredients] },
});

class StoreUnavailable extends Error {}

/**
 * Grounds a free-text drug name against the vocabulary: exact, normalized,
 * brand alias, then fuzzy. Exact or normalized hits end the search.
 */
export class KnowledgeResolver {
  private readonly logger: Logger;

  constructor(
    private readonly vocabulary: VocabularyIndex,
    private readonly aliases: AliasTable,
    private readonly store: KnowledgeStore,
    private readonly options: KnowledgeResolverOptions,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('knowledge-resolver');
  }

  async resolve(name: string, signal?: AbortSignal): Promise<Resolution> {
    const query = normalizeKey(name);
    const resolution: Resolution = { query, matches: [], degraded: false, usedExtendedSearch: false };
    if (!query) return resolution;

    const local = this.exactMatches(query);
    if (!local.length) local.push(...this.normalizedMatches(query));
    if (local.length) {
      resolution.matches = mergeMatches(await this.enrich(local, resolution, signal));
      return resolution;
    }

    resolution.usedExtendedSearch = true;
    const found: KnowledgeMatch[] = [];
    try {
      found.push(...(await this.aliasMatches(query, signal)));
      found.push(...(await this.fuzzyMatches(query, signal)));
    } catch (error) {
      if (!(error instanceof StoreUnavailable)) throw error;
      this.markDegraded(resolution, error.message);
    }
    resolution.matches = mergeMatches(found);
    return resolution;
  }

  private exactMatches(query: string): KnowledgeMatch[] {
    return this.vocabulary
      .exact(query)
      .map((entry) => toMatch(entry, 'EXACT', EXACT_SCORE, entry.canonicalName));
  }

  private normalizedMatches(query: string): KnowledgeMatch[] {
    return this.vocabulary
      .normalized(query)
      .map(({ entry, term }) => toMatch(entry, 'NORMALIZED', NORMALIZED_SCORE, term));
  }

  /** Refreshes relation data from the store; local matches survive an outage. */
  private async enrich(
    matches: KnowledgeMatch[],
    resolution: Resolution,
    signal?: AbortSignal
  ): Promise<KnowledgeMatch[]> {
    const enriched: KnowledgeMatch[] = [];
    for (const match of matches) {
      if (resolution.degraded) {
        enriched.push(match);
        continue;
      }
      try {
        const entries = await this.fromStore((s) => this.store.lookup(match.canonical_name, s), signal);
        const same = entries.find((entry) => entry.code === match.code);
        enriched.push(
          same
            ? { ...match, relations: { brand_names: [...same.brandNames], ingredients: [...same.ingredients] } }
            : match
        );
      } catch (error) {
        if (!(error instanceof StoreUnavailable)) throw error;
        this.markDegraded(resolution, error.message);
        enriched.push(match);
      }
    }
    return enriched;
  }

  private async aliasMatches(query: string, signal?: AbortSignal): Promise<KnowledgeMatch[]> {
    const matches: KnowledgeMatch[] = [];
    for (const counterpart of this.aliases.counterparts(query)) {
      const entries = await this.fromStore((s) => this.store.lookup(counterpart.name, s), signal);
      for (const entry of entries) {
        matches.push(toMatch(entry, 'BRAND_ALIAS', counterpart.confidence, counterpart.via));
      }
    }
    return matches;
  }

  private async fuzzyMatches(query: string, signal?: AbortSignal): Promise<KnowledgeMatch[]> {
    const { fuzzyFloor, fuzzyTopK } = this.options;
    const neighbours = await this.fromStore(
      (s) => this.store.search(query, Math.max(fuzzyTopK * 5, 25), s),
      signal
    );

    const scored: KnowledgeMatch[] = [];
    for (const entry of neighbours) {
      let bestTerm = entry.canonicalName;
      let bestScore = 0;
      for (const term of [entry.canonicalName, ...entry.synonyms]) {
        const score = Math.min(nameSimilarity(query, term), FUZZY_SCORE_CAP);
        if (score > bestScore) {
          bestScore = score;
          bestTerm = term;
        }
      }
      if (bestScore >= fuzzyFloor) {
        scored.push(toMatch(entry, 'FUZZY', bestScore, bestTerm));
      }
    }
    return mergeMatches(scored).slice(0, fuzzyTopK);
  }

  private async fromStore<T>(
    call: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const scope = timeoutScope(this.options.storeTimeoutMs, signal);
    try {
      return await raceAbort(call(scope.signal), scope.signal);
    } catch (error) {
      signal?.throwIfAborted();
      throw new StoreUnavailable(
        scope.timedOut()
          ? `Knowledge store did not answer within ${this.options.storeTimeoutMs}ms.`
          : `Knowledge store unreachable: ${errorMessage(error)}`
      );
    } finally {
      scope.dispose();
    }
  }

  private markDegraded(resolution: Resolution, reason: string): void {
    if (!resolution.degraded) {
      this.logger.warn('Knowledge store degraded, using offline vocabulary only', {
        query: resolution.query,
        reason,
      });
    }
    resolution.degraded = true;
    resolution.degradedReason ??= reason;
  }
}
