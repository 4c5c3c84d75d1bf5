import fs from 'fs/promises';
import { z } from 'zod';
import { normalizeKey, stripDrugName } from '../../utils/similarity';

export interface KnowledgeEntry {
  code: string;
  canonicalName: string;
  synonyms: string[];
  brandNames: string[];
  ingredients: string[];
}

/** Drug knowledge graph as seen by the resolver. Reads only. */
export interface KnowledgeStore {
  /** Concepts whose canonical name or synonym matches `name`. */
  lookup(name: string, signal?: AbortSignal): Promise<KnowledgeEntry[]>;
  /** Neighbourhood of `term`, nearest first by trigram overlap. */
  search(term: string, limit: number, signal?: AbortSignal): Promise<KnowledgeEntry[]>;
  ping(signal?: AbortSignal): Promise<void>;
}

const conceptSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  synonyms: z.array(z.string()).default([]),
  brand_names: z.array(z.string()).default([]),
  ingredients: z.array(z.string()).default([]),
});

const vocabularySchema = z.object({
  version: z.string().optional(),
  concepts: z.array(conceptSchema),
});

export const parseVocabulary = (json: unknown): KnowledgeEntry[] =>
  vocabularySchema.parse(json).concepts.map((concept) => ({
    code: concept.code,
    canonicalName: concept.name,
    synonyms: concept.synonyms,
    brandNames: concept.brand_names,
    ingredients: concept.ingredients,
  }));

export const readVocabularyFile = async (filePath: string): Promise<KnowledgeEntry[]> => {
  const content = await fs.readFile(filePath, 'utf8');
  return parseVocabulary(JSON.parse(content));
};

const namesOf = (entry: KnowledgeEntry): string[] => [entry.canonicalName, ...entry.synonyms];

const trigrams = (value: string): Set<string> => {
  const grams = new Set<string>();
  const compact = value.replace(/\s+/g, ' ');
  for (let i = 0; i + 3 <= compact.length; i++) {
    grams.add(compact.slice(i, i + 3));
  }
  return grams;
};

/** Dice coefficient of two trigram sets. */
const trigramOverlap = (a: ReadonlySet<string>, b: ReadonlySet<string>): number => {
  if (!a.size || !b.size) return 0;
  let shared = 0;
  for (const gram of a) {
    if (b.has(gram)) shared++;
  }
  return (2 * shared) / (a.size + b.size);
};

const searchKey = (value: string): string => stripDrugName(value) || normalizeKey(value);

/**
 * Offline vocabulary snapshot used for exact and normalized lookups. Built
 * once at start-up and never mutated.
 */
export class VocabularyIndex {
  private readonly exactIndex = new Map<string, KnowledgeEntry[]>();
  private readonly normalizedIndex = new Map<string, { entry: KnowledgeEntry; term: string }[]>();

  constructor(entries: readonly KnowledgeEntry[]) {
    const sorted = [...entries].sort((a, b) => a.code.localeCompare(b.code));
    for (const entry of sorted) {
      const exactKey = normalizeKey(entry.canonicalName);
      this.exactIndex.set(exactKey, [...(this.exactIndex.get(exactKey) ?? []), entry]);

      for (const term of namesOf(entry)) {
        const key = stripDrugName(term);
        if (!key) continue;
        const bucket = this.normalizedIndex.get(key) ?? [];
        if (!bucket.some((item) => item.entry.code === entry.code)) {
          bucket.push({ entry, term });
        }
        this.normalizedIndex.set(key, bucket);
      }
    }
  }

  exact(name: string): KnowledgeEntry[] {
    return this.exactIndex.get(normalizeKey(name)) ?? [];
  }

  normalized(name: string): { entry: KnowledgeEntry; term: string }[] {
    const key = stripDrugName(name);
    return key ? this.normalizedIndex.get(key) ?? [] : [];
  }
}

/** Serves the knowledge-graph capability from an in-process vocabulary. */
export class JsonKnowledgeStore implements KnowledgeStore {
  private readonly entries: KnowledgeEntry[];

  constructor(entries: readonly KnowledgeEntry[]) {
    this.entries = [...entries].sort((a, b) => a.code.localeCompare(b.code));
  }

  static async fromFile(filePath: string): Promise<JsonKnowledgeStore> {
    return new JsonKnowledgeStore(await readVocabularyFile(filePath));
  }

  async lookup(name: string): Promise<KnowledgeEntry[]> {
    const key = normalizeKey(name);
    const stripped = stripDrugName(name);
    return this.entries.filter((entry) =>
      namesOf(entry).some(
        (term) => normalizeKey(term) === key || (stripped !== '' && stripDrugName(term) === stripped)
      )
    );
  }

  async search(term: string, limit: number): Promise<KnowledgeEntry[]> {
    const wanted = trigrams(searchKey(term));
    if (!wanted.size) return [];

    return this.entries
      .map((entry) => ({
        entry,
        overlap: Math.max(...namesOf(entry).map((name) => trigramOverlap(wanted, trigrams(searchKey(name))))),
      }))
      .filter(({ overlap }) => overlap > 0)
      .sort((a, b) => b.overlap - a.overlap || a.entry.code.localeCompare(b.entry.code))
      .slice(0, limit)
      .map(({ entry }) => entry);
  }

  async ping(): Promise<void> {
    if (!this.entries.length) {
      throw new Error('Knowledge store has no concepts loaded.');
    }
  }
}
