import fs from 'fs/promises';
import path from 'path';
import { normalizeKey, stripDrugName } from '../../utils/similarity';

export interface AliasMapping {
  brand: string;
  generic: string;
  confidence: number;
  source: string;
}

export interface AliasSource {
  name: string;
  content: string;
  defaultConfidence?: number;
}

export interface AliasCounterpart {
  /** Name on the other side of the mapping. */
  name: string;
  /** Name on the side that matched the query. */
  via: string;
  confidence: number;
}

const BRAND_COLUMNS = ['brand', 'brand_name', 'brandname', 'brands', 'trade_name', 'tradename', 'proprietary_name'];
const GENERIC_COLUMNS = ['generic', 'generic_name', 'genericname', 'generics', 'ingredient', 'active_ingredient', 'inn'];
const CONFIDENCE_COLUMNS = ['confidence', 'score'];

const MIN_ALIAS_CONFIDENCE = 0.85;
const MAX_ALIAS_CONFIDENCE = 0.95;

export const clampAliasConfidence = (value: number): number =>
  Math.min(MAX_ALIAS_CONFIDENCE, Math.max(MIN_ALIAS_CONFIDENCE, value));

const detectDelimiter = (header: string): string => {
  if (header.includes('\t')) return '\t';
  if (header.includes(';') && !header.includes(',')) return ';';
  return ',';
};

/** Splits one delimited line, honouring double-quoted cells ("" escapes a quote). */
export const splitRow = (line: string, delimiter: string): string[] => {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === delimiter) {
      cells.push(cell.trim());
      cell = '';
    } else {
      cell += ch;
    }
  }
  cells.push(cell.trim());
  return cells;
};

const columnKey = (header: string): string =>
  header.trim().toLowerCase().replace(/[\s-]+/g, '_');

const findColumn = (headers: string[], names: string[]): number =>
  headers.findIndex((header) => names.includes(header));

/**
 * Parses a brand/generic mapping table. Column names are matched
 * case-insensitively against common synonyms for "brand" and "generic".
 */
export const parseAliasTable = (source: AliasSource, fallbackConfidence: number): AliasMapping[] => {
  const lines = source.content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim());
  if (!lines.length) return [];

  const delimiter = detectDelimiter(lines[0]);
  const headers = splitRow(lines[0], delimiter).map(columnKey);
  const brandIndex = findColumn(headers, BRAND_COLUMNS);
  const genericIndex = findColumn(headers, GENERIC_COLUMNS);
  const confidenceIndex = findColumn(headers, CONFIDENCE_COLUMNS);

  if (brandIndex < 0 || genericIndex < 0) {
    throw new Error(`Alias source ${source.name} has no brand/generic columns (found: ${headers.join(', ')}).`);
  }

  const defaultConfidence = clampAliasConfidence(source.defaultConfidence ?? fallbackConfidence);
  const mappings: AliasMapping[] = [];

  for (const line of lines.slice(1)) {
    const cells = splitRow(line, delimiter);
    const brand = cells[brandIndex] ?? '';
    const generic = cells[genericIndex] ?? '';
    if (!brand || !generic) continue;

    const rowConfidence = confidenceIndex >= 0 ? Number.parseFloat(cells[confidenceIndex] ?? '') : Number.NaN;
    mappings.push({
      brand,
      generic,
      confidence: Number.isNaN(rowConfidence) ? defaultConfidence : clampAliasConfidence(rowConfidence),
      source: source.name,
    });
  }
  return mappings;
};

const keysFor = (name: string): string[] =>
  [...new Set([normalizeKey(name), stripDrugName(name)])].filter(Boolean);

/**
 * Bidirectional brand/generic table. Sources are merged in load order and a
 * later mapping for the same brand replaces an earlier one. Read-only once built.
 */
export class AliasTable {
  private constructor(
    private readonly byBrand: ReadonlyMap<string, AliasMapping>,
    private readonly byGeneric: ReadonlyMap<string, readonly AliasMapping[]>
  ) {}

  static empty(): AliasTable {
    return new AliasTable(new Map(), new Map());
  }

  static fromSources(sources: readonly AliasSource[], defaultConfidence = 0.9): AliasTable {
    const byBrand = new Map<string, AliasMapping>();
    for (const source of sources) {
      for (const mapping of parseAliasTable(source, defaultConfidence)) {
        for (const key of keysFor(mapping.brand)) {
          byBrand.set(key, mapping);
        }
      }
    }

    const byGeneric = new Map<string, AliasMapping[]>();
    for (const mapping of new Set(byBrand.values())) {
      for (const key of keysFor(mapping.generic)) {
        const bucket = byGeneric.get(key) ?? [];
        if (!bucket.includes(mapping)) bucket.push(mapping);
        byGeneric.set(key, bucket);
      }
    }
    for (const bucket of byGeneric.values()) {
      bucket.sort((a, b) => a.brand.localeCompare(b.brand));
    }

    return new AliasTable(byBrand, byGeneric);
  }

  static async loadFiles(filePaths: readonly string[], defaultConfidence = 0.9): Promise<AliasTable> {
    const sources: AliasSource[] = [];
    for (const filePath of filePaths) {
      sources.push({ name: path.basename(filePath), content: await fs.readFile(filePath, 'utf8') });
    }
    return AliasTable.fromSources(sources, defaultConfidence);
  }

  get size(): number {
    return new Set(this.byBrand.values()).size;
  }

  genericFor(brand: string): AliasMapping | undefined {
    for (const key of keysFor(brand)) {
      const mapping = this.byBrand.get(key);
      if (mapping) return mapping;
    }
    return undefined;
  }

  brandsFor(generic: string): readonly AliasMapping[] {
    for (const key of keysFor(generic)) {
      const mappings = this.byGeneric.get(key);
      if (mappings) return mappings;
    }
    return [];
  }

  counterparts(name: string): AliasCounterpart[] {
    const found = new Map<string, AliasCounterpart>();
    const generic = this.genericFor(name);
    if (generic) {
      found.set(normalizeKey(generic.generic), {
        name: generic.generic,
        via: generic.brand,
        confidence: generic.confidence,
      });
    }
    for (const mapping of this.brandsFor(name)) {
      const key = normalizeKey(mapping.brand);
      if (!found.has(key)) {
        found.set(key, { name: mapping.brand, via: mapping.generic, confidence: mapping.confidence });
      }
    }
    return [...found.values()];
  }
}
