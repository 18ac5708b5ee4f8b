import synonyms from './column_synonyms.json';
import { CellValue } from '../domain/types';
import { SchemaError } from '../utils/errors';
import { logger } from '../utils/logger';

export const CANONICAL_FIELDS = [
  'item_number',
  'date',
  'quantity',
  'part_name',
  'description2',
  'current_stock',
  'remarks',
  'process',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export interface TableSchema {
  name: string;
  required: readonly CanonicalField[];
  optional: readonly CanonicalField[];
}

export const USAGE_SCHEMA: TableSchema = {
  name: 'usage',
  required: ['item_number', 'date', 'quantity'],
  optional: ['part_name', 'description2', 'current_stock', 'remarks'],
};

export const PROCESS_MAPPING_SCHEMA: TableSchema = {
  name: 'process mapping',
  required: ['process', 'item_number'],
  optional: ['part_name'],
};

export const COLUMN_LABELS: Record<CanonicalField, string> = {
  item_number: 'Item Number',
  date: 'Date',
  quantity: 'Quantity',
  part_name: 'Part Name',
  description2: 'Description 2',
  current_stock: 'Current Stock',
  remarks: 'Remarks',
  process: 'Process',
};

// the assignment checks the JSON file covers every field
const SYNONYMS: Record<CanonicalField, string[]> = synonyms;

export const normalizeHeader = (header: string): string =>
  header.trim().toLowerCase().replace(/[\s_\-.]+/g, ' ').trim();

const SYNONYM_INDEX: ReadonlyMap<string, CanonicalField> = new Map(
  CANONICAL_FIELDS.flatMap((field) => SYNONYMS[field].map((synonym): [string, CanonicalField] => [normalizeHeader(synonym), field]))
);

export const canonicalFieldFor = (header: string): CanonicalField | undefined => SYNONYM_INDEX.get(normalizeHeader(header));

export class ResolvedColumns {
  constructor(private readonly indexes: ReadonlyMap<CanonicalField, number>, public readonly headers: readonly string[]) {}

  has(field: CanonicalField): boolean {
    return this.indexes.has(field);
  }

  headerFor(field: CanonicalField): string | undefined {
    const index = this.indexes.get(field);
    return index === undefined ? undefined : this.headers[index];
  }

  cell(row: readonly CellValue[], field: CanonicalField): CellValue {
    const index = this.indexes.get(field);
    if (index === undefined) return null;
    return row[index] ?? null;
  }
}

/**
 * Maps source headers onto the schema's canonical fields. Unknown headers
 * are ignored; when two headers name the same field the left-most wins.
 */
export function resolveColumns(headers: readonly string[], schema: TableSchema, source: string): ResolvedColumns {
  const wanted = new Set<CanonicalField>([...schema.required, ...schema.optional]);
  const indexes = new Map<CanonicalField, number>();

  headers.forEach((header, index) => {
    const field = canonicalFieldFor(header);
    if (!field || !wanted.has(field)) return;
    if (indexes.has(field)) {
      logger.debug(`Ignoring duplicate ${COLUMN_LABELS[field]} column`, { source, header });
      return;
    }
    indexes.set(field, index);
  });

  const missing = schema.required.filter((field) => !indexes.has(field)).map((field) => COLUMN_LABELS[field]);
  if (missing.length > 0) {
    logger.warn(`Required ${schema.name} columns not found`, { source, missing, headers });
    throw new SchemaError(`${source}: missing required column(s): ${missing.join(', ')}`, source, missing);
  }

  return new ResolvedColumns(indexes, headers);
}
