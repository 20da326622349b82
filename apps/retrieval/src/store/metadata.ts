/**
 * Normalization of ingested documents into stored records
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import {
  DocumentInput,
  DocumentRecord,
  Jurisdiction,
  JURISDICTIONS,
  LegalMetadata,
} from './types.js';

const log = createLogger('store.metadata');

const jurisdictionSchema = z.enum(JURISDICTIONS);

const metadataSchema = z.object({
  case_name: z.string().default('Unknown'),
  citation: z.string().default('N/A'),
  court: z.string().default('unknown'),
  date_filed: z.string().default(''),
  document_type: z.string().default('case_law'),
  url: z.string().default(''),
});

export function normalizeJurisdiction(value: string | undefined): Jurisdiction {
  if (value === undefined) {
    return 'unknown';
  }

  const parsed = jurisdictionSchema.safeParse(value.trim().toLowerCase());
  if (parsed.success) {
    return parsed.data;
  }

  log.warn({ jurisdiction: value }, 'Unrecognized jurisdiction, storing as unknown');
  return 'unknown';
}

export function normalizeMetadata(input: DocumentInput): LegalMetadata {
  // Non-string values (nulls from upstream JSON) fall back to the sentinel
  const pick = (value: unknown): string | undefined =>
    typeof value === 'string' ? value : undefined;

  const base = metadataSchema.parse({
    case_name: pick(input.case_name),
    citation: pick(input.citation),
    court: pick(input.court),
    date_filed: pick(input.date_filed),
    document_type: pick(input.document_type),
    url: pick(input.url),
  });

  return {
    ...base,
    jurisdiction: normalizeJurisdiction(pick(input.jurisdiction)),
  };
}

/**
 * Build a stored record. Returns null when the document has no text to
 * embed; `generateId` is only called for a kept document without an id.
 */
export function normalizeDocument(input: DocumentInput, generateId: () => string): DocumentRecord | null {
  const text = typeof input.text === 'string'
    ? input.text
    : typeof input.snippet === 'string' ? input.snippet : '';

  if (!text.trim()) {
    return null;
  }

  const id = input.id !== undefined && String(input.id).trim() !== ''
    ? String(input.id)
    : generateId();

  return {
    id,
    text,
    metadata: normalizeMetadata(input),
  };
}
