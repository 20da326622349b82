/**
 * JSONL corpus loading for indexing runs
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import type { DocumentInput } from '../store/types.js';

const log = createLogger('ingestion.corpus');

// CourtListener identifiers for the Supreme Court and the federal circuits
const FEDERAL_COURTS = [
  'scotus', 'ca1', 'ca2', 'ca3', 'ca4', 'ca5', 'ca6', 'ca7',
  'ca8', 'ca9', 'ca10', 'ca11', 'cadc', 'cafc',
];

const optionalText = z.string().nullish().transform(value => value ?? undefined);

const corpusLineSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  text: optionalText,
  snippet: optionalText,
  case_name: optionalText,
  citation: optionalText,
  court: optionalText,
  jurisdiction: optionalText,
  date_filed: optionalText,
  document_type: optionalText,
  url: optionalText,
});

/**
 * Federal when the court code names a federal court, otherwise state
 */
export function inferJurisdiction(court: string): 'federal' | 'state' {
  const code = court.trim().toLowerCase();
  return FEDERAL_COURTS.includes(code) ? 'federal' : 'state';
}

/**
 * Read one document per line. Lines that are not JSON objects are logged
 * and skipped; a missing jurisdiction is inferred from the court code.
 */
export async function loadCorpus(filePath: string): Promise<DocumentInput[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const documents: DocumentInput[] = [];
  let rejected = 0;

  for (const [index, line] of content.split('\n').entries()) {
    if (!line.trim()) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      rejected++;
      log.warn({ line: index + 1, error: String(error) }, 'Skipping unparsable corpus line');
      continue;
    }

    const parsed = corpusLineSchema.safeParse(raw);
    if (!parsed.success) {
      rejected++;
      log.warn({ line: index + 1, issues: parsed.error.issues }, 'Skipping invalid corpus line');
      continue;
    }

    const document = parsed.data;
    if (!document.jurisdiction && document.court) {
      document.jurisdiction = inferJurisdiction(document.court);
    }
    documents.push(document);
  }

  log.info({ filePath, loaded: documents.length, rejected }, 'Loaded corpus');
  return documents;
}
