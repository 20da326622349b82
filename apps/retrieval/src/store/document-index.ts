/**
 * DocumentIndex - SQLite-backed collection of (id, vector, text, metadata)
 *
 * Vectors are stored as Float32 blobs and ranked inside SQLite with
 * sqlite-vec's vec_distance_cosine(). A collection is pinned to the
 * embedding model that wrote its first batch; vectors from any other model
 * are rejected.
 *
 * better-sqlite3 is synchronous, so writes are naturally serialized and
 * each batch upsert is a single transaction.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { rankByKeywords } from './keyword.js';
import {
  CollectionInfo,
  DocumentRecord,
  Jurisdiction,
  JURISDICTIONS,
  LegalMetadata,
  QueryResult,
  StoreError,
  StoreErrorCode,
} from './types.js';

const log = createLogger('store.document-index');

const storedMetadataSchema = z.object({
  case_name: z.string(),
  citation: z.string(),
  court: z.string(),
  jurisdiction: z.enum(JURISDICTIONS),
  date_filed: z.string(),
  document_type: z.string(),
  url: z.string(),
});

const COLLECTION_DESCRIPTION = 'Legal documents with jurisdiction metadata';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS collections (
    name TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    embedding_model TEXT,
    dimensions INTEGER,
    next_document_seq INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS documents (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    text TEXT NOT NULL,
    metadata TEXT NOT NULL,
    jurisdiction TEXT NOT NULL,
    embedding BLOB NOT NULL,
    PRIMARY KEY (collection, id)
  );

  CREATE INDEX IF NOT EXISTS idx_documents_jurisdiction
    ON documents (collection, jurisdiction);
`;

interface CollectionRow {
  name: string;
  embedding_model: string | null;
  dimensions: number | null;
}

interface DocumentRow {
  id: string;
  text: string;
  metadata: string;
}

interface RankedRow extends DocumentRow {
  distance: number;
}

interface SequenceRow {
  next_document_seq: number;
}

interface CountRow {
  count: number;
}

interface JurisdictionCountRow {
  jurisdiction: string;
  count: number;
}

export class DocumentIndex {
  private readonly db: Database.Database;
  readonly collectionName: string;

  constructor(persistPath: string, collectionName: string) {
    this.collectionName = collectionName;

    try {
      if (persistPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(persistPath)), { recursive: true });
      }
      this.db = new Database(persistPath);
      sqliteVec.load(this.db);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new StoreError(`Failed to open index at ${persistPath}`, 'OPEN_FAILED', {
        persistPath,
        error: String(error),
      });
    }

    if (this.ensureCollection()) {
      log.info({ collection: collectionName, persistPath }, 'Created new collection');
    } else {
      log.info({ collection: collectionName, persistPath }, 'Loaded existing collection');
    }
  }

  getCollectionInfo(): CollectionInfo {
    const row = this.guard('STATS_FAILED', () => this.db
      .prepare<[string], CollectionRow>('SELECT name, embedding_model, dimensions FROM collections WHERE name = ?')
      .get(this.collectionName));

    return {
      name: this.collectionName,
      embeddingModel: row?.embedding_model ?? null,
      dimensions: row?.dimensions ?? null,
    };
  }

  /**
   * Insert or replace records with their vectors. Returns the number of
   * records written. Replacing an id keeps its original insertion position.
   */
  upsert(records: DocumentRecord[], vectors: number[][], model: string): number {
    if (records.length !== vectors.length) {
      throw new StoreError(
        `Got ${vectors.length} vectors for ${records.length} records`,
        'INVALID_VECTOR_DIMENSIONS',
        { records: records.length, vectors: vectors.length }
      );
    }
    if (records.length === 0) {
      return 0;
    }

    const dimensions = vectors[0].length;
    const invalid = vectors.findIndex(vector => vector.length !== dimensions || vector.length === 0);
    if (invalid !== -1) {
      throw new StoreError(
        `Vector for ${records[invalid].id} has ${vectors[invalid].length} dimensions, expected ${dimensions}`,
        'INVALID_VECTOR_DIMENSIONS',
        { id: records[invalid].id, actualDimensions: vectors[invalid].length, expectedDimensions: dimensions }
      );
    }

    const pinModel = this.db.prepare<[string, number, string]>(
      'UPDATE collections SET embedding_model = ?, dimensions = ? WHERE name = ?'
    );
    const upsertRow = this.db.prepare<[string, string, string, string, string, Buffer]>(`
      INSERT INTO documents (collection, id, text, metadata, jurisdiction, embedding)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (collection, id) DO UPDATE SET
        text = excluded.text,
        metadata = excluded.metadata,
        jurisdiction = excluded.jurisdiction,
        embedding = excluded.embedding
    `);

    const writeBatch = this.db.transaction(() => {
      const info = this.getCollectionInfo();

      if (info.embeddingModel === null) {
        pinModel.run(model, dimensions, this.collectionName);
      } else if (info.embeddingModel !== model) {
        throw new StoreError(
          `Collection ${this.collectionName} holds ${info.embeddingModel} vectors, got ${model}`,
          'EMBEDDING_MODEL_MISMATCH',
          { expectedModel: info.embeddingModel, actualModel: model }
        );
      } else if (info.dimensions !== dimensions) {
        throw new StoreError(
          `Collection ${this.collectionName} holds ${info.dimensions}-dimensional vectors, got ${dimensions}`,
          'INVALID_VECTOR_DIMENSIONS',
          { expectedDimensions: info.dimensions, actualDimensions: dimensions }
        );
      }

      for (let i = 0; i < records.length; i++) {
        const record = records[i];
        upsertRow.run(
          this.collectionName,
          record.id,
          record.text,
          JSON.stringify(record.metadata),
          record.metadata.jurisdiction,
          encodeVector(vectors[i])
        );
      }

      return records.length;
    });

    return this.guard('STORE_FAILED', () => writeBatch());
  }

  /**
   * Nearest neighbours by cosine distance clamped to [0, 2], best first;
   * ties keep insertion order. A zero vector sits at distance 1.
   */
  queryByVector(vector: number[], jurisdiction: Jurisdiction | undefined, limit: number): QueryResult[] {
    if (limit <= 0) {
      return [];
    }

    const info = this.getCollectionInfo();
    if (info.dimensions !== null && info.dimensions !== vector.length) {
      throw new StoreError(
        `Query vector has ${vector.length} dimensions, collection holds ${info.dimensions}`,
        'INVALID_VECTOR_DIMENSIONS',
        { expectedDimensions: info.dimensions, actualDimensions: vector.length }
      );
    }

    const { where, params } = this.filterClause(jurisdiction);

    const rows = this.guard('SEARCH_FAILED', () => this.db
      .prepare<Array<string | number | Buffer>, RankedRow>(`
        SELECT id, text, metadata,
          MAX(0.0, MIN(2.0, COALESCE(vec_distance_cosine(embedding, ?), 1.0))) AS distance
        FROM documents
        WHERE ${where}
        ORDER BY distance, rowid
        LIMIT ?
      `)
      .all(encodeVector(vector), ...params, limit));

    return rows.map(row => toQueryResult(row, row.distance));
  }

  /**
   * Keyword-overlap ranking over the same filtered set
   */
  queryByText(query: string, jurisdiction: Jurisdiction | undefined, limit: number): QueryResult[] {
    if (limit <= 0) {
      return [];
    }

    const rows = this.loadRows(jurisdiction);
    return rankByKeywords(query, rows, limit)
      .map(({ index, distance }) => toQueryResult(rows[index], distance));
  }

  count(): number {
    const row = this.guard('STATS_FAILED', () => this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM documents WHERE collection = ?')
      .get(this.collectionName));
    return row?.count ?? 0;
  }

  countByJurisdiction(): Record<string, number> {
    const rows = this.guard('STATS_FAILED', () => this.db
      .prepare<[string], JurisdictionCountRow>(`
        SELECT jurisdiction, COUNT(*) AS count
        FROM documents
        WHERE collection = ?
        GROUP BY jurisdiction
        ORDER BY jurisdiction
      `)
      .all(this.collectionName));

    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[row.jurisdiction] = row.count;
    }
    return counts;
  }

  /**
   * Records in insertion order, without vectors
   */
  list(limit?: number): DocumentRecord[] {
    const rows = this.loadRows(undefined, limit);
    return rows.map(row => ({
      id: row.id,
      text: row.text,
      metadata: parseMetadata(row.metadata),
    }));
  }

  /**
   * Drop every record and the pinned model, leaving an empty collection
   */
  resetCollection(): void {
    const reset = this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM documents WHERE collection = ?').run(this.collectionName);
      this.db.prepare<[string]>('DELETE FROM collections WHERE name = ?').run(this.collectionName);
      this.ensureCollection();
    });

    this.guard('RESET_FAILED', () => reset());
    log.info({ collection: this.collectionName }, 'Reset collection');
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private ensureCollection(): boolean {
    const result = this.db
      .prepare<[string, string, string]>(`
        INSERT INTO collections (name, description, created_at)
        VALUES (?, ?, ?)
        ON CONFLICT (name) DO NOTHING
      `)
      .run(this.collectionName, COLLECTION_DESCRIPTION, new Date().toISOString());
    return result.changes > 0;
  }

  /**
   * Reserve the next generated id. The sequence only moves forward, so an
   * id handed out once is never handed out again, even if its batch fails;
   * ids already taken by explicit documents are skipped.
   */
  nextDocumentId(): string {
    return this.guard('STORE_FAILED', () => {
      const readSeq = this.db.prepare<[string], SequenceRow>(
        'SELECT next_document_seq FROM collections WHERE name = ?'
      );
      const idTaken = this.db.prepare<[string, string], { found: number }>(
        'SELECT 1 AS found FROM documents WHERE collection = ? AND id = ?'
      );
      const writeSeq = this.db.prepare<[number, string]>(
        'UPDATE collections SET next_document_seq = ? WHERE name = ?'
      );

      const reserve = this.db.transaction(() => {
        let seq = readSeq.get(this.collectionName)?.next_document_seq ?? 0;
        while (idTaken.get(this.collectionName, `doc_${seq}`)) {
          seq++;
        }
        writeSeq.run(seq + 1, this.collectionName);
        return `doc_${seq}`;
      });

      return reserve();
    });
  }

  private filterClause(jurisdiction: Jurisdiction | undefined): { where: string; params: string[] } {
    if (jurisdiction) {
      return { where: 'collection = ? AND jurisdiction = ?', params: [this.collectionName, jurisdiction] };
    }
    return { where: 'collection = ?', params: [this.collectionName] };
  }

  private loadRows(jurisdiction: Jurisdiction | undefined, limit?: number): DocumentRow[] {
    const limitClause = limit !== undefined ? 'LIMIT ?' : '';
    const { where, params } = this.filterClause(jurisdiction);
    const bound: Array<string | number> = limit !== undefined ? [...params, Math.max(0, limit)] : params;

    return this.guard('SEARCH_FAILED', () => this.db
      .prepare<Array<string | number>, DocumentRow>(`
        SELECT id, text, metadata
        FROM documents
        WHERE ${where}
        ORDER BY rowid
        ${limitClause}
      `)
      .all(...bound));
  }

  /**
   * Run a storage call, converting driver errors into StoreError
   */
  private guard<T>(code: StoreErrorCode, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(
        `${code}: ${error instanceof Error ? error.message : String(error)}`,
        code,
        { collection: this.collectionName }
      );
    }
  }
}

function encodeVector(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

function parseMetadata(raw: string): LegalMetadata {
  return storedMetadataSchema.parse(JSON.parse(raw));
}

function toQueryResult(row: DocumentRow, distance: number): QueryResult {
  return {
    id: row.id,
    text: row.text,
    metadata: parseMetadata(row.metadata),
    distance,
  };
}
