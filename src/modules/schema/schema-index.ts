import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { IndexCorruptionError, getErrorMessage } from '../../core/errors.js';
import { logEvent } from '../../core/logger.js';
import { Mutex } from '../../core/mutex.js';
import type { EmbeddingProvider } from './embedding-provider.js';
import { formatSchemaText } from './schema-formatter.js';
import type { IndexMode, SchemaMap, SchemaRecord, SchemaSearchResult, TableSchema } from './types/schema.types.js';

export const INDEX_FILE = 'schema_index.json';
export const METADATA_FILE = 'schema_metadata.json';

export interface SchemaIndexOptions {
  /** Omit to run in text (substring) mode. */
  embedder?: EmbeddingProvider | null;
  /** Directory holding the index and metadata files. Omit for an in-memory index. */
  storePath?: string;
}

interface IndexState {
  mode: IndexMode;
  records: readonly SchemaRecord[];
  /** vectors[i] belongs to records[i]; empty in text mode. */
  vectors: readonly number[][];
}

const persistedIndexSchema = z.object({
  version: z.literal(1),
  mode: z.enum(['vector', 'text']),
  model: z.string().nullable(),
  dimensions: z.number().int().positive().nullable(),
  metadataDigest: z.string(),
  vectors: z.array(z.array(z.number()))
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

const tableSchemaSchema = z.object({
  tableName: z.string(),
  columns: z.array(
    z.object({
      name: z.string(),
      type: z.string(),
      nullable: z.boolean(),
      default: z.string().nullable().optional()
    })
  ),
  primaryKey: z.array(z.string())
});

const persistedMetadataSchema = z.array(
  z.object({
    tableName: z.string(),
    schema: tableSchemaSchema,
    schemaText: z.string()
  })
);

/**
 * Nearest-neighbour index over table schema text.
 *
 * Mutations are serialised and only become visible to `search` once the new
 * state has been written to disk, so a reader never sees a half-built index.
 */
export class SchemaIndex {
  private readonly embedder: EmbeddingProvider | null;
  private readonly storePath: string | null;
  private readonly mutex = new Mutex();
  private state: IndexState;

  constructor(options: SchemaIndexOptions = {}) {
    this.embedder = options.embedder ?? null;
    this.storePath = options.storePath ?? null;
    this.state = this.emptyState();
  }

  /**
   * Create an index and load any state persisted at `storePath`.
   */
  static async open(options: SchemaIndexOptions = {}): Promise<SchemaIndex> {
    const index = new SchemaIndex(options);
    await index.load();
    return index;
  }

  get size(): number {
    return this.state.records.length;
  }

  get mode(): IndexMode {
    return this.state.mode;
  }

  /**
   * Append one record per entry. Does not clear existing records.
   */
  async addSchemas(schemas: SchemaMap): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const next = await this.append(this.state, schemas);
      await this.commit(next, 'addSchemas');
    });
  }

  /**
   * Replace every record with `schemas` in one exclusive section.
   * `onCommit` runs synchronously with the state swap, so callers can swap their own state in the same step.
   */
  async rebuild(schemas: SchemaMap, onCommit?: () => void): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const next = await this.append(this.emptyState(), schemas);
      await this.commit(next, 'rebuild', onCommit);
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.commit(this.emptyState(), 'clear');
    });
  }

  /**
   * Rank stored schemas against `query`. Never throws for an empty index or a missing embedder.
   */
  async search(query: string, topK: number): Promise<SchemaSearchResult[]> {
    const state = this.state;
    const requested = Number.isNaN(topK) ? 0 : Math.floor(topK);
    const limit = Math.min(requested, state.records.length);
    if (limit <= 0) return [];

    if (state.mode === 'text' || !this.embedder) {
      return this.substringSearch(state, query, limit);
    }

    const startedAt = Date.now();
    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.embedder.embed([query]);
    } catch (error) {
      logEvent('SCHEMA-INDEX', 'search', 'DEGRADED', Date.now() - startedAt, getErrorMessage(error, 'embedding failed'));
      return this.substringSearch(state, query, limit);
    }
    if (!queryVector) {
      return this.substringSearch(state, query, limit);
    }

    const target = queryVector;
    return state.vectors
      .map((vector, position) => ({ position, distance: euclideanDistance(vector, target) }))
      .sort((a, b) => a.distance - b.distance || a.position - b.position)
      .slice(0, limit)
      .map(({ position, distance }) => ({
        record: state.records[position],
        score: 1 / (1 + distance)
      }));
  }

  /**
   * Reconstruct table name -> schema from stored records.
   */
  getAllSchemas(): SchemaMap {
    const schemas: SchemaMap = new Map();
    for (const record of this.state.records) {
      schemas.set(record.tableName, record.schema);
    }
    return schemas;
  }

  private emptyState(): IndexState {
    return { mode: this.embedder ? 'vector' : 'text', records: [], vectors: [] };
  }

  private async append(base: IndexState, schemas: SchemaMap): Promise<IndexState> {
    const added: SchemaRecord[] = Array.from(schemas, ([tableName, schema]: [string, TableSchema]) => ({
      tableName,
      schema,
      schemaText: formatSchemaText(schema)
    }));
    const records = [...base.records, ...added];

    if (base.mode === 'vector' && this.embedder) {
      const startedAt = Date.now();
      try {
        const vectors = await this.embedder.embed(added.map((record) => record.schemaText));
        return { mode: 'vector', records, vectors: [...base.vectors, ...vectors] };
      } catch (error) {
        logEvent(
          'SCHEMA-INDEX',
          'embedSchemas',
          'DEGRADED',
          Date.now() - startedAt,
          `Falling back to text mode: ${getErrorMessage(error, 'embedding failed')}`
        );
      }
    }

    return { mode: 'text', records, vectors: [] };
  }

  private substringSearch(state: IndexState, query: string, limit: number): SchemaSearchResult[] {
    const needle = query.toLowerCase();
    return state.records
      .filter((record) => record.schemaText.toLowerCase().includes(needle))
      .slice(0, limit)
      .map((record) => ({ record, score: 1.0 }));
  }

  private async commit(next: IndexState, operation: string, onCommit?: () => void): Promise<void> {
    const startedAt = Date.now();
    await this.persist(next);
    this.state = next;
    onCommit?.();
    logEvent('SCHEMA-INDEX', operation, 'SUCCESS', Date.now() - startedAt, `Records:${next.records.length} Mode:${next.mode}`);
  }

  private async persist(state: IndexState): Promise<void> {
    if (!this.storePath) return;

    const metadata = JSON.stringify(state.records);
    const index: PersistedIndex = {
      version: 1,
      mode: state.mode,
      model: state.mode === 'vector' ? (this.embedder?.model ?? null) : null,
      dimensions: state.mode === 'vector' ? (this.embedder?.dimensions ?? null) : null,
      metadataDigest: sha256(metadata),
      vectors: [...state.vectors]
    };

    await mkdir(this.storePath, { recursive: true });
    // Index first, metadata second: a crash in between leaves a digest mismatch that load() rejects.
    await writeFileAtomic(path.join(this.storePath, INDEX_FILE), JSON.stringify(index));
    await writeFileAtomic(path.join(this.storePath, METADATA_FILE), metadata);
  }

  private async load(): Promise<void> {
    if (!this.storePath) return;

    const storePath = this.storePath;
    const indexText = await readFileIfExists(path.join(storePath, INDEX_FILE));
    const metadataText = await readFileIfExists(path.join(storePath, METADATA_FILE));
    if (indexText === null && metadataText === null) return;

    const records: SchemaRecord[] = metadataText === null ? [] : parseStored(metadataText, persistedMetadataSchema, storePath);
    if (indexText === null) {
      if (records.length) {
        throw new IndexCorruptionError(`Found ${records.length} metadata records but no ${INDEX_FILE}`, storePath);
      }
      return;
    }

    const index = parseStored(indexText, persistedIndexSchema, storePath);
    if (metadataText === null && index.vectors.length) {
      throw new IndexCorruptionError(`Found ${index.vectors.length} vectors but no ${METADATA_FILE}`, storePath);
    }

    if (metadataText !== null && index.metadataDigest !== sha256(metadataText)) {
      throw new IndexCorruptionError(`${METADATA_FILE} does not match the metadata ${INDEX_FILE} was written with`, storePath);
    }

    if (index.mode === 'text') {
      this.state = { mode: 'text', records, vectors: [] };
      return;
    }

    if (index.vectors.length !== records.length) {
      throw new IndexCorruptionError(
        `Index holds ${index.vectors.length} vectors but metadata holds ${records.length} records`,
        storePath
      );
    }

    if (!this.embedder) {
      logEvent('SCHEMA-INDEX', 'load', 'DEGRADED', 0, 'No embedding provider; serving stored records in text mode');
      this.state = { mode: 'text', records, vectors: [] };
      return;
    }

    if (index.model !== this.embedder.model || index.dimensions !== this.embedder.dimensions) {
      throw new IndexCorruptionError(
        `Index was built with ${index.model ?? 'unknown'}/${index.dimensions ?? '?'} but the embedder is ${this.embedder.model}/${this.embedder.dimensions}`,
        storePath
      );
    }
    if (index.vectors.some((vector) => vector.length !== this.embedder?.dimensions)) {
      throw new IndexCorruptionError('Index contains vectors of the wrong dimension', storePath);
    }

    this.state = { mode: 'vector', records, vectors: index.vectors };
    logEvent('SCHEMA-INDEX', 'load', 'SUCCESS', 0, `Records:${records.length}`);
  }
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const delta = a[i] - b[i];
    sum += delta * delta;
  }
  return Math.sqrt(sum);
}

function parseStored<S extends z.ZodTypeAny>(text: string, schema: S, storePath: string): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new IndexCorruptionError(`Stored index file is not valid JSON: ${getErrorMessage(error, 'parse error')}`, storePath);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new IndexCorruptionError(
      `Stored index file has an unexpected shape: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
      storePath
    );
  }
  return parsed.data;
}

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, contents, 'utf8');
  await rename(tempPath, filePath);
}
