import { createHash } from 'node:crypto';
import NodeCache from 'node-cache';
import { getErrorMessage } from '../../core/errors.js';
import { logEvent } from '../../core/logger.js';
import type { GenerationClient } from '../ai/generation-client.js';
import { PromptBuilder, type SchemaSnapshot } from '../ai/prompt-builder.js';
import { QueryValidator } from '../ai/query-validator.js';
import type { GenerationResult, PromptMode } from '../ai/types/ai.types.js';
import type { SchemaIndex } from '../schema/schema-index.js';
import type { SchemaProvider } from '../schema/schema-provider.js';
import type { QueryResultSet, SchemaMap, SchemaSearchResult } from '../schema/types/schema.types.js';

export const UNSAFE_QUERY_ERROR = 'Query contains unsafe operations';

export interface QuerySuccess {
  success: true;
  sql: string;
  explanation: string;
  confidence: number;
  tablesUsed: string[];
  warnings: string[];
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
}

export type FailureStage = 'input' | 'validate' | 'execute' | 'internal';

export interface QueryFailure {
  success: false;
  error: string;
  /** The statement that was rejected or attempted, when one exists. */
  sql: string | null;
  stage: FailureStage;
}

export type QueryOutcome = QuerySuccess | QueryFailure;

export interface AskOptions {
  mode?: PromptMode;
}

export interface NlQueryStats {
  requests: number;
  hits: number;
  misses: number;
  cachedItems: number;
  hitRate: number;
  tables: number;
  indexSize: number;
  indexMode: SchemaIndex['mode'];
  generationMode: GenerationClient['mode'];
}

interface NlQueryServiceDependencies {
  schemaProvider: SchemaProvider;
  index: SchemaIndex;
  generationClient: GenerationClient;
  promptBuilder?: PromptBuilder;
  queryValidator?: QueryValidator;
  promptMode?: PromptMode;
  cacheTtlSeconds?: number;
  maxCacheSize?: number;
}

/**
 * One natural-language request: build prompt, generate, validate, execute, package.
 * Known failures resolve to a `QueryFailure`; nothing is retried.
 */
export class NlQueryService {
  private readonly schemaProvider: SchemaProvider;
  private readonly generationClient: GenerationClient;
  private readonly promptBuilder: PromptBuilder;
  private readonly queryValidator: QueryValidator;
  private readonly promptMode: PromptMode;
  private readonly generationCache: NodeCache;
  private readonly maxCacheSize: number;

  private snapshot: SchemaSnapshot;

  private hits = 0;
  private misses = 0;
  private requests = 0;

  constructor(dependencies: NlQueryServiceDependencies) {
    this.schemaProvider = dependencies.schemaProvider;
    this.generationClient = dependencies.generationClient;
    this.promptBuilder = dependencies.promptBuilder ?? new PromptBuilder();
    this.queryValidator = dependencies.queryValidator ?? new QueryValidator();
    this.promptMode = dependencies.promptMode ?? { kind: 'relevant', topK: 10 };
    this.snapshot = { schemas: new Map(), index: dependencies.index };
    this.maxCacheSize = dependencies.maxCacheSize ?? 500;
    this.generationCache = new NodeCache({
      stdTTL: dependencies.cacheTtlSeconds ?? 3600,
      checkperiod: 300,
      maxKeys: this.maxCacheSize,
      useClones: false
    });
  }

  /**
   * Load schemas from the provider, seeding an empty index. Falls back to the
   * index's stored schemas when the provider cannot be reached.
   */
  async initialize(): Promise<number> {
    const startedAt = Date.now();
    const index = this.snapshot.index;

    let schemas: SchemaMap;
    try {
      schemas = await this.schemaProvider.getAllSchemas();
    } catch (error) {
      schemas = index.getAllSchemas();
      this.snapshot = { schemas, index };
      logEvent(
        'NL-QUERY',
        'initialize',
        'DEGRADED',
        Date.now() - startedAt,
        `Using ${schemas.size} stored schemas: ${getErrorMessage(error, 'provider unavailable')}`
      );
      return schemas.size;
    }

    if (index.size === 0 && schemas.size > 0) {
      await index.addSchemas(schemas);
    }
    this.snapshot = { schemas, index };
    logEvent('NL-QUERY', 'initialize', 'SUCCESS', Date.now() - startedAt, `Tables:${schemas.size}`);
    return schemas.size;
  }

  async ask(question: string, options: AskOptions = {}): Promise<QueryOutcome> {
    const startedAt = Date.now();
    this.requests += 1;

    const trimmed = question.trim();
    if (!trimmed) {
      return { success: false, error: 'Question cannot be empty', sql: null, stage: 'input' };
    }

    let sql: string | null = null;
    try {
      const snapshot = this.snapshot;
      const prompt = await this.promptBuilder.build(trimmed, options.mode ?? this.promptMode, snapshot);
      const generated = await this.generate(trimmed, prompt);
      sql = generated.sql;

      if (!this.queryValidator.isSafe(generated.sql)) {
        const keywords = this.queryValidator.findMutatingKeywords(generated.sql).join(',');
        logEvent('NL-QUERY', 'ask', 'REJECTED', Date.now() - startedAt, `Keywords:${keywords}`);
        return { success: false, error: UNSAFE_QUERY_ERROR, sql: generated.sql, stage: 'validate' };
      }

      let resultSet: QueryResultSet;
      try {
        resultSet = await this.schemaProvider.executeQuery(generated.sql);
      } catch (error) {
        const message = getErrorMessage(error, 'Query execution failed');
        logEvent('NL-QUERY', 'ask', 'ERROR', Date.now() - startedAt, message);
        return { success: false, error: message, sql: generated.sql, stage: 'execute' };
      }

      logEvent('NL-QUERY', 'ask', 'SUCCESS', Date.now() - startedAt, `Rows:${resultSet.rowCount}`);
      return {
        success: true,
        sql: generated.sql,
        explanation: generated.explanation,
        confidence: generated.confidence,
        tablesUsed: [...generated.tablesUsed],
        warnings: this.queryValidator.review(generated.sql).warnings,
        columns: resultSet.columns,
        rows: resultSet.rows,
        rowCount: resultSet.rowCount
      };
    } catch (error) {
      const message = getErrorMessage(error, 'Unknown orchestration error');
      logEvent('NL-QUERY', 'ask', 'ERROR', Date.now() - startedAt, message);
      return { success: false, error: message, sql, stage: 'internal' };
    }
  }

  /**
   * Re-read every schema and rebuild the index. The new schemas become visible
   * in the same step as the rebuilt index.
   */
  async refreshSchemas(): Promise<number> {
    const startedAt = Date.now();
    const index = this.snapshot.index;
    const schemas = await this.schemaProvider.getAllSchemas();
    await index.rebuild(schemas, () => {
      this.snapshot = { schemas, index };
      this.generationCache.flushAll();
    });
    logEvent('NL-QUERY', 'refreshSchemas', 'SUCCESS', Date.now() - startedAt, `Tables:${schemas.size}`);
    return schemas.size;
  }

  searchSchemas(query: string, topK: number): Promise<SchemaSearchResult[]> {
    return this.snapshot.index.search(query, topK);
  }

  getSchemas(): SchemaMap {
    return this.snapshot.schemas;
  }

  getSampleRows(tableName: string, limit: number): Promise<QueryResultSet> {
    return this.schemaProvider.getSampleRows(tableName, limit);
  }

  getStats(): NlQueryStats {
    const hitRate = this.requests === 0 ? 0 : this.hits / this.requests;
    return {
      requests: this.requests,
      hits: this.hits,
      misses: this.misses,
      cachedItems: this.generationCache.keys().length,
      hitRate: Number(hitRate.toFixed(4)),
      tables: this.snapshot.schemas.size,
      indexSize: this.snapshot.index.size,
      indexMode: this.snapshot.index.mode,
      generationMode: this.generationClient.mode
    };
  }

  /**
   * Stop the cache timer and release the database pool.
   */
  async close(): Promise<void> {
    this.generationCache.close();
    await this.schemaProvider.close();
  }

  private async generate(question: string, prompt: string): Promise<GenerationResult> {
    const cacheKey = `generation:${createHash('sha256').update(prompt).update('\u0000').update(question).digest('hex')}`;
    const cached = this.generationCache.get<GenerationResult>(cacheKey);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.misses += 1;
    const result = await this.generationClient.generate(question, prompt);
    // node-cache throws once maxKeys is reached; a full cache just stops accepting entries.
    if (!result.failed && this.generationCache.keys().length < this.maxCacheSize) {
      this.generationCache.set(cacheKey, result);
    }
    return result;
  }
}
