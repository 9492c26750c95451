import type { Request, Response } from 'express';
import { z } from 'zod';
import { SchemaProviderError, getErrorMessage } from '../../core/errors.js';
import type { PromptMode } from '../ai/types/ai.types.js';
import { formatSchemaText } from '../schema/schema-formatter.js';
import type { FailureStage, NlQueryService } from './nl-query.service.js';

const AskSchema = z.object({
  question: z.string().trim().min(1, 'Question cannot be empty'),
  mode: z.enum(['all', 'relevant']).optional(),
  topK: z.number().int().positive().max(100).optional()
});

const SearchSchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty'),
  topK: z.number().int().positive().max(100).default(5)
});

const SampleQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional()
});

const FAILURE_STATUS: Record<FailureStage, number> = {
  input: 400,
  validate: 422,
  execute: 502,
  internal: 500
};

export interface QueryControllerOptions {
  defaultTopK: number;
  sampleRowLimit: number;
}

function logControllerError(operation: string, error: unknown): void {
  const message = getErrorMessage(error, 'Unknown error');
  console.error(`[${new Date().toISOString()}] [NL-QUERY-CONTROLLER] [${operation}] ${message}`);
}

function invalidRequest(res: Response, error: z.ZodError): Response {
  return res.status(400).json({
    success: false,
    error: 'Invalid request',
    details: error.issues.map((issue) => issue.message).join(', ')
  });
}

function resolvePromptMode(mode: 'all' | 'relevant' | undefined, topK: number | undefined, defaultTopK: number): PromptMode | undefined {
  if (mode === 'all') return { kind: 'all' };
  if (mode === 'relevant' || topK !== undefined) return { kind: 'relevant', topK: topK ?? defaultTopK };
  return undefined;
}

export function createQueryController(service: NlQueryService, options: QueryControllerOptions) {
  /**
   * POST /api/nl-query/ask
   */
  const ask = async (req: Request, res: Response): Promise<Response> => {
    const validation = AskSchema.safeParse(req.body);
    if (!validation.success) {
      return invalidRequest(res, validation.error);
    }

    const { question, mode, topK } = validation.data;
    const outcome = await service.ask(question, { mode: resolvePromptMode(mode, topK, options.defaultTopK) });
    const status = outcome.success ? 200 : FAILURE_STATUS[outcome.stage];
    return res.status(status).json({ success: outcome.success, data: outcome });
  };

  /**
   * POST /api/nl-query/search
   */
  const search = async (req: Request, res: Response): Promise<Response> => {
    const validation = SearchSchema.safeParse(req.body);
    if (!validation.success) {
      return invalidRequest(res, validation.error);
    }

    const results = await service.searchSchemas(validation.data.query, validation.data.topK);
    return res.json({
      success: true,
      data: results.map(({ record, score }) => ({ tableName: record.tableName, score, schemaText: record.schemaText }))
    });
  };

  /**
   * POST /api/nl-query/refresh
   */
  const refresh = async (_req: Request, res: Response): Promise<Response> => {
    try {
      const tables = await service.refreshSchemas();
      return res.json({ success: true, data: { tables } });
    } catch (error) {
      logControllerError('refresh', error);
      return res.status(502).json({
        success: false,
        error: 'Schema refresh failed',
        details: getErrorMessage(error, 'Unable to read schemas from the database')
      });
    }
  };

  /**
   * GET /api/nl-query/schemas
   */
  const listSchemas = (_req: Request, res: Response): Response => {
    const data = Array.from(service.getSchemas().values(), (schema) => ({
      ...schema,
      schemaText: formatSchemaText(schema)
    }));
    return res.json({ success: true, data });
  };

  /**
   * GET /api/nl-query/tables/:table/sample
   */
  const sample = async (req: Request, res: Response): Promise<Response> => {
    const validation = SampleQuerySchema.safeParse(req.query);
    if (!validation.success) {
      return invalidRequest(res, validation.error);
    }

    try {
      const data = await service.getSampleRows(req.params.table, validation.data.limit ?? options.sampleRowLimit);
      return res.json({ success: true, data });
    } catch (error) {
      logControllerError('sample', error);
      if (error instanceof SchemaProviderError && error.code === 'TABLE_NOT_FOUND') {
        return res.status(404).json({ success: false, error: 'Table not found', details: error.message });
      }
      return res.status(502).json({
        success: false,
        error: 'Sample query failed',
        details: getErrorMessage(error, 'Unable to read sample rows')
      });
    }
  };

  /**
   * GET /api/nl-query/stats
   */
  const stats = (_req: Request, res: Response): Response => res.json({ success: true, data: service.getStats() });

  return { ask, search, refresh, listSchemas, sample, stats };
}
