import { formatSchemas } from '../schema/schema-formatter.js';
import type { SchemaIndex } from '../schema/schema-index.js';
import type { SchemaMap, TableSchema } from '../schema/types/schema.types.js';
import type { PromptMode } from './types/ai.types.js';

/**
 * Rules and response contract appended to every prompt. Independent of schema content.
 */
export const POLICY_BLOCK = `# Important Rules:
1. Only generate SELECT queries; never produce DELETE, UPDATE, INSERT, DROP, ALTER, TRUNCATE or any other modifying statement.
2. Use standard SQL syntax.
3. Treat personal data as sensitive: avoid returning identifiers or full names unless the question asks for them, and prefer aggregates over individual records.
4. If the question is unclear, generate the most reasonable query.
5. Use explicit JOIN ... ON clauses when more than one table is involved.
6. Prefer named columns over SELECT * and add LIMIT for broad reads.
7. Use aggregate functions (COUNT, SUM, AVG) when the question asks for statistics.
8. Return valid JSON only.

# Return Format:
You must return the following JSON format:
{
  "sql": "Your generated SQL query statement",
  "explanation": "Explain the meaning of this query in English",
  "confidence": 0.95,
  "tables_used": ["table1", "table2"]
}`;

/**
 * User turn sent alongside the system prompt.
 */
export function buildUserMessage(question: string): string {
  return `Please convert the following query to SQL:\n${question}`;
}

/**
 * Schemas and the index built from them. Replaced as a unit on refresh.
 */
export interface SchemaSnapshot {
  schemas: SchemaMap;
  index: SchemaIndex;
}

export class PromptBuilder {
  /**
   * Build the system prompt for `question` from either every known schema or the top-K relevant ones.
   */
  async build(question: string, mode: PromptMode, snapshot: SchemaSnapshot): Promise<string> {
    const selected = await this.selectSchemas(question, mode, snapshot);
    return `You are a professional database SQL query assistant. Your task is to convert natural language questions into accurate, read-only SQL statements.

# Database Schema Information:
${formatSchemas(selected)}

${POLICY_BLOCK}`;
  }

  private async selectSchemas(question: string, mode: PromptMode, snapshot: SchemaSnapshot): Promise<TableSchema[]> {
    if (mode.kind === 'relevant') {
      const hits = await snapshot.index.search(question, mode.topK);
      if (hits.length) {
        const relevant = new Map<string, TableSchema>();
        for (const hit of hits) {
          if (!relevant.has(hit.record.tableName)) relevant.set(hit.record.tableName, hit.record.schema);
        }
        return Array.from(relevant.values());
      }
    }
    return Array.from(snapshot.schemas.values());
  }
}
