import type { QueryReview } from './types/ai.types.js';

export const MUTATING_KEYWORDS = ['DROP', 'DELETE', 'TRUNCATE', 'ALTER', 'UPDATE', 'INSERT'] as const;

/**
 * Lexical safety gate for generated SQL.
 *
 * `isSafe` is a plain substring denylist, not a parser. A keyword inside a
 * string literal or an identifier (`updated_at`, `'deleted'`) is rejected, and
 * an obfuscated mutation that avoids the literal keywords passes. Treat it as
 * the first gate in front of a read-only database role, not the only one.
 */
export class QueryValidator {
  isSafe(sql: string): boolean {
    const upper = sql.toUpperCase();
    return !MUTATING_KEYWORDS.some((keyword) => upper.includes(keyword));
  }

  /**
   * Return the denylisted keywords present in `sql`, in denylist order.
   */
  findMutatingKeywords(sql: string): string[] {
    const upper = sql.toUpperCase();
    return MUTATING_KEYWORDS.filter((keyword) => upper.includes(keyword));
  }

  /**
   * Advisory checks on a statement that already passed `isSafe`.
   */
  review(sql: string): QueryReview {
    const warnings: string[] = [];
    this.checkStatementShape(sql, warnings);
    this.checkComments(sql, warnings);
    this.analyzePerformance(sql, warnings);
    return { warnings };
  }

  private checkStatementShape(sql: string, warnings: string[]): void {
    const trimmed = sql.trim();
    const semicolonCount = (trimmed.match(/;/g) || []).length;
    if (semicolonCount > 1 || (semicolonCount === 1 && !trimmed.endsWith(';'))) {
      warnings.push('Multiple statements detected; only the first is expected to be a read');
    }

    const upper = trimmed.toUpperCase();
    if (!upper.startsWith('SELECT') && !upper.startsWith('WITH')) {
      warnings.push('Statement does not start with SELECT or WITH');
    }
  }

  private checkComments(sql: string, warnings: string[]): void {
    if (sql.includes('--') || sql.includes('/*')) {
      warnings.push('Query contains comments; review for hidden logic');
    }
  }

  private analyzePerformance(sql: string, warnings: string[]): void {
    if (/SELECT\s+\*/i.test(sql)) {
      warnings.push('SELECT * detected; prefer explicit columns');
    }

    if (/\bCROSS\s+JOIN\b/i.test(sql)) {
      warnings.push('CROSS JOIN detected; verify cartesian product is intended');
    }

    const isAggregate = /\b(COUNT|SUM|AVG|MIN|MAX)\s*\(/i.test(sql) || /\bGROUP\s+BY\b/i.test(sql);
    if (!isAggregate && !/\bLIMIT\s+\d+/i.test(sql) && !/\bTOP\s+\d+/i.test(sql)) {
      warnings.push('No LIMIT clause; the result may be large');
    }
  }
}
