import type { SchemaReference, ValidateQueryResponse } from './types/ai.types.js';

export const FORBIDDEN_KEYWORDS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'MERGE',
  'COPY'
] as const;

/**
 * Blank out string literals and quoted identifiers so keyword checks only see SQL text.
 */
export function stripQuoted(query: string): string {
  return query.replace(/'(?:[^']|'')*'/g, "''").replace(/"(?:[^"]|"")*"/g, '""');
}

/**
 * Read-only safety gate for SQL produced by the model or submitted directly.
 */
export class QueryValidator {
  /**
   * Validate SQL query against syntax, read-only, safety and (optionally) schema rules.
   */
  validateQuery(query: string, schema?: SchemaReference): ValidateQueryResponse {
    const errors: string[] = [];
    const warnings: string[] = [];

    this.checkBasicSyntax(query, errors);
    this.checkReadOnly(query, errors);
    this.checkSecurityIssues(query, warnings);
    if (schema) {
      this.validateAgainstSchema(query, schema, warnings);
    }
    this.analyzePerformance(query, warnings);

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Check basic SQL syntax shape and guardrails.
   */
  checkBasicSyntax(query: string, errors: string[]): void {
    const trimmed = query.trim();
    if (!trimmed) {
      errors.push('Query cannot be empty');
      return;
    }

    const unquoted = stripQuoted(trimmed);
    const openParens = (unquoted.match(/\(/g) || []).length;
    const closeParens = (unquoted.match(/\)/g) || []).length;
    if (openParens !== closeParens) {
      errors.push(`Mismatched parentheses: ${openParens} open, ${closeParens} close`);
    }

    const withoutTrailing = unquoted.replace(/;\s*$/, '');
    if (withoutTrailing.includes(';')) {
      errors.push('Multiple statements are not allowed');
    }

    const upper = unquoted.toUpperCase();
    if (!upper.startsWith('SELECT') && !upper.startsWith('WITH')) {
      errors.push('Only SELECT statements are allowed');
    }
  }

  /**
   * Reject any data- or schema-modifying keyword appearing as a whole word.
   */
  checkReadOnly(query: string, errors: string[]): void {
    const unquoted = stripQuoted(query).toUpperCase();
    const found = FORBIDDEN_KEYWORDS.filter((keyword) => new RegExp(`\\b${keyword}\\b`).test(unquoted));
    if (found.length > 0) {
      errors.push(`Query contains forbidden operations: ${found.join(', ')}`);
    }
  }

  /**
   * Check for common SQL injection and abuse patterns.
   */
  checkSecurityIssues(query: string, warnings: string[]): void {
    const suspiciousPatterns: RegExp[] = [
      /\bUNION\s+SELECT\b/i,
      /\bOR\s+1\s*=\s*1\b/i,
      /\bpg_sleep\s*\(/i,
      /\bpg_read_file\s*\(/i
    ];

    if (suspiciousPatterns.some((pattern) => pattern.test(query))) {
      warnings.push('Potential SQL injection pattern detected');
    }

    if (query.includes('--') || query.includes('/*')) {
      warnings.push('Query contains comments; review for hidden logic');
    }
  }

  /**
   * Flag FROM/JOIN targets that are not in the known schema.
   */
  validateAgainstSchema(query: string, schema: SchemaReference, warnings: string[]): void {
    const known = new Set([...schema.tables, ...schema.views].map((name) => name.toLowerCase()));
    const cteNames = new Set(
      (query.match(/\b([a-zA-Z_][a-zA-Z0-9_]*)\s+AS\s*\(/gi) || []).map((match) => match.split(/\s+/)[0]?.toLowerCase())
    );
    const tableRefs = stripQuoted(query).match(/\b(?:FROM|JOIN)\s+([a-zA-Z_][a-zA-Z0-9_.]*)/gi) || [];

    for (const ref of tableRefs) {
      const target = ref.split(/\s+/)[1]?.toLowerCase();
      if (!target) continue;
      const table = target.includes('.') ? target.split('.').pop() : target;
      if (table && !known.has(table) && !cteNames.has(table)) {
        warnings.push(`Table '${table}' was not found in the schema`);
      }
    }
  }

  /**
   * Provide basic performance warnings.
   */
  analyzePerformance(query: string, warnings: string[]): void {
    if (/SELECT\s+\*/i.test(query)) {
      warnings.push('SELECT * detected; prefer explicit columns for better performance');
    }

    if (/\bCROSS\s+JOIN\b/i.test(query)) {
      warnings.push('CROSS JOIN detected; verify cartesian product is intended');
    }

    if (!/\bLIMIT\s+\d+/i.test(query) && !/\b(COUNT|SUM|AVG|MIN|MAX)\s*\(/i.test(query)) {
      warnings.push('No LIMIT clause; large result sets may be returned');
    }
  }
}
