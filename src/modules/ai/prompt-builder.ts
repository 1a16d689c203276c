export class PromptBuilder {
  /**
   * Build prompt for natural language to SQL generation.
   */
  buildQueryGenerationPrompt(question: string, schemaText: string): string {
    return `You are a PostgreSQL expert. Convert the user's question into a single PostgreSQL query.

SCHEMA:
${schemaText}

USER QUESTION:
${question}

RULES:
1. Return valid PostgreSQL only.
2. The query must be read-only: a single SELECT (CTEs allowed), no data or schema changes.
3. Use JOINs along the relationships listed in the schema when several tables are needed.
4. Prefer explicit columns over SELECT *.
5. Add LIMIT for broad reads unless the question asks for all rows.
6. Quote identifiers that are mixed-case or reserved words.

Respond as JSON only:
{
  "query": "SQL query string",
  "explanation": "Short explanation",
  "confidence": 0.0
}
Do not wrap SQL in markdown blocks.`;
  }
}
