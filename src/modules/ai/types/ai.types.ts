/**
 * Request payload for natural-language to SQL generation.
 */
export interface GenerateQueryRequest {
  question: string;
  schemaText: string;
}

/**
 * Structured SQL generation output from the AI service.
 */
export interface GenerateQueryResponse {
  query: string;
  explanation: string;
  confidence: number;
  warnings: string[];
}

/**
 * Result of the read-only safety gate.
 */
export interface ValidateQueryResponse {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Relations known to the schema, used to flag references to unknown tables.
 */
export interface SchemaReference {
  tables: string[];
  views: string[];
}

/**
 * Cache metrics for observability.
 */
export interface CacheStats {
  cachedItems: number;
  hits: number;
  misses: number;
  requests: number;
  hitRate: number;
}
