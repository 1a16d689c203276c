import NodeCache from 'node-cache';
import { createHash } from 'node:crypto';
import { createLogger, getErrorMessage } from '../../utils/logger.js';
import { PromptBuilder } from './prompt-builder.js';
import { QueryValidator } from './query-validator.js';
import type { CacheStats, GenerateQueryRequest, GenerateQueryResponse, SchemaReference } from './types/ai.types.js';

interface AIServiceCacheStats extends CacheStats {
  avgGenerationMs: number;
}

export interface GenerationRequest {
  contents: Array<{ role: string; parts: Array<{ text: string }> }>;
  generationConfig: {
    maxOutputTokens: number;
    temperature: number;
    topP?: number;
  };
}

export type GenerativeModelLike = {
  generateContent: (request: GenerationRequest) => Promise<{
    response: {
      text: () => string;
    };
  }>;
};

interface GroqChatChoice {
  message?: {
    content?: string | null;
  };
}

interface GroqChatCompletionResponse {
  choices?: GroqChatChoice[];
}

export class AIServiceError extends Error {
  constructor(
    message: string,
    readonly code: 'AI_REQUEST_FAILED' | 'AI_RESPONSE_INVALID' | 'AI_CONFIGURATION_ERROR' | 'AI_UNSAFE_QUERY',
    readonly details?: string
  ) {
    super(message);
    this.name = 'AIServiceError';
  }
}

class GroqModel implements GenerativeModelLike {
  constructor(
    private readonly apiKey: string,
    private readonly modelName: string
  ) {}

  async generateContent(request: GenerationRequest): Promise<{ response: { text: () => string } }> {
    const userText = request.contents
      .flatMap((content) => content.parts.map((part) => part.text))
      .join('\n')
      .trim();

    const payload = {
      model: this.modelName,
      messages: [
        {
          role: 'system',
          content:
            'You write one read-only PostgreSQL SELECT for the schema and question you are given. ' +
            'Reply with a single JSON object holding "query", "explanation" and "confidence".'
        },
        {
          role: 'user',
          content: userText
        }
      ],
      temperature: request.generationConfig.temperature,
      max_tokens: request.generationConfig.maxOutputTokens,
      top_p: request.generationConfig.topP ?? 1
    };

    const response = await fetch('https://api.groq.com/openai/v1/chat/completions', {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify(payload)
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Groq API ${response.status}: ${body}`);
    }

    const parsed = (await response.json()) as GroqChatCompletionResponse;
    const content = parsed.choices?.[0]?.message?.content;
    if (!content) {
      throw new Error('Groq response missing choices[0].message.content');
    }

    return {
      response: {
        text: () => content
      }
    };
  }
}

export interface AIServiceOptions {
  apiKey?: string;
  modelName?: string;
  cacheTtlSeconds?: number;
  maxCacheSize?: number;
}

export interface AIServiceDependencies {
  model?: GenerativeModelLike;
  promptBuilder?: PromptBuilder;
  queryValidator?: QueryValidator;
}

const logger = createLogger('AI-SERVICE');

/**
 * Turns a question plus rendered schema text into a checked, read-only SQL statement.
 */
export class AIService {
  private readonly MAX_TOKENS = 1024;
  private readonly TEMPERATURE = 0.1;
  private readonly TOP_P = 0.95;

  private readonly queryCache: NodeCache;
  private readonly promptBuilder: PromptBuilder;
  private readonly queryValidator: QueryValidator;
  private readonly model: GenerativeModelLike | null;

  private hits = 0;
  private misses = 0;
  private requests = 0;
  private totalGenerationMs = 0;

  constructor(options: AIServiceOptions = {}, dependencies: AIServiceDependencies = {}) {
    this.promptBuilder = dependencies.promptBuilder ?? new PromptBuilder();
    this.queryValidator = dependencies.queryValidator ?? new QueryValidator();

    if (dependencies.model) {
      this.model = dependencies.model;
    } else if (options.apiKey) {
      this.model = new GroqModel(options.apiKey, options.modelName ?? 'llama-3.1-8b-instant');
    } else {
      this.model = null;
    }

    this.queryCache = new NodeCache({
      stdTTL: options.cacheTtlSeconds ?? 3600,
      checkperiod: 300,
      maxKeys: options.maxCacheSize ?? 500,
      useClones: true
    });
  }

  /**
   * Generate SQL for `request.question`. Results are cached per scope (the connection
   * profile) and per question/schema pair; unsafe SQL is rejected, never returned.
   */
  async generateQuery(
    scope: string,
    request: GenerateQueryRequest,
    schema?: SchemaReference
  ): Promise<GenerateQueryResponse> {
    const startedAt = Date.now();
    this.requests += 1;

    const cacheKey = this.getCacheKey(scope, request);
    const cached = this.queryCache.get<GenerateQueryResponse>(cacheKey);
    if (cached) {
      this.hits += 1;
      logger.info(`generateQuery:${scope}`, 'CACHE_HIT', undefined, Date.now() - startedAt);
      return cached;
    }

    this.misses += 1;

    if (!this.model) {
      throw new AIServiceError('Missing Groq API key', 'AI_CONFIGURATION_ERROR', 'Set GROQ_API_KEY to enable SQL generation');
    }

    try {
      const prompt = this.promptBuilder.buildQueryGenerationPrompt(request.question, request.schemaText);

      logger.info(`generateQuery:${scope}`, 'CALL_GROQ', `PromptChars:${prompt.length}`, Date.now() - startedAt);
      const response = await this.model.generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          maxOutputTokens: this.MAX_TOKENS,
          temperature: this.TEMPERATURE,
          topP: this.TOP_P
        }
      });

      const parsed = this.parseGenerationResponse(response.response.text());
      const validation = this.queryValidator.validateQuery(parsed.query, schema);
      if (!validation.isValid) {
        throw new AIServiceError(
          'Generated query failed the read-only safety check',
          'AI_UNSAFE_QUERY',
          validation.errors.join('; ')
        );
      }

      const result: GenerateQueryResponse = {
        ...parsed,
        warnings: validation.warnings
      };

      this.remember(cacheKey, result);
      const duration = Date.now() - startedAt;
      this.totalGenerationMs += duration;
      logger.info(`generateQuery:${scope}`, 'SUCCESS', `Warnings:${result.warnings.length}`, duration);
      return result;
    } catch (error) {
      logger.info(`generateQuery:${scope}`, 'ERROR', getErrorMessage(error, 'Unknown AI error'), Date.now() - startedAt);
      if (error instanceof AIServiceError) {
        throw error;
      }
      throw new AIServiceError('Failed to generate query', 'AI_REQUEST_FAILED', getErrorMessage(error, 'Unknown AI error'));
    }
  }

  /**
   * Drop cached generations for one scope, e.g. after its schema was refreshed.
   */
  clearScope(scope: string): void {
    const prefix = `query:${scope}:`;
    for (const key of this.queryCache.keys()) {
      if (key.startsWith(prefix)) {
        this.queryCache.del(key);
      }
    }
  }

  /**
   * Return service cache and latency metrics.
   */
  getCacheStats(): AIServiceCacheStats {
    const hitRate = this.requests === 0 ? 0 : this.hits / this.requests;
    const avgGenerationMs = this.misses === 0 ? 0 : this.totalGenerationMs / this.misses;
    return {
      cachedItems: this.queryCache.keys().length,
      hits: this.hits,
      misses: this.misses,
      requests: this.requests,
      hitRate: Number(hitRate.toFixed(4)),
      avgGenerationMs: Number(avgGenerationMs.toFixed(2))
    };
  }

  // A full cache must not fail a generation that already succeeded.
  private remember(cacheKey: string, result: GenerateQueryResponse): void {
    try {
      this.queryCache.set(cacheKey, result);
    } catch (error) {
      logger.warn('cache-write', getErrorMessage(error));
    }
  }

  private parseGenerationResponse(text: string): Omit<GenerateQueryResponse, 'warnings'> {
    const parsed = this.parseJsonPayload(text);
    const query = typeof parsed.query === 'string' ? parsed.query.trim() : '';
    if (!query) {
      throw new AIServiceError('AI response did not include a query', 'AI_RESPONSE_INVALID');
    }

    return {
      query,
      explanation: typeof parsed.explanation === 'string' ? parsed.explanation : 'No explanation provided',
      confidence: typeof parsed.confidence === 'number' ? parsed.confidence : 0.5
    };
  }

  private parseJsonPayload(text: string): Record<string, unknown> {
    const blockMatch = text.match(/```json\s*([\s\S]*?)\s*```/i) || text.match(/```\s*([\s\S]*?)\s*```/i);
    const jsonText = (blockMatch?.[1] ?? text).trim();

    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonText);
    } catch (error) {
      throw new AIServiceError('AI response was not valid JSON', 'AI_RESPONSE_INVALID', getErrorMessage(error));
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new AIServiceError('AI response was not a JSON object', 'AI_RESPONSE_INVALID');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private getCacheKey(scope: string, request: GenerateQueryRequest): string {
    const digest = createHash('sha256')
      .update(request.schemaText)
      .update('\u0000')
      .update(request.question.trim().toLowerCase())
      .digest('hex')
      .slice(0, 32);
    return `query:${scope}:${digest}`;
  }
}
