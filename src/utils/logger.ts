export type LogStatus = 'START' | 'SUCCESS' | 'CACHE_HIT' | 'CACHE_MISS' | 'DEGRADED' | 'ERROR' | 'CALL_GROQ';

export interface Logger {
  info(operation: string, status: LogStatus, details?: string, durationMs?: number): void;
  warn(operation: string, details: string): void;
  error(operation: string, error: unknown): void;
}

export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return fallback;
}

/**
 * Bracketed single-line logger, e.g.
 * `[2024-05-01T10:00:00.000Z] [METADATA] [extract] [SUCCESS] 84ms tables=12`.
 */
export function createLogger(component: string): Logger {
  const prefix = (operation: string) => `[${new Date().toISOString()}] [${component}] [${operation}]`;

  return {
    info(operation, status, details, durationMs) {
      const timing = typeof durationMs === 'number' ? ` ${durationMs}ms` : '';
      console.log(`${prefix(operation)} [${status}]${timing}${details ? ` ${details}` : ''}`);
    },
    warn(operation, details) {
      console.warn(`${prefix(operation)} [WARN] ${details}`);
    },
    error(operation, error) {
      console.error(`${prefix(operation)} [ERROR] ${getErrorMessage(error)}`);
    }
  };
}
