import type { Logger } from './logger.js';

/**
 * Run an async operation and log how long it took, tagged with `name`.
 * Errors are logged and rethrown unchanged.
 */
export async function withTiming<T>(
  logger: Logger,
  name: string,
  operation: () => Promise<T>
): Promise<T> {
  const startedAt = performance.now();
  try {
    const result = await operation();
    logger.debug(`Performance: ${name} succeeded`, {
      event_type: 'performance',
      operation: name,
      duration_ms: elapsedMs(startedAt),
      status: 'success',
    });
    return result;
  } catch (error) {
    logger.debug(`Performance: ${name} failed`, {
      event_type: 'performance',
      operation: name,
      duration_ms: elapsedMs(startedAt),
      status: 'error',
      error: error instanceof Error ? error.name : String(error),
    });
    throw error;
  }
}

function elapsedMs(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 100) / 100;
}
