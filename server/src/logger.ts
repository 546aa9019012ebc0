import pino from 'pino';
import type { LastResult, LifecycleState } from '@asteroid-tap/shared';
import { serverConfig } from './config';

// ============================================
// Logger Configuration
// ============================================

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'server.log')
 * @param component - Component name for filtering (e.g., 'server', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (serverConfig.isDev) {
    targets.push({
      level: serverConfig.logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${serverConfig.logDir}/${filename}`,
      size: '10m',         // Rotate at 10MB
      limit: { count: 5 }, // Keep last 5 rotated files
      mkdir: true,
    },
  });

  return pino(
    {
      level: serverConfig.logLevel,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (sessions, lifecycle, runs, storage)
export const logger = createLogger('server.log', 'server');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

export function logServerStarted(port: number) {
  logger.info({ port, event: 'server_started' }, `Game server running on port ${port}`);
}

export function logSessionStarted(sessionId: string, seed: number) {
  logger.info({ sessionId, seed, event: 'session_started' }, `Session started (seed ${seed})`);
}

export function logSessionEnded(sessionId: string, reason: string) {
  logger.info({ sessionId, reason, event: 'session_ended' }, `Session ended: ${reason}`);
}

export function logLifecycleTransition(previous: LifecycleState, current: LifecycleState) {
  logger.debug({ previous, current, event: 'lifecycle_transition' }, `Lifecycle ${previous} -> ${current}`);
}

export function logRunFinished(result: LastResult) {
  logger.info(
    { ...result, event: 'run_finished' },
    `Run finished: ${result.hits} hits, ${result.misses} misses, ${result.escaped} escaped, score ${result.score}`
  );
}

/**
 * Storage failed; everything after this goes to memory.
 */
export function logStorageFallback(operation: string, error: unknown) {
  logger.warn(
    {
      operation,
      event: 'storage_fallback',
      error: error instanceof Error ? error.message : String(error),
    },
    `Storage ${operation} failed, falling back to in-memory storage for this session`
  );
}
