import path from 'path';
import { Server } from 'socket.io';
import { randomSeed, type ServerMessage } from '@asteroid-tap/shared';
import { serverConfig } from './config';
import { logger, logServerStarted } from './logger';
import { GameSession } from './session/GameSession';
import { FallbackStorage, FileStorage } from './storage';

// ============================================
// Server Configuration
// ============================================

const PORT = serverConfig.port;
const STORAGE_FILE = path.join(serverConfig.dataDir, 'storage.json');

// Inbound shell events; anything else is ignored by Socket.IO routing
const CLIENT_EVENTS = ['startGame', 'togglePause', 'quitGame', 'updateSettings', 'pointerDown'] as const;

// ============================================
// Socket.io Server Setup
// ============================================

const io = new Server(PORT, {
  cors: {
    origin: '*', // Allow all origins for development
  },
});

logServerStarted(PORT);

const sessions = new Map<string, GameSession>();

// One storage for the process; every session reads and writes the same file
const storage = new FallbackStorage(new FileStorage(STORAGE_FILE));

io.on('connection', (socket) => {
  const session = new GameSession({
    connection: {
      id: socket.id,
      send: (message: ServerMessage) => {
        socket.emit(message.type, message);
      },
    },
    storage,
    seed: serverConfig.fixedSeed ?? randomSeed(),
    engineConfig: { maxFrameDeltaMs: serverConfig.maxFrameDeltaMs },
  });
  sessions.set(socket.id, session);

  // ============================================
  // Socket Handler Error Wrapper
  // ============================================
  // Wraps socket event handlers in try-catch so one bad message cannot take
  // the process down; the error is logged with socket context
  const safeHandler = <T>(eventName: string, handler: (message: T) => void) => {
    return (message: T) => {
      try {
        handler(message);
      } catch (error) {
        logger.error(
          {
            event: 'socket_handler_error',
            socketId: socket.id,
            eventName,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
          },
          `Socket handler ${eventName} threw an error`
        );
      }
    };
  };

  for (const eventName of CLIENT_EVENTS) {
    socket.on(
      eventName,
      safeHandler(eventName, (payload: unknown) => session.receive(eventName, payload))
    );
  }

  socket.on(
    'disconnect',
    safeHandler('disconnect', (reason: string) => {
      sessions.delete(socket.id);
      session.stop(`disconnect: ${reason}`).catch((error: unknown) => {
        logger.error(
          { event: 'session_stop_error', socketId: socket.id, error: error instanceof Error ? error.message : String(error) },
          'Failed to stop session'
        );
      });
    })
  );

  session.start().catch((error: unknown) => {
    logger.error(
      { event: 'session_start_error', socketId: socket.id, error: error instanceof Error ? error.message : String(error) },
      'Failed to start session'
    );
  });
});

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 * Persists runs in progress, then closes the Socket.io server.
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);

  const pending = [...sessions.values()].map((session) => session.stop('shutdown'));
  sessions.clear();

  Promise.allSettled(pending).then(() => {
    io.close((err) => {
      if (err) {
        logger.error({ event: 'shutdown_error', error: err.message }, 'Error closing Socket.io server');
      } else {
        logger.info({ event: 'shutdown_complete' }, 'Server shut down cleanly');
      }
      process.exit(0);
    });
  }).catch((error: unknown) => {
    logger.error({ event: 'shutdown_error', error: String(error) }, 'Shutdown failed');
    process.exit(1);
  });

  // Force exit after 3 seconds if graceful shutdown hangs
  setTimeout(() => {
    logger.warn({ event: 'shutdown_forced' }, 'Forced shutdown after timeout');
    process.exit(1);
  }, 3000).unref(); // .unref() ensures this timer doesn't keep process alive
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
