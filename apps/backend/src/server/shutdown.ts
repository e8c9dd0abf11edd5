import type { Server as HttpServer } from 'node:http';
import type { Socket } from 'node:net';
import type { Logger } from '../utils/logger.js';

type ShutdownDeps = {
  httpServer: HttpServer;
  shutdownTimeoutMs: number;
  logger: Logger;
  exit?: (code: number) => void;
};

export function setupShutdownHandlers(deps: ShutdownDeps) {
  const { httpServer, logger } = deps;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const activeHttpConnections = new Set<Socket>();
  let shuttingDown = false;

  httpServer.on('connection', (socket: Socket) => {
    activeHttpConnections.add(socket);
    socket.on('close', () => {
      activeHttpConnections.delete(socket);
    });
  });

  async function closeHttpServerWithDrain(timeoutMs: number): Promise<void> {
    if (!httpServer.listening) return;
    await new Promise<void>((resolve) => {
      let settled = false;
      const done = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        logger.warn('shutdown.http_drain_timeout', {
          timeoutMs,
          openConnections: activeHttpConnections.size,
        });
        for (const socket of activeHttpConnections) {
          socket.destroy();
        }
        done();
      }, timeoutMs);
      timer.unref?.();

      httpServer.close((err) => {
        if (err) logger.error('shutdown.http_close_failed', { errorMessage: err.message });
        done();
      });
      httpServer.closeIdleConnections();
    });
  }

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('shutdown.start', { signal, timeoutMs: deps.shutdownTimeoutMs });

    const forceExitTimer = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      exit(1);
    }, deps.shutdownTimeoutMs + 1000);
    forceExitTimer.unref?.();

    await closeHttpServerWithDrain(deps.shutdownTimeoutMs);

    clearTimeout(forceExitTimer);
    logger.info('shutdown.complete', { signal });
    exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { shutdown };
}
