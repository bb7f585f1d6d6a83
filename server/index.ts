import type { Server } from 'node:http';
import { getLogger } from './core/logger.js';
import { loadConfig, validateConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { createServices, startBackground } from './services.js';
import { createApp } from './app.js';

// ---- App init ----
const log = getLogger('server');
const cfg = loadConfig();

const problems = validateConfig(cfg);
if (problems.length > 0) {
  for (const problem of problems) log.error('config_invalid', problem);
  throw new Error(`Invalid configuration: ${problems.join('; ')}`);
}

export const services = createServices(cfg);
export const app = createApp(services);

// ========================
// Start server (retry on EADDRINUSE)
// ========================
function startServerWithRetry(port: number, maxAttempts = 40): Promise<Server> {
  let attempts = 0;
  return new Promise((resolve, reject) => {
    const tryListen = () => {
      attempts += 1;
      const server = app.listen(port);
      server.keepAliveTimeout = 120_000;
      server.headersTimeout = 125_000;
      server.requestTimeout = 0;
      const onError = (err: NodeJS.ErrnoException) => {
        server.off('listening', onListening);
        if (err.code === 'EADDRINUSE') {
          server.close();
          if (attempts >= maxAttempts) {
            const message = `Port ${port} busy after ${maxAttempts} attempts`;
            log.error('port_in_use_exhausted', message);
            reject(new Error(message));
            return;
          }
          const delay = Math.min(1_500, 150 * attempts);
          log.warn('port_in_use_retry', `Port ${port} busy, retrying in ${delay}ms (attempt ${attempts}/${maxAttempts})...`);
          setTimeout(tryListen, delay);
          return;
        }
        log.error('server_error', err.message);
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        log.info(`docshift listening on http://localhost:${port}`);
        log.info(`CORS allowed origins: ${cfg.corsOrigin || 'ALL (no restrictions)'}`);
        resolve(server);
      };
      server.once('error', onError);
      server.once('listening', onListening);
    };
    tryListen();
  });
}

let server: Server | undefined;
let stopBackground: (() => void) | undefined;

if (process.env.NODE_ENV !== 'test') {
  stopBackground = startBackground(services);
  startServerWithRetry(cfg.port).then(
    (s) => {
      server = s;
    },
    (err: unknown) => {
      log.error('fatal_startup', errorMessage(err));
      process.exitCode = 1;
    }
  );
}

// ========================
// Graceful shutdown & crash guards
// ========================
async function gracefulShutdown(signal: string) {
  log.info(`shutdown_${signal.toLowerCase()}`, 'Shutting down, failing pending jobs...');
  stopBackground?.();
  await services.engine.shutdown();
  services.broadcaster.shutdown();
  server?.close();
  setTimeout(() => process.exit(0), 300).unref();
}

const onSignal = (signal: string) => {
  gracefulShutdown(signal).catch((err: unknown) => {
    log.error('shutdown_failed', errorMessage(err));
    process.exit(1);
  });
};

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

const NOISE = /aborted|socket hang up|econnreset|stream prematurely closed/;

process.on('uncaughtException', (err) => {
  if (NOISE.test(err.message.toLowerCase())) return;
  log.error('uncaught_exception', err.stack || String(err));
});
process.on('unhandledRejection', (reason: unknown) => {
  if (NOISE.test(errorMessage(reason).toLowerCase())) return;
  log.error('unhandled_rejection', reason instanceof Error ? reason.stack || reason.message : String(reason));
});
