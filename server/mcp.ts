import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getLogger, setLogSink } from './core/logger.js';
import { loadConfig, validateConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { createServices, startBackground } from './services.js';
import { createMcpServer } from './mcp/server.js';

// stdout carries the protocol
setLogSink('stderr');

const log = getLogger('mcp');

async function main() {
  const cfg = loadConfig();
  const problems = validateConfig(cfg);
  if (problems.length > 0) throw new Error(`Invalid configuration: ${problems.join('; ')}`);

  const services = createServices(cfg);
  const stopBackground = startBackground(services);
  const server = createMcpServer({ engine: services.engine, syncWaitMs: cfg.syncWaitMs }, log, {
    name: 'docshift',
    version: '1.0.0',
  });

  const shutdown = async () => {
    stopBackground();
    await services.engine.shutdown();
    services.broadcaster.shutdown();
    await server.close();
  };
  process.on('SIGINT', () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('shutdown_failed', errorMessage(err));
        process.exit(1);
      }
    );
  });

  await server.connect(new StdioServerTransport());
  log.info('mcp_server_started', { formats: services.engine.listFormats() });
}

main().catch((err: unknown) => {
  log.error('fatal_startup', errorMessage(err));
  process.exitCode = 1;
});
