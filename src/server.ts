/* src/server.ts
   Process entry: load the scan context once, serve until a stop signal.
*/
import { buildServer } from './app';
import { config } from './config';
import { loadScanContext } from './compliance/engine';
import { createLogger } from './observability';

// Module-level logger for startup and shutdown
const log = createLogger('server');

async function main() {
  // Fails fast on a malformed lexicon or gazetteer
  const ctx = loadScanContext(config);
  const app = await buildServer(ctx);

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info({ signal }, 'shutting down');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (s) => void shutdown(s));
  process.once('SIGTERM', (s) => void shutdown(s));

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info({ port: config.server.port, host: config.server.host }, 'API listening');
}

main().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
