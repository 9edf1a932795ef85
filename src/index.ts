import dotenv from 'dotenv';
import type { Server } from 'node:http';
import { createApp } from './api/server.js';
import { ui } from './cli/ui.js';
import { loadConfig } from './config/index.js';
import { ingestFiles } from './ingest/loader.js';
import { openStore } from './loans/store.js';
import { createLogger } from './log.js';
import { normalizeError } from './utils/errors.js';
import { VERBOSE, vlog } from './util/verbose.js';

dotenv.config({ override: false });

async function main() {
  const cfg = loadConfig();
  const log = createLogger({ level: cfg.log.level, pretty: cfg.log.pretty });

  if (VERBOSE) vlog({ msg: 'boot', node: process.versions.node, platform: process.platform, pid: process.pid, cwd: process.cwd() });

  process.on('unhandledRejection', (reason: unknown) => {
    const e = normalizeError(reason);
    log.error({ msg: 'unhandledRejection', name: e.name, reason: e.message, stack: e.stack.split('\n').slice(0, 10) });
  });

  const store = openStore(cfg.database.path, log);

  if (cfg.ingest.onStart) {
    await ui.timed('Ingesting history', () => ingestFiles(store, cfg.ingest, log));
  }

  const app = createApp({ store, log });
  const server: Server = app.listen(cfg.server.port, cfg.server.host, () => {
    log.info({ msg: 'server_listening', host: cfg.server.host, port: cfg.server.port, db: cfg.database.path });
    ui.say(`Listening on http://${cfg.server.host}:${cfg.server.port}`, 'success');
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ msg: 'shutdown', signal });
    server.close((err) => {
      if (err) log.error({ msg: 'server_close_failed', message: err.message });
      store.close();
      ui.say('Goodbye', 'dim');
      process.exit(err ? 1 : 0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e: unknown) => {
  const err = normalizeError(e);
  ui.say(`Startup failed: ${err.message}`, 'error');
  process.exit(1);
});
