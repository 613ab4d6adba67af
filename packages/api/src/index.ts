import { serve } from '@hono/node-server';
import { loadBridgeConfig } from '@verity/schemas/src/config-loader.js';
import { createBridgeRuntime } from '@verity/core/src/runtime/bridge-runtime.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

const API_VERSION = '0.1.0';

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);

  const config = loadBridgeConfig();
  const runtime = createBridgeRuntime(config);

  const schedule = runtime.scheduleRefresh();
  runtime.warmup();

  const app = createApp({
    bridge: runtime,
    credentialStore: runtime.credentialStore,
    appName: config.appName,
    version: API_VERSION,
  });

  log.info({ port, appName: config.appName }, 'Starting Verity API server');

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Verity API server running');
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    await schedule.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    log.info('Server closed');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Shutdown failed',
        );
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
