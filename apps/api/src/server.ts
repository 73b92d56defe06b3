import 'dotenv/config';
import { createServer } from 'http';
import { closePool, createRecapExporters, detectExportCapabilities } from '@ops-recap/adapters';

import { buildApp, buildRecordStore } from './app.js';
import { loadRecapConfig } from './config/recap-config.js';
import { RecapService } from './services/recap.service.js';

async function main() {
  const config = loadRecapConfig();

  const store = await buildRecordStore(config);
  console.log(`[server] record store mode: ${store.getMode()}`);

  const capabilities = detectExportCapabilities();
  console.log(
    `[server] exports: ${Object.entries(capabilities)
      .map(([kind, status]) => `${kind}=${status}`)
      .join(' ')}`,
  );

  const service = new RecapService({
    store,
    exporters: createRecapExporters(capabilities),
    capabilities,
  });

  const httpServer = createServer(buildApp({ service, config }));

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
