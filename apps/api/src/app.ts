import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { resolve } from 'path';
import {
  CsvRecapRepository,
  FallbackRecapStore,
  PgRecapRepository,
  applyRecapSchema,
  getPool,
  poolClient,
} from '@ops-recap/adapters';
import type { RecapUseCasePort } from '@ops-recap/domain';

import { createRecapsRouter } from './controllers/recaps.controller.js';
import { requireAccessPassword } from './middleware/access-gate.js';
import { errorHandler } from './middleware/error-handler.js';
import type { RecapConfig } from './config/recap-config.js';

export interface AppDeps {
  service: RecapUseCasePort;
  config: Pick<RecapConfig, 'corsOrigin' | 'accessPassword' | 'recentLimit' | 'requestLogging'>;
}

export function buildApp({ service, config }: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  if (config.requestLogging) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use(
    '/api/recaps',
    requireAccessPassword(config.accessPassword),
    createRecapsRouter(service, config.recentLimit),
  );

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      store: service.storeMode(),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/**
 * Record store for this process. With a DATABASE_URL the PostgreSQL table is
 * preferred; if its schema cannot be applied the store starts in fallback and
 * the API keeps running on the local file.
 */
export async function buildRecordStore(
  config: Pick<RecapConfig, 'databaseUrl' | 'csvPath'>,
): Promise<FallbackRecapStore> {
  const local = new CsvRecapRepository(resolve(config.csvPath));

  if (!config.databaseUrl) {
    console.log(`[recap-store] no DATABASE_URL, saving to ${config.csvPath}`);
    return new FallbackRecapStore(null, local);
  }

  const db = poolClient(getPool(config.databaseUrl));
  const store = new FallbackRecapStore(new PgRecapRepository(db), local);
  try {
    const count = await applyRecapSchema(db);
    console.log(`[recap-store] postgres schema applied (${count} statements)`);
  } catch (err) {
    store.markRemoteFailed(err);
  }
  return store;
}
