import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { getEnv } from './lib/env.js';
import { createDatabase } from './lib/db.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { ingestionRoutes } from './domains/ingestion/routes/ingestion.routes.js';
import {
  createWarehouseRepository,
  type WarehouseRepository,
} from './domains/ingestion/repos/warehouse.repo.js';
import {
  createIngestionLedgerRepository,
  type IngestionLedgerRepository,
} from './domains/ingestion/repos/ingestion-ledger.repo.js';

export interface AppRepositories {
  warehouseRepo: WarehouseRepository;
  ledgerRepo: IngestionLedgerRepository;
}

export interface BuildAppOptions {
  logger?: boolean;
  logLevel?: string;
  corsOrigin?: string;
  uploadMaxBytes?: number;
}

export function buildApp(repos: AppRepositories, opts: BuildAppOptions = {}) {
  const app = Fastify({
    logger:
      opts.logger === false
        ? false
        : { level: opts.logLevel ?? process.env.LOG_LEVEL ?? 'info' },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  });
  app.register(errorHandlerPluginFp);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  app.register(ingestionRoutes, {
    deps: {
      ingestion: {
        warehouseRepo: repos.warehouseRepo,
        ledgerRepo: repos.ledgerRepo,
        logger: app.log.child({ module: 'ingestion' }),
      },
    },
    uploadMaxBytes: opts.uploadMaxBytes,
  });

  return app;
}

// Start server when run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const env = getEnv();
  const database = createDatabase({
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_MAX,
  });

  const app = buildApp(
    {
      warehouseRepo: createWarehouseRepository(database.db),
      ledgerRepo: createIngestionLedgerRepository(database.db),
    },
    {
      logLevel: env.LOG_LEVEL,
      corsOrigin: env.CORS_ORIGIN,
      uploadMaxBytes: env.UPLOAD_MAX_BYTES,
    },
  );

  app.addHook('onClose', async () => {
    await database.close();
  });

  app.listen({ port: env.API_PORT, host: env.API_HOST }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
