import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { DEFAULT_TENANT_ID, seedDemoTenant } from './infrastructure/seeds.js';

const start = async () => {
  const config = loadConfig();
  const app = buildApp({ config });

  process.on('unhandledRejection', reason => {
    app.log.error({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  if (config.persistence.sqlite.seedDefaultTenant) {
    const seeded = seedDemoTenant(app.services.repositories, DEFAULT_TENANT_ID);
    app.log.info({ tenantId: DEFAULT_TENANT_ID, seeded }, 'Default tenant ready');
  }

  try {
    await app.listen({ port: config.server.port, host: '0.0.0.0' });
    app.services.sweeper.start();
  } catch (err) {
    app.log.error({ err }, 'Error starting server');
    process.exit(1);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app
        .close()
        .then(() => process.exit(0))
        .catch(err => {
          app.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }
};

void start();
