import { loadConfig } from '../../src/config/index.js';
import { createLogger } from '../../src/common/logger.js';
import { createSQLiteRepositoryBundle } from '../../src/infrastructure/repositories.js';
import { DEFAULT_TENANT_ID, seedDemoTenant } from '../../src/infrastructure/seeds.js';

function parseTenant(argv: string[]): string {
  for (const arg of argv) {
    if (arg.startsWith('--tenant=')) {
      return arg.slice('--tenant='.length);
    }
  }
  return DEFAULT_TENANT_ID;
}

const config = loadConfig();
const logger = createLogger({ name: 'db:seed', level: config.server.logLevel });

async function main() {
  const tenantId = parseTenant(process.argv.slice(2));
  const repositories = createSQLiteRepositoryBundle(config);
  try {
    const seeded = seedDemoTenant(repositories, tenantId);
    logger.info({ tenantId, seeded }, seeded ? 'Seeded demo assessment' : 'Demo assessment already present');
  } finally {
    await repositories.dispose?.();
  }
}

main().catch(err => {
  logger.error({ err }, 'Seeding failed');
  process.exit(1);
});
