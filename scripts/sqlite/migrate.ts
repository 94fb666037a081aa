import { loadConfig } from '../../src/config/index.js';
import { createLogger } from '../../src/common/logger.js';
import { createSQLiteTenantClient, resolveTenantDbPath } from '../../src/infrastructure/sqlite/client.js';
import { DEFAULT_TENANT_ID } from '../../src/infrastructure/seeds.js';

interface MigrateOptions {
  tenantIds: string[];
  allTenants: boolean;
}

function parseArgs(argv: string[]): MigrateOptions {
  const tenantIds = new Set<string>();
  let allTenants = false;

  for (const arg of argv) {
    if (arg.startsWith('--tenant=')) {
      tenantIds.add(arg.slice('--tenant='.length));
    } else if (arg === '--all-tenants') {
      allTenants = true;
    }
  }

  return { tenantIds: Array.from(tenantIds), allTenants };
}

const config = loadConfig();
const logger = createLogger({ name: 'db:migrate', level: config.server.logLevel });

function main() {
  const options = parseArgs(process.argv.slice(2));
  const client = createSQLiteTenantClient(config.persistence.sqlite);

  try {
    // Opening a connection applies pending migrations.
    const tenants = new Set<string>(options.allTenants ? client.listTenants() : []);
    options.tenantIds.forEach(tenantId => tenants.add(tenantId));
    if (tenants.size === 0) {
      tenants.add(DEFAULT_TENANT_ID);
    }

    for (const tenantId of tenants) {
      client.getConnection(tenantId);
      const targetPath = resolveTenantDbPath(config.persistence.sqlite, tenantId);
      logger.info({ tenantId, targetPath }, 'Applied migrations');
    }
  } finally {
    client.closeAll();
  }
}

try {
  main();
} catch (err) {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
}
