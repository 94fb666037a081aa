import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';
import type { Database as SqlJsDatabase, ParamsObject, SqlJsConfig, SqlJsStatic, SqlValue } from 'sql.js';
import type { SqliteConfig } from '../../config/index.js';
import { runMigrations } from './migrator.js';
import { TenantError } from '../../common/errors.js';

const require = createRequire(import.meta.url);
const initSqlJs: (config?: SqlJsConfig) => Promise<SqlJsStatic> = require('sql.js');
const sqlJsRoot = path.dirname(require.resolve('sql.js/dist/sql-wasm.wasm'));
const SQL = await initSqlJs({ locateFile: (file: string) => path.join(sqlJsRoot, file) });

export type SQLiteValue = SqlValue;
export type SQLiteRow = ParamsObject;

export interface SQLiteStatement {
  run(...parameters: SQLiteValue[]): SQLiteStatement;
  get(...parameters: SQLiteValue[]): SQLiteRow | undefined;
  all(...parameters: SQLiteValue[]): SQLiteRow[];
}

export interface SQLiteDatabase {
  prepare(sql: string): SQLiteStatement;
  exec(sql: string): void;
  /**
   * Runs `fn` inside BEGIN/COMMIT. Nested calls join the outer transaction.
   * Any error rolls everything back and is rethrown.
   */
  transaction<T>(fn: () => T): T;
  close(): void;
}

export interface SQLiteTenantClient {
  getConnection(tenantId: string): SQLiteDatabase;
  /** Tenants with a database file on disk or an open connection. */
  listTenants(): string[];
  closeAll(): void;
}

interface SqlJsConnection {
  db: SqlJsDatabase;
  filePath: string;
  depth: number;
}

function bindAndRun(db: SqlJsDatabase, sql: string, markDirty: () => void): SQLiteStatement {
  const statement: SQLiteStatement = {
    run: (...parameters) => {
      const stmt = db.prepare(sql);
      try {
        if (parameters.length > 0) stmt.bind(parameters);
        stmt.step();
      } finally {
        stmt.free();
      }
      markDirty();
      return statement;
    },
    get: (...parameters) => {
      const stmt = db.prepare(sql);
      try {
        if (parameters.length > 0) stmt.bind(parameters);
        return stmt.step() ? stmt.getAsObject() : undefined;
      } finally {
        stmt.free();
      }
    },
    all: (...parameters) => {
      const stmt = db.prepare(sql);
      const rows: SQLiteRow[] = [];
      try {
        if (parameters.length > 0) stmt.bind(parameters);
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
      } finally {
        stmt.free();
      }
      return rows;
    },
  };
  return statement;
}

function exportDatabase(connection: SqlJsConnection) {
  const data = connection.db.export();
  const buffer = Buffer.from(data);
  fs.mkdirSync(path.dirname(connection.filePath), { recursive: true });
  fs.writeFileSync(connection.filePath, buffer);
}

function createAdapter(connection: SqlJsConnection): SQLiteDatabase {
  // Exporting resets the connection, so writes inside a transaction are flushed on COMMIT.
  const markDirty = () => {
    if (connection.depth === 0) {
      exportDatabase(connection);
    }
  };
  return {
    prepare(sql: string) {
      return bindAndRun(connection.db, sql, markDirty);
    },
    exec(sql: string) {
      connection.db.exec(sql);
      markDirty();
    },
    transaction<T>(fn: () => T): T {
      if (connection.depth > 0) {
        connection.depth += 1;
        try {
          return fn();
        } finally {
          connection.depth -= 1;
        }
      }
      connection.db.exec('BEGIN');
      connection.depth = 1;
      try {
        const result = fn();
        connection.db.exec('COMMIT');
        connection.depth = 0;
        exportDatabase(connection);
        return result;
      } catch (error) {
        connection.depth = 0;
        connection.db.exec('ROLLBACK');
        throw error;
      }
    },
    close() {
      exportDatabase(connection);
      connection.db.close();
    },
  };
}

export function resolveTenantDbPath(config: SqliteConfig, tenantId: string): string {
  const fileName = config.filePattern.replace('{tenantId}', tenantId);
  const candidate = path.resolve(path.isAbsolute(fileName) ? fileName : path.join(config.dbRoot, fileName));
  const [patternPrefix] = config.filePattern.split('{tenantId}');
  const root = path.resolve(path.isAbsolute(fileName) ? path.dirname(`${patternPrefix}x`) : config.dbRoot);
  const relative = path.relative(root, candidate);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new TenantError(`Tenant ${tenantId} does not map to a database file under ${root}`);
  }
  fs.mkdirSync(path.dirname(candidate), { recursive: true });
  return candidate;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tenantFilePattern(config: SqliteConfig): RegExp {
  const [prefix, suffix = ''] = config.filePattern.split('{tenantId}');
  return new RegExp(`^${escapeRegExp(prefix)}(.+)${escapeRegExp(suffix)}$`);
}

function openSqlJsDatabase(filePath: string): SqlJsDatabase {
  if (fs.existsSync(filePath)) {
    const fileBuffer = fs.readFileSync(filePath);
    return new SQL.Database(fileBuffer);
  }
  return new SQL.Database();
}

export function createSQLiteTenantClient(config: SqliteConfig): SQLiteTenantClient {
  const connections = new Map<string, { connection: SqlJsConnection; adapter: SQLiteDatabase }>();
  fs.mkdirSync(config.dbRoot, { recursive: true });

  function getConnection(tenantId: string): SQLiteDatabase {
    const existing = connections.get(tenantId);
    if (existing) {
      return existing.adapter;
    }
    const filePath = resolveTenantDbPath(config, tenantId);
    const connection: SqlJsConnection = { db: openSqlJsDatabase(filePath), filePath, depth: 0 };
    const adapter = createAdapter(connection);
    connections.set(tenantId, { connection, adapter });
    runMigrations(adapter, config.migrationsDir);
    exportDatabase(connection);
    return adapter;
  }

  function listTenants(): string[] {
    const tenants = new Set(connections.keys());
    const pattern = tenantFilePattern(config);
    if (fs.existsSync(config.dbRoot)) {
      for (const file of fs.readdirSync(config.dbRoot)) {
        const match = pattern.exec(file);
        if (match) {
          tenants.add(match[1]);
        }
      }
    }
    return [...tenants].sort();
  }

  function closeAll() {
    const errors: unknown[] = [];
    for (const { adapter } of connections.values()) {
      try {
        adapter.close();
      } catch (error) {
        errors.push(error);
      }
    }
    connections.clear();
    if (errors.length > 0) {
      throw new AggregateError(errors, 'Failed to close one or more SQLite connections');
    }
  }

  return { getConnection, listTenants, closeAll };
}
