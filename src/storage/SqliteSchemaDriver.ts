/**
 * SqliteSchemaDriver - Applies schema operations to a sql.js database
 *
 * Owns the connection, the persisted revision marker and step log, scoped
 * transactions, and persistence of the database file after each commit.
 */

import initSqlJs, { Database as SqlJsDatabase } from 'sql.js';
import type { SqlValue } from 'sql.js';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { Direction } from '../ledger/types.js';
import type { ExecutedStep, SchemaDriver, SchemaOperation, SchemaTransaction } from '../ledger/types.js';
import { errorMessage } from '../ledger/errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { quoteIdent, renderCheckViolationQuery, renderOperation } from './sqliteDialect.js';

export const REVISION_TABLE = 'schema_revision';
export const REVISION_LOG_TABLE = 'schema_revision_log';

export interface SqliteDriverConfig {
  /** Database file; omitted for a purely in-memory database */
  databasePath?: string;
  logger?: Logger;
}

export type Row = Record<string, SqlValue>;

export interface ColumnSnapshot {
  name: string;
  type: string;
  notNull: boolean;
  defaultValue: string | null;
  primaryKey: boolean;
}

export interface SchemaSnapshot {
  tables: Record<string, ColumnSnapshot[]>;
  /** `<index>@<table>` for explicitly created indexes */
  indexes: string[];
  /** `<trigger>@<table>` */
  triggers: string[];
}

export class SqliteSchemaDriver implements SchemaDriver {
  private db: SqlJsDatabase | null;
  private databasePath: string | null;
  private logger: Logger;
  private inTransaction = false;

  private constructor(db: SqlJsDatabase, databasePath: string | null, logger: Logger) {
    this.db = db;
    this.databasePath = databasePath;
    this.logger = logger;
  }

  /**
   * Open (or create) the database and its bookkeeping tables
   */
  static async open(config: SqliteDriverConfig = {}): Promise<SqliteSchemaDriver> {
    const SQL = await initSqlJs();
    const databasePath = config.databasePath ?? null;
    const logger = config.logger ?? silentLogger;

    let db: SqlJsDatabase;
    if (databasePath && existsSync(databasePath)) {
      db = new SQL.Database(readFileSync(databasePath));
      logger.debug(`Loaded database ${databasePath}`);
    } else {
      if (databasePath) {
        const dir = dirname(databasePath);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        logger.debug(`Creating database ${databasePath}`);
      }
      db = new SQL.Database();
    }

    const driver = new SqliteSchemaDriver(db, databasePath, logger);
    driver.configure();
    driver.ensureStateTables();
    driver.flush();
    return driver;
  }

  private getDb(): SqlJsDatabase {
    if (!this.db) {
      throw new Error('Database is closed');
    }
    return this.db;
  }

  // Pragmas reset whenever sql.js exports the database
  private configure(): void {
    this.getDb().run('PRAGMA foreign_keys = ON');
  }

  private ensureStateTables(): void {
    const db = this.getDb();
    db.run(`
      CREATE TABLE IF NOT EXISTS ${REVISION_TABLE} (
        revision_id TEXT NOT NULL
      )
    `);
    db.run(`
      CREATE TABLE IF NOT EXISTS ${REVISION_LOG_TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        revision_id TEXT NOT NULL,
        direction TEXT NOT NULL CHECK (direction IN ('up', 'down')),
        applied_at INTEGER NOT NULL
      )
    `);
  }

  /**
   * Run a query and return rows as objects
   */
  query(sql: string, params: SqlValue[] = []): Row[] {
    const result = this.getDb().exec(sql, params);
    if (result.length === 0) return [];

    const { columns, values } = result[0];
    return values.map(row => {
      const record: Row = {};
      columns.forEach((name, i) => {
        record[name] = row[i];
      });
      return record;
    });
  }

  /**
   * Execute a statement outside the ledger (data fixes, tests)
   */
  execute(sql: string, params: SqlValue[] = []): void {
    this.getDb().run(sql, params);
  }

  columnsOf(table: string): string[] {
    return this.query(`PRAGMA table_info(${quoteIdent(table)})`).map(row => String(row.name));
  }

  async readCurrent(): Promise<string | null> {
    const rows = this.query(`SELECT revision_id FROM ${REVISION_TABLE} LIMIT 1`);
    return rows.length > 0 ? String(rows[0].revision_id) : null;
  }

  async readLog(): Promise<ExecutedStep[]> {
    return this.query(
      `SELECT revision_id, direction, applied_at FROM ${REVISION_LOG_TABLE} ORDER BY id`
    ).map(row => ({
      revisionId: String(row.revision_id),
      direction: row.direction === Direction.Down ? Direction.Down : Direction.Up,
      appliedAt: Number(row.applied_at),
    }));
  }

  /**
   * Execute operations within a transaction.
   * If the callback throws, the transaction is rolled back and the error rethrown.
   */
  async transaction<T>(work: (tx: SchemaTransaction) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      throw new Error('Nested schema transactions are not supported');
    }

    const db = this.getDb();
    db.run('BEGIN TRANSACTION');
    this.inTransaction = true;

    try {
      const result = await work(this.createTransaction());
      db.run('COMMIT');
      this.inTransaction = false;
      this.flush();
      return result;
    } catch (error) {
      this.inTransaction = false;
      try {
        db.run('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn(`Rollback failed: ${errorMessage(rollbackError)}`);
      }
      throw error;
    }
  }

  private createTransaction(): SchemaTransaction {
    return {
      apply: async (operation: SchemaOperation) => {
        if (operation.kind === 'add_constraint' && operation.constraint.type === 'check') {
          const violation = this.query(renderCheckViolationQuery(operation.table, operation.constraint));
          if (violation.length > 0) {
            throw new Error(`CHECK constraint failed: ${operation.constraint.name}`);
          }
        }
        const statements = renderOperation(operation, {
          columnsOf: table => this.columnsOf(table),
        });
        for (const statement of statements) {
          this.logger.debug(statement);
          this.getDb().run(statement);
        }
      },
      writeCurrent: async (revisionId: string | null) => {
        const db = this.getDb();
        db.run(`DELETE FROM ${REVISION_TABLE}`);
        if (revisionId !== null) {
          db.run(`INSERT INTO ${REVISION_TABLE} (revision_id) VALUES (?)`, [revisionId]);
        }
      },
      appendLog: async (step: ExecutedStep) => {
        this.getDb().run(
          `INSERT INTO ${REVISION_LOG_TABLE} (revision_id, direction, applied_at) VALUES (?, ?, ?)`,
          [step.revisionId, step.direction, step.appliedAt]
        );
      },
    };
  }

  /**
   * Structural snapshot of user objects, excluding the ledger's own tables
   */
  describeSchema(): SchemaSnapshot {
    const objects = this.query(
      `SELECT type, name, tbl_name FROM sqlite_master
       WHERE name NOT LIKE 'sqlite_%'
         AND tbl_name NOT IN (?, ?)
         AND sql IS NOT NULL
       ORDER BY type, name`,
      [REVISION_TABLE, REVISION_LOG_TABLE]
    );

    const snapshot: SchemaSnapshot = { tables: {}, indexes: [], triggers: [] };
    for (const object of objects) {
      const name = String(object.name);
      const table = String(object.tbl_name);
      if (object.type === 'table') {
        snapshot.tables[name] = this.query(`PRAGMA table_info(${quoteIdent(name)})`).map(row => ({
          name: String(row.name),
          type: String(row.type),
          notNull: row.notnull === 1,
          defaultValue: row.dflt_value === null ? null : String(row.dflt_value),
          primaryKey: row.pk !== 0,
        }));
      } else if (object.type === 'index') {
        snapshot.indexes.push(`${name}@${table}`);
      } else if (object.type === 'trigger') {
        snapshot.triggers.push(`${name}@${table}`);
      }
    }
    return snapshot;
  }

  /**
   * Write the database to disk (no-op for in-memory databases)
   */
  flush(): void {
    if (!this.databasePath || !this.db) return;
    const data = this.db.export();
    writeFileSync(this.databasePath, Buffer.from(data));
    this.configure();
  }

  async close(): Promise<void> {
    if (this.db) {
      if (!this.inTransaction) {
        this.flush();
      }
      this.db.close();
      this.db = null;
    }
  }
}
