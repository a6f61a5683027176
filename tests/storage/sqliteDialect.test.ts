/**
 * SQLite dialect rendering tests
 */

import { describe, it, expect } from 'vitest';
import {
  addConstraint,
  addColumn,
  check,
  column,
  createIndex,
  dropConstraint,
  dropIndex,
  varchar,
} from '../../src/ledger/operations.js';
import type { TableDefinition } from '../../src/ledger/types.js';
import {
  qualifyPredicate,
  quoteIdent,
  renderColumn,
  renderCreateTable,
  renderDefault,
  renderCheckViolationQuery,
  renderOperation,
  renderType,
} from '../../src/storage/sqliteDialect.js';

const context = { columnsOf: () => ['id', 'status'] };

describe('sqliteDialect', () => {
  describe('identifiers and literals', () => {
    it('should double embedded quotes', () => {
      expect(quoteIdent('users')).toBe('"users"');
      expect(quoteIdent('odd"name')).toBe('"odd""name"');
    });

    it('should render column types', () => {
      expect(renderType('integer')).toBe('INTEGER');
      expect(renderType('bigint')).toBe('BIGINT');
      expect(renderType('boolean')).toBe('BOOLEAN');
      expect(renderType('datetime')).toBe('DATETIME');
      expect(renderType(varchar(20))).toBe('VARCHAR(20)');
    });

    it('should render server defaults', () => {
      expect(renderDefault(true)).toBe('1');
      expect(renderDefault(false)).toBe('0');
      expect(renderDefault(20)).toBe('20');
      expect(renderDefault('')).toBe("''");
      expect(renderDefault("it's")).toBe("'it''s'");
      expect(renderDefault({ sql: 'now' })).toBe('CURRENT_TIMESTAMP');
    });
  });

  describe('renderColumn', () => {
    it('should render nullability, default and inline reference', () => {
      expect(
        renderColumn(
          column('user_id', 'bigint', {
            nullable: false,
            references: { table: 'users', column: 'telegram_id', onDelete: 'cascade' },
          })
        )
      ).toBe('"user_id" BIGINT NOT NULL REFERENCES "users" ("telegram_id") ON DELETE CASCADE');
      expect(renderColumn(column('status', varchar(20), { nullable: false, serverDefault: 'pending' }))).toBe(
        `"status" VARCHAR(20) NOT NULL DEFAULT 'pending'`
      );
      expect(renderColumn(column('ended_at', 'datetime', { nullable: true }))).toBe('"ended_at" DATETIME');
    });
  });

  describe('qualifyPredicate', () => {
    it('should prefix known columns with NEW', () => {
      expect(qualifyPredicate("status IN ('pending', 'accepted')", ['id', 'status'])).toBe(
        `NEW."status" IN ('pending', 'accepted')`
      );
      expect(qualifyPredicate('value IN (-1, 1)', ['value'])).toBe('NEW."value" IN (-1, 1)');
      expect(qualifyPredicate('"hunger" BETWEEN 0 AND 100', ['hunger'])).toBe(
        'NEW."hunger" BETWEEN 0 AND 100'
      );
    });

    it('should leave string literals and qualified names alone', () => {
      expect(qualifyPredicate("t.status = 'status'", ['status'])).toBe("t.status = 'status'");
      expect(qualifyPredicate("status <> 'it''s status'", ['status'])).toBe(
        `NEW."status" <> 'it''s status'`
      );
    });
  });

  describe('renderCreateTable', () => {
    it('should emit the table, then check triggers and unique indexes in constraint order', () => {
      const pets: TableDefinition = {
        table: 'pets',
        columns: [
          column('id', 'integer', { nullable: false }),
          column('hunger', 'integer', { nullable: false, serverDefault: 50 }),
        ],
        primaryKey: ['id'],
        constraints: [
          check('pets_hunger_check', 'hunger BETWEEN 0 AND 100'),
          { type: 'unique', columns: ['hunger'] },
        ],
      };

      expect(renderCreateTable(pets)).toEqual([
        'CREATE TABLE "pets" (\n  "id" INTEGER NOT NULL,\n  "hunger" INTEGER NOT NULL DEFAULT 50,\n  PRIMARY KEY ("id")\n)',
        'CREATE TRIGGER "pets_hunger_check__insert" BEFORE INSERT ON "pets" FOR EACH ROW ' +
          'WHEN NOT (NEW."hunger" BETWEEN 0 AND 100) ' +
          "BEGIN SELECT RAISE(ABORT, 'CHECK constraint failed: pets_hunger_check'); END",
        'CREATE TRIGGER "pets_hunger_check__update" BEFORE UPDATE ON "pets" FOR EACH ROW ' +
          'WHEN NOT (NEW."hunger" BETWEEN 0 AND 100) ' +
          "BEGIN SELECT RAISE(ABORT, 'CHECK constraint failed: pets_hunger_check'); END",
        'CREATE UNIQUE INDEX "pets_hunger_key" ON "pets" ("hunger")',
      ]);
    });

    it('should render table-level foreign keys inside the table body', () => {
      const [statement] = renderCreateTable({
        table: 'tickets',
        columns: [column('lottery_id', 'integer', { nullable: false })],
        constraints: [
          {
            type: 'foreign_key',
            columns: ['lottery_id'],
            referencedTable: 'lotteries',
            referencedColumns: ['id'],
            onDelete: 'cascade',
          },
        ],
      });
      expect(statement).toBe(
        'CREATE TABLE "tickets" (\n  "lottery_id" INTEGER NOT NULL,\n' +
          '  CONSTRAINT "tickets_lottery_id_fkey" FOREIGN KEY ("lottery_id") REFERENCES "lotteries" ("id") ON DELETE CASCADE\n)'
      );
    });
  });

  describe('renderOperation', () => {
    it('should render column and index changes', () => {
      expect(renderOperation(addColumn('users', column('reputation', 'integer', { nullable: false, serverDefault: 0 })), context)).toEqual([
        'ALTER TABLE "users" ADD COLUMN "reputation" INTEGER NOT NULL DEFAULT 0',
      ]);
      const index = { name: 'ix_users_status', table: 'users', columns: ['status', 'id'] };
      expect(renderOperation(createIndex(index), context)).toEqual([
        'CREATE INDEX "ix_users_status" ON "users" ("status", "id")',
      ]);
      expect(renderOperation(dropIndex(index), context)).toEqual(['DROP INDEX "ix_users_status"']);
    });

    it('should qualify an added check against the live table columns', () => {
      const statements = renderOperation(
        addConstraint('users', check('users_status_check', "status IN ('a', 'b')")),
        context
      );
      expect(statements).toHaveLength(2);
      expect(statements[0]).toContain(`WHEN NOT (NEW."status" IN ('a', 'b'))`);
    });

    it('should find existing rows that break a check', () => {
      expect(renderCheckViolationQuery('pets', check('pets_hunger_check', 'hunger BETWEEN 0 AND 100'))).toBe(
        'SELECT 1 FROM "pets" WHERE NOT (hunger BETWEEN 0 AND 100) LIMIT 1'
      );
    });

    it('should drop both triggers of a check', () => {
      expect(renderOperation(dropConstraint('users', check('users_status_check', 'status > 0')), context)).toEqual([
        'DROP TRIGGER "users_status_check__insert"',
        'DROP TRIGGER "users_status_check__update"',
      ]);
    });

    it('should drop a unique constraint through its index', () => {
      expect(
        renderOperation(dropConstraint('gangs', { type: 'unique', columns: ['name'] }), context)
      ).toEqual(['DROP INDEX "gangs_name_key"']);
    });

    it('should refuse to alter foreign keys on an existing table', () => {
      const fk = {
        type: 'foreign_key' as const,
        columns: ['owner_id'],
        referencedTable: 'users',
        referencedColumns: ['id'],
      };
      expect(() => renderOperation(addConstraint('pets', fk), context)).toThrow(
        'SQLite cannot add foreign key pets_owner_id_fkey to existing table pets'
      );
    });
  });
});
