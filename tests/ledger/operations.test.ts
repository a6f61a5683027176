/**
 * Schema operation tests
 */

import { describe, it, expect } from 'vitest';
import {
  addColumn,
  addConstraint,
  check,
  checkReversible,
  column,
  constraintName,
  createIndex,
  createTable,
  describeOperation,
  dropColumn,
  dropConstraint,
  dropIndex,
  dropTable,
  invertOperation,
  invertOperations,
  operationsEqual,
  varchar,
} from '../../src/ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../../src/ledger/types.js';

const accounts: TableDefinition = {
  table: 'accounts',
  columns: [
    column('id', 'integer', { nullable: false }),
    column('email', varchar(255), { nullable: false }),
    column('credits', 'bigint', { nullable: false, serverDefault: 0 }),
  ],
  primaryKey: ['id'],
  constraints: [{ type: 'unique', columns: ['email'] }],
};

const byEmail: IndexDefinition = { name: 'ix_accounts_email', table: 'accounts', columns: ['email'] };
const nickname = column('nickname', varchar(40), { nullable: true });
const positiveCredits = check('accounts_credits_check', 'credits >= 0');

describe('operations', () => {
  describe('describeOperation', () => {
    it('should name the table, column, index or constraint involved', () => {
      expect(describeOperation(createTable(accounts))).toBe('create_table accounts');
      expect(describeOperation(dropColumn('accounts', nickname))).toBe('drop_column accounts.nickname');
      expect(describeOperation(createIndex(byEmail))).toBe('create_index ix_accounts_email on accounts');
      expect(describeOperation(addConstraint('accounts', positiveCredits))).toBe(
        'add_constraint accounts_credits_check on accounts'
      );
    });
  });

  describe('constraintName', () => {
    it('should fall back to table_columns_key for unnamed unique constraints', () => {
      expect(constraintName('accounts', { type: 'unique', columns: ['email'] })).toBe('accounts_email_key');
    });

    it('should fall back to table_columns_fkey for unnamed foreign keys', () => {
      expect(
        constraintName('accounts', {
          type: 'foreign_key',
          columns: ['owner_id'],
          referencedTable: 'users',
          referencedColumns: ['id'],
        })
      ).toBe('accounts_owner_id_fkey');
    });

    it('should keep explicit names', () => {
      expect(constraintName('accounts', { type: 'unique', name: 'uq_email', columns: ['email'] })).toBe('uq_email');
    });
  });

  describe('invertOperation', () => {
    it('should pair each kind with its opposite', () => {
      expect(invertOperation(createTable(accounts))).toEqual(dropTable(accounts));
      expect(invertOperation(dropTable(accounts))).toEqual(createTable(accounts));
      expect(invertOperation(addColumn('accounts', nickname))).toEqual(dropColumn('accounts', nickname));
      expect(invertOperation(dropIndex(byEmail))).toEqual(createIndex(byEmail));
      expect(invertOperation(dropConstraint('accounts', positiveCredits))).toEqual(
        addConstraint('accounts', positiveCredits)
      );
    });

    it('should be its own inverse', () => {
      const op = addConstraint('accounts', positiveCredits);
      expect(invertOperation(invertOperation(op))).toEqual(op);
    });
  });

  describe('invertOperations', () => {
    it('should invert each operation and reverse the order', () => {
      const upgrade = [createTable(accounts), createIndex(byEmail), addColumn('accounts', nickname)];
      expect(invertOperations(upgrade)).toEqual([
        dropColumn('accounts', nickname),
        dropIndex(byEmail),
        dropTable(accounts),
      ]);
    });
  });

  describe('operationsEqual', () => {
    it('should ignore key order and undefined fields', () => {
      const a = createIndex({ name: 'ix', table: 't', columns: ['c'] });
      const b = createIndex({ columns: ['c'], table: 't', name: 'ix', unique: undefined });
      expect(operationsEqual(a, b)).toBe(true);
    });

    it('should notice a changed definition', () => {
      const a = addColumn('accounts', column('nickname', varchar(40), { nullable: true }));
      const b = addColumn('accounts', column('nickname', varchar(80), { nullable: true }));
      expect(operationsEqual(a, b)).toBe(false);
    });
  });

  describe('checkReversible', () => {
    const base = { id: '100', parentId: null, message: 'accounts' };

    it('should accept a downgrade that inverts the upgrade', () => {
      const revision: Revision = {
        ...base,
        upgrade: [createTable(accounts), createIndex(byEmail)],
        downgrade: [dropIndex(byEmail), dropTable(accounts)],
      };
      expect(checkReversible(revision)).toBeNull();
    });

    it('should report a downgrade in the wrong order', () => {
      const revision: Revision = {
        ...base,
        upgrade: [createTable(accounts), createIndex(byEmail)],
        downgrade: [dropTable(accounts), dropIndex(byEmail)],
      };
      expect(checkReversible(revision)).toEqual({
        revisionId: '100',
        reason: 'operation #1: expected drop_index ix_accounts_email on accounts, found drop_table accounts',
      });
    });

    it('should report a missing operation', () => {
      const revision: Revision = {
        ...base,
        upgrade: [createTable(accounts), createIndex(byEmail)],
        downgrade: [dropTable(accounts)],
      };
      expect(checkReversible(revision)?.reason).toBe('downgrade has 1 operations, expected 2');
    });

    it('should report an inverse that restores a different definition', () => {
      const revision: Revision = {
        ...base,
        upgrade: [dropConstraint('accounts', positiveCredits)],
        downgrade: [addConstraint('accounts', check('accounts_credits_check', 'credits > 0'))],
      };
      expect(checkReversible(revision)?.reason).toBe(
        'operation #1: add_constraint accounts_credits_check on accounts does not restore the original definition'
      );
    });
  });
});
