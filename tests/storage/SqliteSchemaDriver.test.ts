/**
 * SqliteSchemaDriver tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { addColumn, addConstraint, check, column, createTable, varchar } from '../../src/ledger/operations.js';
import { Direction } from '../../src/ledger/types.js';
import type { TableDefinition } from '../../src/ledger/types.js';
import { SqliteSchemaDriver } from '../../src/storage/SqliteSchemaDriver.js';

const owners: TableDefinition = {
  table: 'owners',
  columns: [column('id', 'integer', { nullable: false })],
  primaryKey: ['id'],
};

const pets: TableDefinition = {
  table: 'pets',
  columns: [
    column('id', 'integer', { nullable: false }),
    column('owner_id', 'integer', {
      nullable: false,
      references: { table: 'owners', column: 'id', onDelete: 'cascade' },
    }),
    column('kind', varchar(20), { nullable: false, serverDefault: 'cat' }),
  ],
  primaryKey: ['id'],
  constraints: [check('pets_kind_check', "kind IN ('cat', 'dog')")],
};

describe('SqliteSchemaDriver', () => {
  let tempDir: string;
  let databasePath: string;
  let driver: SqliteSchemaDriver;

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'schema-ledger-driver-'));
    databasePath = join(tempDir, 'nested', 'game.db');
    driver = await SqliteSchemaDriver.open({ databasePath });
  });

  afterEach(async () => {
    await driver.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the database file and its directory on open', () => {
    expect(existsSync(databasePath)).toBe(true);
  });

  it('should start at base with an empty log', async () => {
    expect(await driver.readCurrent()).toBeNull();
    expect(await driver.readLog()).toEqual([]);
    expect(driver.describeSchema()).toEqual({ tables: {}, indexes: [], triggers: [] });
  });

  it('should commit operations, marker and log together', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.writeCurrent('001');
      await tx.appendLog({ revisionId: '001', direction: Direction.Up, appliedAt: 5 });
    });

    expect(await driver.readCurrent()).toBe('001');
    expect(await driver.readLog()).toEqual([{ revisionId: '001', direction: Direction.Up, appliedAt: 5 }]);
    expect(driver.columnsOf('owners')).toEqual(['id']);
  });

  it('should roll back everything when the work rejects', async () => {
    await expect(
      driver.transaction(async tx => {
        await tx.apply(createTable(owners));
        await tx.writeCurrent('001');
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await driver.readCurrent()).toBeNull();
    expect(driver.describeSchema().tables).toEqual({});
  });

  it('should reject nested transactions', async () => {
    await expect(
      driver.transaction(async () => driver.transaction(async () => 'inner'))
    ).rejects.toThrow('Nested schema transactions are not supported');
  });

  it('should keep a single current revision row', async () => {
    await driver.transaction(async tx => tx.writeCurrent('001'));
    await driver.transaction(async tx => tx.writeCurrent('002'));
    expect(driver.query('SELECT revision_id FROM schema_revision')).toEqual([{ revision_id: '002' }]);

    await driver.transaction(async tx => tx.writeCurrent(null));
    expect(driver.query('SELECT revision_id FROM schema_revision')).toEqual([]);
  });

  it('should enforce check constraints through triggers', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.apply(createTable(pets));
    });
    driver.execute('INSERT INTO owners (id) VALUES (1)');
    driver.execute("INSERT INTO pets (id, owner_id, kind) VALUES (1, 1, 'dog')");

    expect(() => driver.execute("INSERT INTO pets (id, owner_id, kind) VALUES (2, 1, 'dragon')")).toThrow(
      'CHECK constraint failed: pets_kind_check'
    );
    expect(() => driver.execute("UPDATE pets SET kind = 'dragon' WHERE id = 1")).toThrow(
      'CHECK constraint failed: pets_kind_check'
    );
    expect(driver.describeSchema().triggers).toEqual([
      'pets_kind_check__insert@pets',
      'pets_kind_check__update@pets',
    ]);
  });

  it('should enforce foreign keys after the database has been flushed', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.apply(createTable(pets));
    });

    expect(() => driver.execute('INSERT INTO pets (id, owner_id) VALUES (1, 99)')).toThrow(
      'FOREIGN KEY constraint failed'
    );
  });

  it('should fill server defaults', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.apply(createTable(pets));
    });
    driver.execute('INSERT INTO owners (id) VALUES (1)');
    driver.execute('INSERT INTO pets (id, owner_id) VALUES (1, 1)');
    expect(driver.query('SELECT kind FROM pets')).toEqual([{ kind: 'cat' }]);
  });

  it('should enforce a check added to an existing table', async () => {
    await driver.transaction(async tx => tx.apply(createTable(owners)));
    await driver.transaction(async tx =>
      tx.apply(addConstraint('owners', check('owners_id_check', 'id > 0')))
    );
    expect(() => driver.execute('INSERT INTO owners (id) VALUES (0)')).toThrow(
      'CHECK constraint failed: owners_id_check'
    );
  });

  it('should reject a check that existing rows violate', async () => {
    await driver.transaction(async tx => tx.apply(createTable(owners)));
    driver.execute('INSERT INTO owners (id) VALUES (0)');

    await expect(
      driver.transaction(async tx => tx.apply(addConstraint('owners', check('owners_id_check', 'id > 0'))))
    ).rejects.toThrow('CHECK constraint failed: owners_id_check');
    expect(driver.describeSchema().triggers).toEqual([]);
  });

  it('should accept a check when existing rows hold NULL in the checked column', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.apply(addColumn('owners', column('rank', 'integer', { nullable: true })));
    });
    driver.execute('INSERT INTO owners (id) VALUES (1)');

    await driver.transaction(async tx => tx.apply(addConstraint('owners', check('owners_rank_check', 'rank > 0'))));
    expect(driver.describeSchema().triggers).toEqual([
      'owners_rank_check__insert@owners',
      'owners_rank_check__update@owners',
    ]);
  });

  it('should reject columns SQLite cannot add to a populated table', async () => {
    await driver.transaction(async tx => tx.apply(createTable(owners)));
    driver.execute('INSERT INTO owners (id) VALUES (1)');

    await expect(
      driver.transaction(async tx =>
        tx.apply(addColumn('owners', column('seen_at', 'datetime', { nullable: false, serverDefault: { sql: 'now' } })))
      )
    ).rejects.toThrow('Cannot add a column with non-constant default');
    await expect(
      driver.transaction(async tx => tx.apply(addColumn('owners', column('score', 'integer', { nullable: false }))))
    ).rejects.toThrow('Cannot add a NOT NULL column with default value NULL');
  });

  it('should reload the marker and schema from the file', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.writeCurrent('007');
    });
    await driver.close();

    driver = await SqliteSchemaDriver.open({ databasePath });
    expect(await driver.readCurrent()).toBe('007');
    expect(Object.keys(driver.describeSchema().tables)).toEqual(['owners']);
  });

  it('should describe columns with type, nullability and default', async () => {
    await driver.transaction(async tx => {
      await tx.apply(createTable(owners));
      await tx.apply(createTable(pets));
    });
    expect(driver.describeSchema().tables.pets).toEqual([
      { name: 'id', type: 'INTEGER', notNull: true, defaultValue: null, primaryKey: true },
      { name: 'owner_id', type: 'INTEGER', notNull: true, defaultValue: null, primaryKey: false },
      { name: 'kind', type: 'VARCHAR(20)', notNull: true, defaultValue: "'cat'", primaryKey: false },
    ]);
  });
});
