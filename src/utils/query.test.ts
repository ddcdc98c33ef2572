import { QueryTypes } from 'sequelize';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Database } from '../config/db';
import { Category } from '../models/Category';
import { MultipleResultsFoundError, NoResultFoundError, RowShapeError } from './errors';
import { Query, readInteger, readString } from './query';
import { openTestDatabase } from './test-database';

describe('row readers', () => {
  it('accepts integers and integer strings', () => {
    expect(readInteger({ id: 7 }, 'id')).toBe(7);
    expect(readInteger({ total: '12' }, 'total')).toBe(12);
  });

  it('rejects anything else', () => {
    expect(() => readInteger({ id: 1.5 }, 'id')).toThrow(RowShapeError);
    expect(() => readInteger({ id: null }, 'id')).toThrow('Column "id" is not an integer: null');
    expect(() => readString({ name: 3 }, 'name')).toThrow('Column "name" is not a string: 3');
  });
});

describe('Query', () => {
  let db: Database;

  const namesLike = (pattern: string): Query<string> =>
    new Query(
      db,
      'SELECT name FROM categories WHERE name LIKE :pattern ORDER BY name',
      { pattern },
      (row) => readString(row, 'name'),
      `categories like '${pattern}'`
    );

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    db = await openTestDatabase();
    for (const name of ['Work', 'Home', 'Hobby']) {
      await new Category({ name }).save(db);
    }
  });

  afterEach(async () => {
    await db.close();
    vi.restoreAllMocks();
  });

  it('runs nothing until consumed', async () => {
    const spy = vi.spyOn(db.sequelize, 'query');
    const query = namesLike('H%');
    expect(spy).not.toHaveBeenCalled();
    await query.all();
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('returns every mapped row', async () => {
    expect(await namesLike('H%').all()).toEqual(['Hobby', 'Home']);
  });

  it('returns the first row or null', async () => {
    expect(await namesLike('H%').first()).toBe('Hobby');
    expect(await namesLike('X%').first()).toBeNull();
  });

  it('counts matching rows', async () => {
    expect(await namesLike('%').count()).toBe(3);
    expect(await namesLike('X%').count()).toBe(0);
  });

  it('insists on exactly one row in one()', async () => {
    expect(await namesLike('W%').one()).toBe('Work');
    await expect(namesLike('X%').one()).rejects.toThrow(new NoResultFoundError("categories like 'X%'"));
    await expect(namesLike('H%').one()).rejects.toBeInstanceOf(MultipleResultsFoundError);
    await expect(namesLike('H%').one()).rejects.toMatchObject({ rowCount: 2 });
  });

  it('can be iterated asynchronously', async () => {
    const seen: string[] = [];
    for await (const name of namesLike('%o%')) {
      seen.push(name);
    }
    expect(seen).toEqual(['Hobby', 'Home', 'Work']);
  });

  it('iterates inside an open unit of work', async () => {
    const seen = await db.withUnitOfWork(async (transaction) => {
      await db.sequelize.query("INSERT INTO categories (name) VALUES ('Hiking')", {
        type: QueryTypes.INSERT,
        transaction,
      });
      const query = vi.spyOn(db.sequelize, 'query');
      const names: string[] = [];
      for await (const name of namesLike('H%').iterate(transaction)) {
        names.push(name);
      }
      expect(query).toHaveBeenLastCalledWith(
        'SELECT name FROM categories WHERE name LIKE :pattern ORDER BY name',
        expect.objectContaining({ transaction })
      );
      return names;
    });
    expect(seen).toEqual(['Hiking', 'Hobby', 'Home']);
  });

  it('reads inside an open unit of work', async () => {
    const names = await db.withUnitOfWork(async (transaction) => {
      await db.sequelize.query("INSERT INTO categories (name) VALUES ('Hiking')", {
        type: QueryTypes.INSERT,
        transaction,
      });
      return namesLike('H%').all(transaction);
    });
    expect(names).toEqual(['Hiking', 'Hobby', 'Home']);
  });
});
