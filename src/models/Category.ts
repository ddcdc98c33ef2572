// src/models/Category.ts
import type { Optional } from 'sequelize';
import type { Database, Persistable, SaveResult } from '../config/db';
import { Query, readInteger, readString } from '../utils/query';
import type { Row } from '../utils/query';
import { Note } from './Note';
import { CATEGORIES_TABLE, CATEGORY_NAME_MAX_LENGTH } from './schema';

export interface CategoryAttributes {
  id: number;
  name: string;
}

export interface CategoryCreationAttributes extends Optional<CategoryAttributes, 'id'> {}

const SELECT_CATEGORIES = `SELECT id, name FROM ${CATEGORIES_TABLE}`;

export class Category implements CategoryCreationAttributes, Persistable {
  public id?: number;
  public name: string;

  readonly tableName = CATEGORIES_TABLE;

  constructor({ id, name }: CategoryCreationAttributes) {
    this.id = id;
    this.name = name;
  }

  static fromRow(row: Row): Category {
    return new Category({ id: readInteger(row, 'id'), name: readString(row, 'name') });
  }

  /** Every category with exactly this name; at most one, given the unique index. */
  static searchByName(db: Database, name: string): Query<Category> {
    return new Query(
      db,
      `${SELECT_CATEGORIES} WHERE name = :name ORDER BY id`,
      { name },
      Category.fromRow,
      `${CATEGORIES_TABLE} with name '${name}'`
    );
  }

  static findByName(db: Database, name: string): Promise<Category> {
    return Category.searchByName(db, name).one();
  }

  static findById(db: Database, id: number): Promise<Category> {
    return new Query(
      db,
      `${SELECT_CATEGORIES} WHERE id = :id`,
      { id },
      Category.fromRow,
      `${CATEGORIES_TABLE} with id ${id}`
    ).one();
  }

  static all(db: Database): Query<Category> {
    return new Query(db, `${SELECT_CATEGORIES} ORDER BY name`, {}, Category.fromRow, CATEGORIES_TABLE);
  }

  columns(): Record<string, string | number> {
    return { name: this.name };
  }

  validate(): string[] {
    // VARCHAR length counts characters, not UTF-16 units
    const length = Array.from(this.name).length;
    if (length > CATEGORY_NAME_MAX_LENGTH) {
      return [`name must be at most ${CATEGORY_NAME_MAX_LENGTH} characters, got ${length}`];
    }
    return [];
  }

  save(db: Database): Promise<SaveResult<Category>> {
    return db.persist(this);
  }

  notes(db: Database): Query<Note> {
    return Note.byCategory(db, this.id ?? null);
  }
}

export default Category;
