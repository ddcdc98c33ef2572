// src/models/Note.ts
import type { Optional } from 'sequelize';
import type { Database, Persistable, SaveResult } from '../config/db';
import { Query, readInteger, readString } from '../utils/query';
import type { Row } from '../utils/query';
import { Category } from './Category';
import { NOTES_TABLE } from './schema';

export interface NoteAttributes {
  id: number;
  text: string;
  categoryId: number;
}

export interface NoteCreationAttributes extends Optional<NoteAttributes, 'id'> {}

const SELECT_NOTES = `SELECT id, text, category_id FROM ${NOTES_TABLE}`;

export class Note implements NoteCreationAttributes, Persistable {
  public id?: number;
  public text: string;
  public categoryId: number;

  readonly tableName = NOTES_TABLE;

  constructor({ id, text, categoryId }: NoteCreationAttributes) {
    this.id = id;
    this.text = text;
    this.categoryId = categoryId;
  }

  static fromRow(row: Row): Note {
    return new Note({
      id: readInteger(row, 'id'),
      text: readString(row, 'text'),
      categoryId: readInteger(row, 'category_id'),
    });
  }

  static findById(db: Database, id: number): Promise<Note> {
    return new Query(db, `${SELECT_NOTES} WHERE id = :id`, { id }, Note.fromRow, `${NOTES_TABLE} with id ${id}`).one();
  }

  /** Notes filed under a category, oldest first. A category without an id has none. */
  static byCategory(db: Database, categoryId: number | null): Query<Note> {
    const description = `${NOTES_TABLE} in category ${categoryId ?? '(unsaved)'}`;
    if (categoryId === null) {
      return new Query(db, `${SELECT_NOTES} WHERE 1 = 0`, {}, Note.fromRow, description);
    }
    return new Query(
      db,
      `${SELECT_NOTES} WHERE category_id = :categoryId ORDER BY id`,
      { categoryId },
      Note.fromRow,
      description
    );
  }

  columns(): Record<string, string | number> {
    return { text: this.text, category_id: this.categoryId };
  }

  // The foreign key is left to the database.
  validate(): string[] {
    return [];
  }

  save(db: Database): Promise<SaveResult<Note>> {
    return db.persist(this);
  }

  category(db: Database): Promise<Category> {
    return Category.findById(db, this.categoryId);
  }
}

export default Note;
