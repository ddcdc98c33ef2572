// src/models/schema.ts
import { DataTypes } from 'sequelize';
import type { ModelAttributes } from 'sequelize';

export const CATEGORY_NAME_MAX_LENGTH = 10;

export const CATEGORIES_TABLE = 'categories';
export const NOTES_TABLE = 'notes';

// Column layout only; rows are read and written with plain SQL in the record classes.
export const categoryColumns: ModelAttributes = {
  id: {
    type: DataTypes.INTEGER,
    autoIncrement: true,
    primaryKey: true,
  },
  name: {
    type: DataTypes.STRING(CATEGORY_NAME_MAX_LENGTH),
    allowNull: false,
    unique: true,
  },
};

export const noteColumns: ModelAttributes = {
  id: {
    type: DataTypes.INTEGER,
    autoIncrement: true,
    primaryKey: true,
  },
  text: {
    type: DataTypes.TEXT,
    allowNull: false,
  },
  category_id: {
    type: DataTypes.INTEGER,
    allowNull: false,
    references: {
      model: CATEGORIES_TABLE,
      key: 'id',
    },
  },
};

/** Creation order; drop in reverse so foreign keys never dangle. */
export const TABLES: ReadonlyArray<{ name: string; columns: ModelAttributes }> = [
  { name: CATEGORIES_TABLE, columns: categoryColumns },
  { name: NOTES_TABLE, columns: noteColumns },
];
