import Category from './Category';
import Note from './Note';

export type { CategoryAttributes, CategoryCreationAttributes } from './Category';
export type { NoteAttributes, NoteCreationAttributes } from './Note';
export { CATEGORY_NAME_MAX_LENGTH, CATEGORIES_TABLE, NOTES_TABLE } from './schema';

export { Category, Note };
