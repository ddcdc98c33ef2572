// src/utils/errors.ts
import {
  ConnectionError,
  DatabaseError,
  ExclusionConstraintError,
  ForeignKeyConstraintError,
  UniqueConstraintError,
  ValidationError,
} from 'sequelize';

export class NotesStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required environment variable is missing or unusable. */
export class ConfigError extends NotesStoreError {}

export type ConstraintKind = 'unique' | 'foreign-key' | 'invalid-value';

export class ConstraintViolationError extends NotesStoreError {
  constructor(
    public readonly kind: ConstraintKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConnectionFailureError extends NotesStoreError {}

export class NoResultFoundError extends NotesStoreError {
  constructor(description: string) {
    super(`No row was found for ${description}`);
  }
}

export class MultipleResultsFoundError extends NotesStoreError {
  constructor(description: string, public readonly rowCount: number) {
    super(`Expected one row for ${description}, found ${rowCount}`);
  }
}

/** A column came back with a type the row mapper does not accept. */
export class RowShapeError extends NotesStoreError {}

// MySQL reports these as plain DatabaseErrors; they are value constraints all the same.
const INVALID_VALUE_CODES = new Set(['ER_BAD_NULL_ERROR', 'ER_DATA_TOO_LONG', 'ER_NO_DEFAULT_FOR_FIELD']);

const driverCode = (error: DatabaseError): string | undefined => {
  const parent = error.parent;
  if ('code' in parent && typeof parent.code === 'string') {
    return parent.code;
  }
  return undefined;
};

/**
 * Maps a Sequelize failure raised while saving onto the save-result taxonomy.
 * Returns null for anything that is neither a constraint nor a connection problem.
 */
export const classifySaveError = (
  error: unknown
): ConstraintViolationError | ConnectionFailureError | null => {
  if (error instanceof UniqueConstraintError) {
    return new ConstraintViolationError('unique', error.message, { cause: error });
  }
  if (error instanceof ForeignKeyConstraintError) {
    return new ConstraintViolationError('foreign-key', error.message, { cause: error });
  }
  if (error instanceof ExclusionConstraintError || error instanceof ValidationError) {
    return new ConstraintViolationError('invalid-value', error.message, { cause: error });
  }
  if (error instanceof ConnectionError) {
    return new ConnectionFailureError(error.message, { cause: error });
  }
  if (error instanceof DatabaseError) {
    const code = driverCode(error);
    if (code !== undefined && INVALID_VALUE_CODES.has(code)) {
      return new ConstraintViolationError('invalid-value', error.message, { cause: error });
    }
  }
  return null;
};
