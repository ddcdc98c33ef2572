export { Database } from './config/db';
export type { Persistable, SaveResult } from './config/db';
export { loadDatabaseConfig, REQUIRED_VARIABLES } from './config/env';
export type { DatabaseConfig, DatabaseDialect } from './config/env';
export * from './models';
export { Query } from './utils/query';
export {
  ConfigError,
  ConnectionFailureError,
  ConstraintViolationError,
  MultipleResultsFoundError,
  NoResultFoundError,
  NotesStoreError,
  RowShapeError,
} from './utils/errors';
export type { ConstraintKind } from './utils/errors';
