export { CohortStoreError } from './errors';
export type { CohortStoreErrorCode } from './errors';
export { readCount, readSubjectId } from './rows';
export { SqliteCohortStore } from './sqliteCohortStore';
export type { SqliteCohortStoreOptions } from './sqliteCohortStore';
export type { CohortStore, QueryOptions, SqlRow, SqlValue } from './types';
