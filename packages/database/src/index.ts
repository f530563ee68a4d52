export { getPool, closePool } from './pool.js';
export { withTransaction } from './transaction.js';
export { isUniqueViolation } from './errors.js';
export { isUuid } from './ids.js';
export { applySchema, readSchema } from './schema.js';
export type { Pool, PoolClient } from 'pg';
