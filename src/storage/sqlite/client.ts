import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { migrate } from './migrate.js';
import {
  AlreadyExistsError,
  StorageError,
  TransactionError,
} from '../../errors/storage-error.js';

export type SqliteDatabase = BetterSQLite3Database<typeof schema>;

/**
 * One SQLite connection and its drizzle handle
 */
export class SqliteClient {
  readonly sqlite: Database.Database;
  readonly db: SqliteDatabase;

  constructor(path: string) {
    this.sqlite = new Database(path);
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.pragma('busy_timeout = 5000');
    migrate(this.sqlite);
    this.db = drizzle(this.sqlite, { schema });
  }

  /**
   * Run fn inside BEGIN IMMEDIATE ... COMMIT, taking the write lock up
   * front so concurrent read-modify-write cycles serialize.
   *
   * An error from fn rolls back and is rethrown unchanged. If the rollback
   * itself fails the caller gets a TransactionError naming both.
   */
  transaction<T>(operation: string, fn: (db: SqliteDatabase) => T): T {
    try {
      this.sqlite.exec('BEGIN IMMEDIATE');
    } catch (err) {
      throw convertDBError(operation, err);
    }

    try {
      const result = fn(this.db);
      this.sqlite.exec('COMMIT');
      return result;
    } catch (err) {
      if (this.sqlite.inTransaction) {
        try {
          this.sqlite.exec('ROLLBACK');
        } catch (rollbackErr) {
          throw new TransactionError(operation, err, rollbackErr);
        }
      }
      throw err instanceof StorageError ? err : passThrough(operation, err);
    }
  }

  close(): void {
    this.sqlite.close();
  }
}

/**
 * Map a driver error onto the storage taxonomy
 */
export function convertDBError(context: string, err: unknown, id = ''): StorageError {
  if (err instanceof StorageError) {
    return err;
  }

  if (isKeyCollision(err)) {
    return new AlreadyExistsError(context, id, err);
  }

  const reason = err instanceof Error ? err.message : String(err);
  const subject = id ? `${context} "${id}"` : context;
  return new StorageError(`${subject}: ${reason}`, { cause: err });
}

// Errors raised by the updater pass through untouched; driver errors are wrapped
function passThrough(operation: string, err: unknown): unknown {
  return isSqliteError(err) ? convertDBError(operation, err) : err;
}

// NOT NULL, CHECK and foreign key failures are not collisions
const KEY_COLLISION_CODES: ReadonlySet<string> = new Set([
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

function isKeyCollision(err: unknown): boolean {
  const code = sqliteCode(err);
  return code !== undefined && KEY_COLLISION_CODES.has(code);
}

function isSqliteError(err: unknown): boolean {
  return sqliteCode(err)?.startsWith('SQLITE_') ?? false;
}

function sqliteCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) {
    return undefined;
  }

  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }

  return sqliteCode(err.cause);
}
