import type { RunResult } from 'better-sqlite3';
import { NotFoundError } from '../../../errors/storage-error.js';
import { convertDBError } from '../client.js';

export function toBuffer(data: Uint8Array): Buffer;
export function toBuffer(data: Uint8Array | undefined): Buffer | null;
export function toBuffer(data: Uint8Array | undefined): Buffer | null {
  return data ? Buffer.from(data) : null;
}

export function fromBuffer(data: Buffer): Uint8Array;
export function fromBuffer(data: Buffer | null): Uint8Array | undefined;
export function fromBuffer(data: Buffer | null): Uint8Array | undefined {
  return data ? new Uint8Array(data) : undefined;
}

/**
 * Run an insert, mapping a key collision to AlreadyExistsError
 */
export function insertRow(entity: string, id: string, insert: () => RunResult): void {
  try {
    insert();
  } catch (err) {
    throw convertDBError(entity, err, id);
  }
}

/**
 * Run a delete, raising NotFoundError when nothing matched
 */
export function deleteRow(entity: string, id: string, remove: () => RunResult): void {
  let result: RunResult;
  try {
    result = remove();
  } catch (err) {
    throw convertDBError(entity, err, id);
  }

  if (result.changes === 0) {
    throw new NotFoundError(entity, id);
  }
}

/**
 * Run a read, wrapping driver errors
 */
export function query<T>(entity: string, read: () => T): T {
  try {
    return read();
  } catch (err) {
    throw convertDBError(entity, err);
  }
}
