import { StorageError } from '@app/errors.js';

export type SqlRow = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function assertRows(value: unknown, message?: string): asserts value is SqlRow[] {
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new StorageError(message || 'SQL query result is not an array of rows');
  }
}

export function firstRow(rows: SqlRow[], message?: string): SqlRow {
  const [row] = rows;
  if (row === undefined) {
    throw new StorageError(message || 'SQL query returned no rows');
  }
  return row;
}

export function readString(row: SqlRow, propName: string): string {
  const value = row[propName];
  if (typeof value !== 'string') {
    throw new StorageError(`Column "${propName}" is not a string`);
  }
  return value;
}

export function readNullableString(row: SqlRow, propName: string): string | null {
  const value = row[propName];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new StorageError(`Column "${propName}" is not a string or null`);
  }
  return value;
}

export function readNumber(row: SqlRow, propName: string): number {
  const value = row[propName];
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'number') {
    throw new StorageError(`Column "${propName}" is not a number`);
  }
  return value;
}

export function readNullableNumber(row: SqlRow, propName: string): number | null {
  const value = row[propName];
  if (value === null || value === undefined) {
    return null;
  }
  return readNumber(row, propName);
}
