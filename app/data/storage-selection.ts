import type { StorageBackend } from '@app/data/storage-backend.js';

export type StorageSelection =
  | { readonly kind: 'local'; readonly path: string }
  | { readonly kind: 'remote'; readonly url: string; readonly authToken: string };

export type StorageSelectionInput = {
  tursoDatabaseUrl?: string;
  tursoAuthToken?: string;
  sqliteDbPath: string;
};

/**
 * The networked backend is chosen only when both the endpoint and its token are present.
 */
export function selectStorageBackend(input: StorageSelectionInput): StorageSelection {
  const url = input.tursoDatabaseUrl?.trim() ?? '';
  const authToken = input.tursoAuthToken?.trim() ?? '';
  if (url !== '' && authToken !== '') {
    return { kind: 'remote', url, authToken };
  }
  return { kind: 'local', path: input.sqliteDbPath };
}

export type StorageBackendOptions = {
  queryTimeoutMs: number;
};

export async function createStorageBackend(selection: StorageSelection, options: StorageBackendOptions): Promise<StorageBackend> {
  if (selection.kind === 'remote') {
    const { LibsqlStorageBackend } = await import('@app/data/libsql-storage-backend.js');
    return new LibsqlStorageBackend({
      url: selection.url,
      authToken: selection.authToken,
      queryTimeoutMs: options.queryTimeoutMs,
    });
  }
  else {
    const { SqliteStorageBackend } = await import('@app/data/sqlite-storage-backend.js');
    return new SqliteStorageBackend(selection.path);
  }
}

export function describeStorageSelection(selection: StorageSelection): string {
  if (selection.kind === 'remote') {
    return `remote libSQL database at ${selection.url}`;
  }
  return `local SQLite database at ${selection.path}`;
}
