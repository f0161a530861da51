import { errorMessage } from '@app/errors.js';

export type ObjectStorageConfig = {
  bucket?: string;
  endpoint?: string;
  accessKey?: string;
  secretKey?: string;
  region: string;
  usePathStyle: boolean;
  requestTimeoutMs: number;
};

export interface ObjectStorage {
  readonly bucket: string;
  putObject(key: string, body: Uint8Array, contentType: string): Promise<void>;
  /** Resolves `null` when the key does not exist. */
  getObject(key: string): Promise<Uint8Array | null>;
  deleteObject(key: string): Promise<void>;
  signUploadUrl(key: string, contentType: string, expiresInSeconds: number): Promise<string>;
  signDownloadUrl(key: string, expiresInSeconds: number): Promise<string>;
  /** Releases the client. Called once at shutdown. */
  close(): Promise<void>;
}

export type ObjectStorageHandle =
  | { readonly kind: 'absent'; readonly reason: string }
  | { readonly kind: 'present'; readonly storage: ObjectStorage };

export type ObjectStorageFactory = (config: ObjectStorageConfig) => ObjectStorage;

/**
 * Never throws: an omitted configuration or a failed construction yields the `absent` variant
 * carrying the reason, so startup can continue without uploads.
 */
export function resolveObjectStorage(config: ObjectStorageConfig | undefined, factory: ObjectStorageFactory): ObjectStorageHandle {
  if (config === undefined) {
    return { kind: 'absent', reason: 'S3_BUCKET is not set' };
  }
  try {
    return { kind: 'present', storage: factory(config) };
  }
  catch (error) {
    return { kind: 'absent', reason: errorMessage(error) };
  }
}
