import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';

import { StorageUnavailableError, ValidationError } from '@app/errors.js';
import type { ObjectStorage, ObjectStorageHandle } from '@app/object-storage/object-storage.js';
import type { PresignedDownload, PresignedUpload, StoredFile } from '@app/services/models.js';

export const UPLOAD_URL_EXPIRES_IN = 15 * 60;
export const DOWNLOAD_URL_EXPIRES_IN = 60 * 60;
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const UPLOAD_KEY_PREFIX = 'invoices/';

export type UploadFileInput = {
  filename: string;
  content: Uint8Array;
  contentType?: string;
};

export type PresignUploadInput = {
  filename: string;
  contentType?: string;
};

export class UploadService {
  #objectStorage: ObjectStorageHandle;

  constructor(objectStorage: ObjectStorageHandle) {
    this.#objectStorage = objectStorage;
  }

  get available(): boolean {
    return this.#objectStorage.kind === 'present';
  }

  async uploadFile(input: UploadFileInput): Promise<StoredFile> {
    const storage = this.#storage();
    const filename = requireFilename(input.filename);
    const contentType = input.contentType?.trim() || DEFAULT_CONTENT_TYPE;
    if (input.content.byteLength === 0) {
      throw new ValidationError('Uploaded file is empty');
    }
    const key = generateKey(filename);
    await storage.putObject(key, input.content, contentType);
    const downloadUrl = await storage.signDownloadUrl(key, DOWNLOAD_URL_EXPIRES_IN);
    return {
      key,
      filename,
      contentType,
      size: input.content.byteLength,
      downloadUrl,
    };
  }

  async getPresignedUploadUrl(input: PresignUploadInput): Promise<PresignedUpload> {
    const storage = this.#storage();
    const filename = requireFilename(input.filename);
    const contentType = input.contentType?.trim() || DEFAULT_CONTENT_TYPE;
    const key = generateKey(filename);
    const uploadUrl = await storage.signUploadUrl(key, contentType, UPLOAD_URL_EXPIRES_IN);
    return { key, uploadUrl, contentType, expiresIn: UPLOAD_URL_EXPIRES_IN };
  }

  async getPresignedDownloadUrl(key: string): Promise<PresignedDownload> {
    const storage = this.#storage();
    const objectKey = requireKey(key);
    const downloadUrl = await storage.signDownloadUrl(objectKey, DOWNLOAD_URL_EXPIRES_IN);
    return { key: objectKey, downloadUrl, expiresIn: DOWNLOAD_URL_EXPIRES_IN };
  }

  async deleteFile(key: string): Promise<void> {
    const storage = this.#storage();
    await storage.deleteObject(requireKey(key));
  }

  #storage(): ObjectStorage {
    if (this.#objectStorage.kind === 'absent') {
      throw new StorageUnavailableError(`File storage is not available: ${this.#objectStorage.reason}`);
    }
    return this.#objectStorage.storage;
  }
}

function requireFilename(filename: string): string {
  const trimmed = filename.trim();
  if (trimmed === '') {
    throw new ValidationError('filename is required');
  }
  return trimmed;
}

function requireKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed === '' || trimmed.includes('..')) {
    throw new ValidationError('key must be a non-empty object key');
  }
  return trimmed;
}

function generateKey(filename: string): string {
  return `${UPLOAD_KEY_PREFIX}${randomUUID()}${extname(filename).toLowerCase()}`;
}
