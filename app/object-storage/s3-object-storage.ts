import {
  DeleteObjectCommand,
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import { StorageError, UploadConfigError, errorMessage } from '@app/errors.js';
import type { ObjectStorage, ObjectStorageConfig } from '@app/object-storage/object-storage.js';

export class S3ObjectStorage implements ObjectStorage {
  readonly bucket: string;

  #client: S3Client;
  #requestTimeoutMs: number;

  constructor(client: S3Client, bucket: string, requestTimeoutMs: number) {
    this.#client = client;
    this.bucket = bucket;
    this.#requestTimeoutMs = requestTimeoutMs;
  }

  async putObject(key: string, body: Uint8Array, contentType: string): Promise<void> {
    try {
      await this.#client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }), { abortSignal: AbortSignal.timeout(this.#requestTimeoutMs) });
    }
    catch (error) {
      throw new StorageError(`Failed to upload object ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getObject(key: string): Promise<Uint8Array | null> {
    try {
      const response = await this.#client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { abortSignal: AbortSignal.timeout(this.#requestTimeoutMs) });
      if (response.Body === undefined) {
        return new Uint8Array();
      }
      return await response.Body.transformToByteArray();
    }
    catch (error) {
      if (error instanceof NoSuchKey) {
        return null;
      }
      throw new StorageError(`Failed to download object ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async deleteObject(key: string): Promise<void> {
    try {
      await this.#client.send(new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { abortSignal: AbortSignal.timeout(this.#requestTimeoutMs) });
    }
    catch (error) {
      throw new StorageError(`Failed to delete object ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async signUploadUrl(key: string, contentType: string, expiresInSeconds: number): Promise<string> {
    try {
      return await getSignedUrl(this.#client, new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        ContentType: contentType,
      }), { expiresIn: expiresInSeconds });
    }
    catch (error) {
      throw new StorageError(`Failed to sign upload URL for ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async signDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    try {
      return await getSignedUrl(this.#client, new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { expiresIn: expiresInSeconds });
    }
    catch (error) {
      throw new StorageError(`Failed to sign download URL for ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    this.#client.destroy();
  }
}

export function createS3ObjectStorage(config: ObjectStorageConfig): S3ObjectStorage {
  const bucket = config.bucket?.trim() ?? '';
  if (bucket === '') {
    throw new UploadConfigError('S3 bucket name is empty');
  }
  if (config.accessKey === undefined || config.secretKey === undefined) {
    throw new UploadConfigError('S3 access key and secret key are both required');
  }

  let client: S3Client;
  try {
    client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.usePathStyle,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
    });
  }
  catch (error) {
    throw new UploadConfigError(`Cannot create S3 client: ${errorMessage(error)}`, { cause: error });
  }
  return new S3ObjectStorage(client, bucket, config.requestTimeoutMs);
}
