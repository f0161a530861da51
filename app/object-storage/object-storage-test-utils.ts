import type { ObjectStorage } from '@app/object-storage/object-storage.js';

export class MemoryObjectStorage implements ObjectStorage {
  readonly bucket = 'test-bucket';
  readonly objects = new Map<string, { body: Uint8Array; contentType: string }>();
  closeCount = 0;

  async putObject(key: string, body: Uint8Array, contentType: string): Promise<void> {
    this.objects.set(key, { body, contentType });
  }

  async getObject(key: string): Promise<Uint8Array | null> {
    return this.objects.get(key)?.body ?? null;
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async signUploadUrl(key: string, contentType: string, expiresInSeconds: number): Promise<string> {
    return `https://storage.test/${this.bucket}/${key}?method=PUT&contentType=${encodeURIComponent(contentType)}&expires=${expiresInSeconds}`;
  }

  async signDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    return `https://storage.test/${this.bucket}/${key}?method=GET&expires=${expiresInSeconds}`;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }
}
