import { mkdir, unlink, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { dossierFileName } from '@dossier/common';

export interface PutObjectInput {
  key: string;
  body: string | Buffer;
}

export interface PutObjectOutput {
  path: string;
  sizeBytes: number;
}

export interface DeleteObjectInput {
  key: string;
}

export interface StorageProvider {
  putObject(input: PutObjectInput): Promise<PutObjectOutput>;
  deleteObject(input: DeleteObjectInput): Promise<void>;
}

export interface LocalDiskProviderConfig {
  rootDir: string;
}

export class LocalDiskProvider implements StorageProvider {
  constructor(private readonly config: LocalDiskProviderConfig) {}

  resolvePath(key: string): string {
    return join(this.config.rootDir, key);
  }

  async putObject(input: PutObjectInput): Promise<PutObjectOutput> {
    const filePath = this.resolvePath(input.key);
    await mkdir(dirname(filePath), { recursive: true });

    const body = typeof input.body === 'string' ? Buffer.from(input.body, 'utf8') : input.body;
    await writeFile(filePath, body);

    return {
      path: filePath,
      sizeBytes: body.length
    };
  }

  async deleteObject(input: DeleteObjectInput): Promise<void> {
    try {
      await unlink(this.resolvePath(input.key));
    } catch (error) {
      // Keep delete idempotent.
      if (!(error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR'))) {
        throw error;
      }
    }
  }
}

// Raised by open(2) before the target is truncated; an existing file is still intact.
const OPEN_FAILURE_CODES = new Set(['EACCES', 'EPERM', 'EISDIR', 'EROFS']);

export const failedBeforeWrite = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' && OPEN_FAILURE_CODES.has(error.code);

export const buildDossierKey = (agentName: string): string => dossierFileName(agentName);
