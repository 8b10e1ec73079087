import fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_BACKUP_DIR } from '../constants.js';
import {
  TftpxCannotCreateError,
  TftpxDeleteFailedError,
  TftpxFileNotFoundError,
} from '../errors.js';
import { validatePlainFilename } from '../utils/filename.js';
import { FileByteSink, FileByteSource } from './file-stream.js';
import type { ByteSink, ByteSource, FileStore } from './types.js';

export interface NodeFileStoreOptions {
  /** Directory served to clients. */
  root: string;
  /** Backup directory, relative to `root` unless absolute. */
  backupDir?: string;
}

/**
 * FileStore over a single directory. Names with path components are refused.
 */
export class NodeFileStore implements FileStore {
  readonly root: string;
  readonly backupDir: string;

  constructor(opts: NodeFileStoreOptions) {
    this.root = path.resolve(opts.root);
    this.backupDir = path.resolve(this.root, opts.backupDir ?? DEFAULT_BACKUP_DIR);
  }

  resolve(name: string): string {
    return path.join(this.root, validatePlainFilename(name));
  }

  async openForRead(name: string): Promise<ByteSource> {
    try {
      return await FileByteSource.open(this.resolve(name));
    } catch (err) {
      throw new TftpxFileNotFoundError('File not found', { cause: err });
    }
  }

  async openForWrite(name: string): Promise<ByteSink> {
    try {
      return await FileByteSink.open(this.resolve(name));
    } catch (err) {
      throw new TftpxCannotCreateError('Cannot create file', { cause: err });
    }
  }

  async remove(name: string): Promise<void> {
    try {
      await fs.unlink(this.resolve(name));
    } catch (err) {
      throw new TftpxDeleteFailedError('Failed to delete file', { cause: err });
    }
  }

  async duplicate(name: string): Promise<void> {
    const source = this.resolve(name);
    await fs.mkdir(this.backupDir, { recursive: true });
    await fs.copyFile(source, path.join(this.backupDir, path.basename(source)));
  }
}
