import fs from 'node:fs/promises';
import type { ByteSink, ByteSource } from './types.js';

/**
 * ByteSource over an open file handle, read sequentially from the start.
 */
export class FileByteSource implements ByteSource {
  readonly size: number;
  private readonly handle: fs.FileHandle;
  private position = 0;
  private closed = false;

  private constructor(handle: fs.FileHandle, size: number) {
    this.handle = handle;
    this.size = size;
  }

  static async open(filePath: string): Promise<FileByteSource> {
    const handle = await fs.open(filePath, 'r');
    try {
      const stat = await handle.stat();
      if (!stat.isFile()) {
        throw new Error(`Not a file: ${filePath}`);
      }
      return new FileByteSource(handle, stat.size);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await this.handle.read(buffer, 0, maxBytes, this.position);
    this.position += bytesRead;
    return new Uint8Array(buffer.buffer, buffer.byteOffset, bytesRead);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * ByteSink that truncates the target on open and appends each chunk.
 */
export class FileByteSink implements ByteSink {
  private readonly handle: fs.FileHandle;
  private closed = false;

  private constructor(handle: fs.FileHandle) {
    this.handle = handle;
  }

  static async open(filePath: string): Promise<FileByteSink> {
    return new FileByteSink(await fs.open(filePath, 'w'));
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.handle.write(chunk);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
