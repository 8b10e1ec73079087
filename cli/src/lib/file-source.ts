import fs from 'node:fs';
import path from 'node:path';
import { FileByteSink, FileByteSource } from '@tftpx/core';

/**
 * Open a local file for upload.
 * @throws {Error} If the path is missing or not a regular file.
 */
export async function openLocalSource(filePath: string): Promise<FileByteSource> {
  const resolved = path.resolve(filePath);
  const stat = fs.statSync(resolved);
  if (!stat.isFile()) throw new Error(`Not a file: ${resolved}`);
  return FileByteSource.open(resolved);
}

export interface LocalTarget {
  path: string;
  existed: boolean;
}

/**
 * Where a download lands: `output` when given (a directory keeps the remote
 * name), otherwise the remote name in the working directory.
 */
export function resolveLocalTarget(remoteName: string, output?: string): LocalTarget {
  let target = path.resolve(output ?? remoteName);
  if (output && fs.existsSync(target) && fs.statSync(target).isDirectory()) {
    target = path.join(target, remoteName);
  }
  return { path: target, existed: fs.existsSync(target) };
}

export function openLocalSink(filePath: string): Promise<FileByteSink> {
  return FileByteSink.open(filePath);
}

/**
 * Remove a file left behind by a failed download.
 */
export function discardPartial(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}
