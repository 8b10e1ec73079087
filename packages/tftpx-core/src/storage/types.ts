/**
 * Readable side of a transfer. `read` returns an empty array at end of file.
 */
export interface ByteSource {
  /** Total size in bytes, used to reject files the block space cannot hold. */
  readonly size: number;
  read(maxBytes: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * Storage collaborator the server runs against.
 */
export interface FileStore {
  /** @throws {TftpxFileNotFoundError} */
  openForRead(name: string): Promise<ByteSource>;
  /** @throws {TftpxCannotCreateError} */
  openForWrite(name: string): Promise<ByteSink>;
  /** @throws {TftpxDeleteFailedError} */
  remove(name: string): Promise<void>;
  /**
   * Copy a freshly uploaded file aside. Best-effort: a failure never rolls back the upload.
   */
  duplicate(name: string): Promise<void>;
}
