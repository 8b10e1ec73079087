export interface TftpxErrorOptions {
  code?: number;
  cause?: unknown;
}

/**
 * Base error for all tftpx failures.
 */
export class TftpxError extends Error {
  /** Protocol error code, where the failure maps to one. */
  readonly code?: number;

  constructor(message: string, opts: TftpxErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'TftpxError';
    this.code = opts.code;
  }
}

/**
 * Invalid input supplied by the caller (oversized payload, bad file name, file too large).
 */
export class TftpxValidationError extends TftpxError {
  constructor(message: string, opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxValidationError';
  }
}

/**
 * A datagram that cannot be decoded. Rejected without reply.
 */
export class TftpxMalformedError extends TftpxError {
  constructor(message: string) {
    super(message);
    this.name = 'TftpxMalformedError';
  }
}

/**
 * A DATA block whose trailing CRC-8 does not match its payload.
 */
export class TftpxChecksumError extends TftpxError {
  readonly block: number;
  readonly expected: number;
  readonly actual: number;

  constructor(block: number, expected: number, actual: number) {
    super(
      `CRC mismatch on block ${block} (expected 0x${hex(expected)}, got 0x${hex(actual)}).`
    );
    this.name = 'TftpxChecksumError';
    this.block = block;
    this.expected = expected;
    this.actual = actual;
  }
}

export class TftpxFileNotFoundError extends TftpxError {
  constructor(message = 'File not found', opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxFileNotFoundError';
  }
}

export class TftpxCannotCreateError extends TftpxError {
  constructor(message = 'Cannot create file', opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxCannotCreateError';
  }
}

export class TftpxDeleteFailedError extends TftpxError {
  constructor(message = 'Failed to delete file', opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxDeleteFailedError';
  }
}

export class TftpxIllegalOperationError extends TftpxError {
  constructor(message = 'Illegal TFTP operation', opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxIllegalOperationError';
  }
}

/**
 * No matching ACK (send side) or DATA (receive side) within the attempt budget.
 */
export class TftpxRetryExhaustedError extends TftpxError {
  readonly block: number;
  readonly attempts: number;

  constructor(message: string, block: number, attempts: number) {
    super(message);
    this.name = 'TftpxRetryExhaustedError';
    this.block = block;
    this.attempts = attempts;
  }
}

/**
 * The peer answered with an ERROR packet.
 */
export class TftpxRemoteError extends TftpxError {
  constructor(message: string, code: number) {
    super(message, { code });
    this.name = 'TftpxRemoteError';
  }
}

/**
 * Socket-level failure: bind, send or an endpoint closed underneath a session.
 */
export class TftpxNetworkError extends TftpxError {
  constructor(message: string, opts: TftpxErrorOptions = {}) {
    super(message, opts);
    this.name = 'TftpxNetworkError';
  }
}

export class TftpxTimeoutError extends TftpxError {
  constructor(message = 'Request timed out.') {
    super(message);
    this.name = 'TftpxTimeoutError';
  }
}

export class TftpxAbortError extends TftpxError {
  constructor(message = 'Operation aborted.') {
    super(message);
    this.name = 'TftpxAbortError';
  }
}

function hex(value: number): string {
  return value.toString(16).padStart(2, '0');
}
