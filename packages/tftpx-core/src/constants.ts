/**
 * Well-known control port the server listens on for requests.
 */
export const DEFAULT_CONTROL_PORT = 6969;

/**
 * Maximum DATA payload. A shorter payload marks the last block of a transfer.
 */
export const BLOCK_SIZE = 512;

/**
 * Largest block number representable in the 16-bit header field.
 */
export const MAX_BLOCK_NUMBER = 0xffff;

/**
 * Upper bound (exclusive) on transferable file size. A file of exactly
 * 65535 full blocks would need a trailing empty block numbered 65536.
 */
export const MAX_TRANSFER_BYTES = MAX_BLOCK_NUMBER * BLOCK_SIZE;

/**
 * Largest datagram the protocol produces: opcode + block + payload + CRC.
 */
export const MAX_PACKET_SIZE = 2 + 2 + BLOCK_SIZE + 1;

/**
 * Requests shorter than this on the control port are ignored.
 */
export const MIN_REQUEST_SIZE = 4;

/**
 * RRQ file name answered with a single empty DATA block instead of a transfer.
 */
export const PING_FILENAME = '__ping__';

/**
 * Attempts per block before a session gives up.
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * How long the send side waits for an ACK per attempt (ms).
 */
export const DEFAULT_SEND_TIMEOUT_MS = 1000;

/**
 * How long the receive side waits for a DATA block per attempt (ms).
 */
export const DEFAULT_RECEIVE_TIMEOUT_MS = 3000;

/**
 * Directory (relative to the store root) that receives post-upload copies.
 */
export const DEFAULT_BACKUP_DIR = 'backup';
