import { BLOCK_SIZE, MAX_BLOCK_NUMBER, MAX_PACKET_SIZE } from '../constants.js';
import { TftpxChecksumError, TftpxMalformedError, TftpxValidationError } from '../errors.js';
import { crc8 } from './crc8.js';
import { Opcode, isOpcode, type Packet } from './packet.js';

export type DecodeResult =
  | { ok: true; packet: Packet }
  | { ok: false; error: TftpxMalformedError | TftpxChecksumError };

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// opcode(2) + block(2) + crc(1)
const DATA_MIN_SIZE = 5;
const ACK_SIZE = 4;
// opcode(2) + code(2) + NUL
const ERROR_MIN_SIZE = 5;

function assertU16(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_BLOCK_NUMBER) {
    throw new TftpxValidationError(`${field} must be an unsigned 16-bit integer, got ${value}.`);
  }
}

function encodeString(value: string, field: string): Uint8Array {
  const bytes = textEncoder.encode(value);
  if (bytes.includes(0)) {
    throw new TftpxValidationError(`${field} must not contain NUL characters.`);
  }
  return bytes;
}

function writeHeader(buf: Uint8Array, opcode: Opcode, word: number): void {
  buf[0] = (opcode >> 8) & 0xff;
  buf[1] = opcode & 0xff;
  buf[2] = (word >> 8) & 0xff;
  buf[3] = word & 0xff;
}

function withTerminatedString(opcode: Opcode, text: Uint8Array): Uint8Array {
  const buf = new Uint8Array(2 + text.length + 1);
  buf[0] = (opcode >> 8) & 0xff;
  buf[1] = opcode & 0xff;
  buf.set(text, 2);
  return buf;
}

/**
 * Serialize a packet to its datagram bytes.
 * @throws {TftpxValidationError} If a field is outside its wire range.
 */
export function encodePacket(packet: Packet): Uint8Array {
  switch (packet.opcode) {
    case Opcode.ReadRequest:
    case Opcode.WriteRequest:
    case Opcode.Delete:
      return withTerminatedString(packet.opcode, encodeString(packet.filename, 'filename'));

    case Opcode.Data: {
      assertU16(packet.block, 'block');
      if (packet.payload.length > BLOCK_SIZE) {
        throw new TftpxValidationError(
          `DATA payload too large: ${packet.payload.length}. Max ${BLOCK_SIZE} bytes.`
        );
      }
      const buf = new Uint8Array(4 + packet.payload.length + 1);
      writeHeader(buf, Opcode.Data, packet.block);
      buf.set(packet.payload, 4);
      buf[buf.length - 1] = crc8(packet.payload);
      return buf;
    }

    case Opcode.Ack: {
      assertU16(packet.block, 'block');
      const buf = new Uint8Array(ACK_SIZE);
      writeHeader(buf, Opcode.Ack, packet.block);
      return buf;
    }

    case Opcode.Error: {
      assertU16(packet.code, 'code');
      const text = encodeString(packet.message, 'message');
      const buf = new Uint8Array(4 + text.length + 1);
      writeHeader(buf, Opcode.Error, packet.code);
      buf.set(text, 4);
      return buf;
    }
  }
}

/**
 * Read the big-endian opcode word without validating the rest of the datagram.
 * Returns null when fewer than 2 bytes are present.
 */
export function peekOpcode(bytes: Uint8Array): number | null {
  if (bytes.length < 2) return null;
  return (bytes[0] << 8) | bytes[1];
}

function readU16(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

/**
 * Read a NUL-terminated string starting at `offset`. The scan never leaves
 * the datagram; a missing terminator yields null.
 */
function readTerminatedString(bytes: Uint8Array, offset: number): string | null {
  const end = bytes.indexOf(0, offset);
  if (end < 0) return null;
  return textDecoder.decode(bytes.subarray(offset, end));
}

function malformed(message: string): DecodeResult {
  return { ok: false, error: new TftpxMalformedError(message) };
}

/**
 * Parse a datagram. Never throws: malformed frames and CRC mismatches come back
 * as `{ ok: false }` so callers can drop them without replying.
 */
export function decodePacket(bytes: Uint8Array): DecodeResult {
  const opcode = peekOpcode(bytes);
  if (opcode === null) {
    return malformed(`Datagram too short: ${bytes.length} bytes.`);
  }
  if (!isOpcode(opcode)) {
    return malformed(`Unknown opcode: ${opcode}.`);
  }

  switch (opcode) {
    case Opcode.ReadRequest:
    case Opcode.WriteRequest:
    case Opcode.Delete: {
      const filename = readTerminatedString(bytes, 2);
      if (filename === null) {
        return malformed('Request file name is not NUL-terminated.');
      }
      return { ok: true, packet: { opcode, filename } };
    }

    case Opcode.Data: {
      if (bytes.length < DATA_MIN_SIZE) {
        return malformed(`DATA frame too short: ${bytes.length} bytes.`);
      }
      if (bytes.length > MAX_PACKET_SIZE) {
        return malformed(`DATA frame too long: ${bytes.length} bytes.`);
      }
      const block = readU16(bytes, 2);
      const payload = bytes.slice(4, bytes.length - 1);
      const received = bytes[bytes.length - 1];
      const computed = crc8(payload);
      if (received !== computed) {
        return { ok: false, error: new TftpxChecksumError(block, computed, received) };
      }
      return { ok: true, packet: { opcode, block, payload } };
    }

    case Opcode.Ack: {
      if (bytes.length < ACK_SIZE) {
        return malformed(`ACK frame too short: ${bytes.length} bytes.`);
      }
      return { ok: true, packet: { opcode, block: readU16(bytes, 2) } };
    }

    case Opcode.Error: {
      if (bytes.length < ERROR_MIN_SIZE) {
        return malformed(`ERROR frame too short: ${bytes.length} bytes.`);
      }
      const message = readTerminatedString(bytes, 4);
      if (message === null) {
        return malformed('ERROR message is not NUL-terminated.');
      }
      return { ok: true, packet: { opcode, code: readU16(bytes, 2), message } };
    }
  }
}

/**
 * A payload shorter than a full block ends the transfer.
 */
export function isFinalBlock(payload: Uint8Array): boolean {
  return payload.length < BLOCK_SIZE;
}

/**
 * Short human-readable form for logs.
 */
export function describePacket(packet: Packet): string {
  switch (packet.opcode) {
    case Opcode.ReadRequest:
      return `RRQ "${packet.filename}"`;
    case Opcode.WriteRequest:
      return `WRQ "${packet.filename}"`;
    case Opcode.Delete:
      return `DELETE "${packet.filename}"`;
    case Opcode.Data:
      return `DATA #${packet.block} (${packet.payload.length} bytes)`;
    case Opcode.Ack:
      return `ACK #${packet.block}`;
    case Opcode.Error:
      return `ERROR ${packet.code} "${packet.message}"`;
  }
}
