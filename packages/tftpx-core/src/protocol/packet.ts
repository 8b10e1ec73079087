/**
 * Packet definitions for the tftpx wire protocol.
 *
 * The protocol follows TFTP's opcode layout with two extensions:
 * - DATA blocks carry a trailing CRC-8 over their payload
 * - DELETE (opcode 6) removes a file on the server, answered with an ERROR-framed status
 */

export enum Opcode {
  ReadRequest = 1,
  WriteRequest = 2,
  Data = 3,
  Ack = 4,
  Error = 5,
  Delete = 6,
}

/**
 * ERROR packet codes. The DELETE status reply reuses the ERROR frame, with
 * code 0 meaning success.
 */
export const ErrorCode = {
  NotDefined: 0,
  FileNotFound: 1,
  AccessViolation: 2,
  AllocationExceeded: 3,
  IllegalOperation: 4,
  UnknownTransferId: 5,
  FileExists: 6,
  NoSuchUser: 7,
} as const;

/** DELETE status reply codes carried in the ERROR frame. */
export const DeleteStatus = {
  Deleted: 0,
  Failed: 1,
} as const;

export interface ReadRequestPacket {
  opcode: Opcode.ReadRequest;
  filename: string;
}

export interface WriteRequestPacket {
  opcode: Opcode.WriteRequest;
  filename: string;
}

export interface DataPacket {
  opcode: Opcode.Data;
  block: number;     // 1..65535
  payload: Uint8Array; // 0..512 bytes
}

export interface AckPacket {
  opcode: Opcode.Ack;
  block: number;
}

export interface ErrorPacket {
  opcode: Opcode.Error;
  code: number;
  message: string;
}

export interface DeletePacket {
  opcode: Opcode.Delete;
  filename: string;
}

export type Packet =
  | ReadRequestPacket
  | WriteRequestPacket
  | DataPacket
  | AckPacket
  | ErrorPacket
  | DeletePacket;

/** Packets that open an exchange on the control port. */
export type RequestPacket = ReadRequestPacket | WriteRequestPacket | DeletePacket;

export function isOpcode(value: number): value is Opcode {
  return Number.isInteger(value) && value >= Opcode.ReadRequest && value <= Opcode.Delete;
}

export function isRequestPacket(packet: Packet): packet is RequestPacket {
  return (
    packet.opcode === Opcode.ReadRequest ||
    packet.opcode === Opcode.WriteRequest ||
    packet.opcode === Opcode.Delete
  );
}

export function dataPacket(block: number, payload: Uint8Array): DataPacket {
  return { opcode: Opcode.Data, block, payload };
}

export function ackPacket(block: number): AckPacket {
  return { opcode: Opcode.Ack, block };
}

export function errorPacket(code: number, message: string): ErrorPacket {
  return { opcode: Opcode.Error, code, message };
}
