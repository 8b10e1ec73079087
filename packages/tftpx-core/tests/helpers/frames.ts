import { decodePacket } from '../../src/protocol/codec.js';
import { Opcode, type Packet } from '../../src/protocol/packet.js';
import type { DatagramEndpoint } from '../../src/transport/types.js';

/**
 * Next decoded packet on `endpoint`; fails the test on timeout or a bad frame.
 */
export async function nextPacket(endpoint: DatagramEndpoint, timeoutMs = 1000): Promise<Packet> {
  const datagram = await endpoint.receive(timeoutMs);
  if (!datagram) throw new Error(`No datagram on port ${endpoint.local.port} within ${timeoutMs}ms`);
  const decoded = decodePacket(datagram.data);
  if (!decoded.ok) throw decoded.error;
  return decoded.packet;
}

export async function nextAck(endpoint: DatagramEndpoint, timeoutMs = 1000): Promise<number> {
  const packet = await nextPacket(endpoint, timeoutMs);
  if (packet.opcode !== Opcode.Ack) {
    throw new Error(`Expected ACK, got opcode ${packet.opcode}`);
  }
  return packet.block;
}

export function isAck(data: Uint8Array, block: number): boolean {
  const decoded = decodePacket(data);
  return decoded.ok && decoded.packet.opcode === Opcode.Ack && decoded.packet.block === block;
}
