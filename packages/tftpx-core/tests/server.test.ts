import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MAX_TRANSFER_BYTES } from '../src/constants.js';
import { silentLogger } from '../src/logger.js';
import { decodePacket, encodePacket } from '../src/protocol/codec.js';
import { Opcode, ackPacket, dataPacket, type Packet } from '../src/protocol/packet.js';
import { TftpxServer } from '../src/server/server.js';
import type { PeerAddress } from '../src/transport/types.js';
import { MemoryNetwork, type MemoryEndpoint } from './helpers/memory-network.js';
import { MemoryFileStore, MemorySource, patternBytes } from './helpers/memory-store.js';
import { nextAck, nextPacket } from './helpers/frames.js';

const CONTROL: PeerAddress = { address: '127.0.0.1', port: 6969 };

let net: MemoryNetwork;
let store: MemoryFileStore;
let server: TftpxServer;
let client: MemoryEndpoint;

beforeEach(async () => {
  net = new MemoryNetwork();
  store = new MemoryFileStore();
  server = new TftpxServer({
    store,
    port: CONTROL.port,
    bindEndpoint: net.bind,
    sendTimeoutMs: 50,
    receiveTimeoutMs: 100,
    logger: silentLogger,
  });
  await server.start();
  client = net.bindSync();
});

afterEach(async () => {
  await server.stop();
});

function request(opcode: Opcode.ReadRequest | Opcode.WriteRequest | Opcode.Delete, filename: string): Promise<void> {
  return client.send(encodePacket({ opcode, filename }), CONTROL);
}

async function nextFrom(): Promise<{ port: number; bytes: Uint8Array }> {
  const datagram = await client.receive(1000);
  if (!datagram) throw new Error('no datagram');
  return { port: datagram.from.port, bytes: datagram.data };
}

async function settle(): Promise<void> {
  await Promise.all(server.activeSessions.map((managed) => managed.done));
}

describe('TftpxServer', () => {
  it('binds the control port', () => {
    expect(server.address).toEqual(CONTROL);
    expect(server.running).toBe(true);
  });

  it('refuses to start twice', async () => {
    await expect(server.start()).rejects.toThrow('Server is already running.');
  });

  it('serves a read request from a dedicated port', async () => {
    const content = patternBytes(1024);
    store.files.set('image.bin', content);
    await request(Opcode.ReadRequest, 'image.bin');

    const blocks: Array<[number, number]> = [];
    let sessionPort = 0;
    for (;;) {
      const datagram = await client.receive(1000);
      if (!datagram) throw new Error('transfer stalled');
      sessionPort = datagram.from.port;
      const packet = decode(datagram.data);
      if (packet.opcode !== Opcode.Data) throw new Error(`unexpected opcode ${packet.opcode}`);
      blocks.push([packet.block, packet.payload.length]);
      await client.send(encodePacket(ackPacket(packet.block)), datagram.from);
      if (packet.payload.length < 512) break;
    }

    expect(sessionPort).not.toBe(CONTROL.port);
    expect(blocks).toEqual([[1, 512], [2, 512], [3, 0]]);
    await settle();
    expect(net.boundPorts.sort()).toEqual([CONTROL.port, client.local.port].sort());
  });

  it('answers a missing file on the control port', async () => {
    await request(Opcode.ReadRequest, 'missing.txt');
    const reply = await nextFrom();
    expect(reply.port).toBe(CONTROL.port);
    expect(decode(reply.bytes)).toEqual({ opcode: Opcode.Error, code: 1, message: 'File not found' });
  });

  it('refuses files the block space cannot hold', async () => {
    store.openForRead = async () => {
      const source = new MemorySource(new Uint8Array(0));
      Object.defineProperty(source, 'size', { value: MAX_TRANSFER_BYTES });
      return source;
    };
    await request(Opcode.ReadRequest, 'huge.iso');

    const reply = await nextFrom();
    expect(reply.port).toBe(CONTROL.port);
    expect(decode(reply.bytes)).toEqual({ opcode: Opcode.Error, code: 3, message: 'File too large' });
  });

  it('answers a ping with one empty block', async () => {
    await request(Opcode.ReadRequest, '__ping__');
    const reply = await nextFrom();
    expect(reply.port).not.toBe(CONTROL.port);
    expect(decode(reply.bytes)).toEqual({ opcode: Opcode.Data, block: 1, payload: new Uint8Array(0) });
  });

  it('stores an upload and backs it up', async () => {
    const content = patternBytes(1000);
    await request(Opcode.WriteRequest, 'notes.txt');

    const ack0 = await client.receive(1000);
    if (!ack0) throw new Error('no ACK 0');
    expect(decode(ack0.data)).toEqual({ opcode: Opcode.Ack, block: 0 });
    const [managed] = server.activeSessions;
    expect(managed.kind).toBe('upload');

    await client.send(encodePacket(dataPacket(1, content.subarray(0, 512))), ack0.from);
    expect(await nextAck(client)).toBe(1);
    await client.send(encodePacket(dataPacket(2, content.subarray(512))), ack0.from);
    expect(await nextAck(client)).toBe(2);

    const outcome = await managed.done;
    expect(outcome).toEqual({ ok: true, result: { filename: 'notes.txt', bytes: 1000, blocks: 2 } });
    expect(store.files.get('notes.txt')).toEqual(content);
    expect(store.backups.get('notes.txt')).toEqual(content);
  });

  it('keeps an upload whose backup fails', async () => {
    store.failBackups = true;
    await request(Opcode.WriteRequest, 'a.txt');
    const ack0 = await client.receive(1000);
    if (!ack0) throw new Error('no ACK 0');
    const [managed] = server.activeSessions;

    await client.send(encodePacket(dataPacket(1, Uint8Array.of(1, 2, 3))), ack0.from);
    expect(await nextAck(client)).toBe(1);

    expect((await managed.done).ok).toBe(true);
    expect([...(store.files.get('a.txt') ?? [])]).toEqual([1, 2, 3]);
    expect(store.backups.size).toBe(0);
  });

  it('answers an uncreatable upload on the control port', async () => {
    store.readOnly.add('locked.txt');
    await request(Opcode.WriteRequest, 'locked.txt');
    const reply = await nextFrom();
    expect(reply.port).toBe(CONTROL.port);
    expect(decode(reply.bytes)).toEqual({ opcode: Opcode.Error, code: 2, message: 'Cannot create file' });
  });

  it('deletes files and reports the status in an ERROR frame', async () => {
    store.files.set('old.log', patternBytes(5));

    await request(Opcode.Delete, 'old.log');
    expect(await nextPacket(client)).toEqual({ opcode: Opcode.Error, code: 0, message: 'File deleted successfully' });
    expect(store.files.has('old.log')).toBe(false);

    await request(Opcode.Delete, 'old.log');
    expect(await nextPacket(client)).toEqual({ opcode: Opcode.Error, code: 1, message: 'Failed to delete file' });
  });

  it('rejects other opcodes on the control port', async () => {
    await client.send(encodePacket(ackPacket(0)), CONTROL);
    expect(await nextPacket(client)).toEqual({ opcode: Opcode.Error, code: 4, message: 'Illegal TFTP operation' });

    await client.send(Uint8Array.of(0x00, 0x63, 0x00, 0x00), CONTROL);
    expect(await nextPacket(client)).toEqual({ opcode: Opcode.Error, code: 4, message: 'Illegal TFTP operation' });
  });

  it('ignores short and malformed requests', async () => {
    await client.send(Uint8Array.of(0x00, 0x01, 0x41), CONTROL);
    await client.send(Uint8Array.of(0x00, 0x01, 0x41, 0x42), CONTROL);
    expect(await client.receive(50)).toBeNull();
    expect(server.activeSessions).toHaveLength(0);
  });

  it('aborts running sessions and releases their ports on stop', async () => {
    await request(Opcode.WriteRequest, 'slow.bin');
    await nextAck(client);
    expect(server.activeSessions).toHaveLength(1);

    await server.stop();
    expect(server.running).toBe(false);
    expect(server.activeSessions).toHaveLength(0);
    expect(net.boundPorts).toEqual([client.local.port]);
  });
});

function decode(bytes: Uint8Array): Packet {
  const decoded = decodePacket(bytes);
  if (!decoded.ok) throw decoded.error;
  return decoded.packet;
}
