import { lookup } from 'node:dns/promises';
import {
  DEFAULT_CONTROL_PORT,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RECEIVE_TIMEOUT_MS,
  PING_FILENAME,
} from '../constants.js';
import {
  TftpxDeleteFailedError,
  TftpxError,
  TftpxFileNotFoundError,
  TftpxNetworkError,
  TftpxRemoteError,
  TftpxRetryExhaustedError,
  TftpxTimeoutError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { encodePacket } from '../protocol/codec.js';
import { DeleteStatus, ErrorCode, Opcode, type Packet } from '../protocol/packet.js';
import type { ByteSink, ByteSource } from '../storage/types.js';
import { runReceiveTransfer } from '../transfer/receive.js';
import { assertTransferableSize, runSendTransfer } from '../transfer/send.js';
import {
  TransferSession,
  type TransferProgressEvent,
  type TransferResult,
} from '../transfer/session.js';
import { bindUdpEndpoint } from '../transport/udp.js';
import type { BindEndpoint, DatagramEndpoint, PeerAddress } from '../transport/types.js';
import { validatePlainFilename } from '../utils/filename.js';

export interface TftpxClientOptions {
  /** Server host name or IPv4 address. */
  host: string;
  /** Server control port. Defaults to 6969. */
  port?: number;
  /** Wait per attempt for the server's next datagram (ms). */
  timeoutMs?: number;
  maxAttempts?: number;
  bindEndpoint?: BindEndpoint;
  logger?: Logger;
}

export interface ClientTransferOptions {
  signal?: AbortSignal;
  onProgress?: (evt: TransferProgressEvent) => void;
}

export interface PingResult {
  server: PeerAddress;
  rttMs: number;
}

export interface DeleteResult {
  filename: string;
  message: string;
}

/**
 * Client for a tftpx server. Every operation runs on its own ephemeral endpoint,
 * so one client can run several operations at once.
 */
export class TftpxClient {
  readonly host: string;
  readonly port: number;
  readonly timeoutMs: number;
  readonly maxAttempts: number;

  private readonly bindEndpoint: BindEndpoint;
  private readonly logger: Logger;
  private resolvedAddress: string | null = null;

  constructor(opts: TftpxClientOptions) {
    this.host = opts.host;
    this.port = opts.port ?? DEFAULT_CONTROL_PORT;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.bindEndpoint = opts.bindEndpoint ?? bindUdpEndpoint;
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Probe the server with the ping sentinel. Any DATA reply counts as alive.
   * @throws {TftpxTimeoutError} If nothing comes back in time.
   */
  async ping(opts: { signal?: AbortSignal } = {}): Promise<PingResult> {
    return this.withSession(PING_FILENAME, opts.signal, async (session, server) => {
      const started = Date.now();
      await session.endpoint.send(encodePacket({ opcode: Opcode.ReadRequest, filename: PING_FILENAME }), server);

      const packet = await this.awaitReply(session, 1);
      if (!packet || packet.opcode !== Opcode.Data) {
        throw new TftpxTimeoutError('Server not responding.');
      }
      return { server: session.peer ?? server, rttMs: Date.now() - started };
    });
  }

  /**
   * Download `remoteName` into `sink`. The sink is not closed.
   * @throws {TftpxFileNotFoundError} If the server has no such file.
   * @throws {TftpxRetryExhaustedError} If the server goes quiet.
   */
  async download(remoteName: string, sink: ByteSink, opts: ClientTransferOptions = {}): Promise<TransferResult> {
    const filename = validatePlainFilename(remoteName);
    return this.withSession(filename, opts.signal, async (session, server) => {
      await session.endpoint.send(encodePacket({ opcode: Opcode.ReadRequest, filename }), server);
      try {
        return await runReceiveTransfer(session, sink, {
          timeoutMs: this.timeoutMs,
          maxAttempts: this.maxAttempts,
          onProgress: opts.onProgress,
        });
      } catch (err) {
        throw mapRemoteError(err);
      }
    });
  }

  /**
   * Upload `source` as `remoteName`. The source is not closed.
   * @throws {TftpxValidationError} If the source is too large for the block space.
   * @throws {TftpxRemoteError} If the server refuses the write.
   */
  async upload(source: ByteSource, remoteName: string, opts: ClientTransferOptions = {}): Promise<TransferResult> {
    const filename = validatePlainFilename(remoteName);
    assertTransferableSize(source.size);

    return this.withSession(filename, opts.signal, async (session, server) => {
      await session.endpoint.send(encodePacket({ opcode: Opcode.WriteRequest, filename }), server);

      // ACK #0 arrives from the server's session port and locks the peer to it.
      const accepted = await this.awaitReply(session, this.maxAttempts);
      if (!accepted) {
        throw new TftpxRetryExhaustedError('Did not receive ACK for write request.', 0, this.maxAttempts);
      }
      if (accepted.opcode === Opcode.Error) {
        throw mapRemoteError(new TftpxRemoteError(accepted.message, accepted.code));
      }
      if (accepted.opcode !== Opcode.Ack || accepted.block !== 0) {
        throw new TftpxError(`Unexpected reply to write request (opcode ${accepted.opcode}).`);
      }

      return runSendTransfer(session, source, {
        timeoutMs: this.timeoutMs,
        maxAttempts: this.maxAttempts,
        onProgress: opts.onProgress,
      });
    });
  }

  /**
   * Ask the server to remove `remoteName`. The status comes back in an ERROR frame
   * whose code 0 means success.
   * @throws {TftpxDeleteFailedError} If the server reports failure.
   */
  async delete(remoteName: string, opts: { signal?: AbortSignal } = {}): Promise<DeleteResult> {
    const filename = validatePlainFilename(remoteName);
    return this.withSession(filename, opts.signal, async (session, server) => {
      await session.endpoint.send(encodePacket({ opcode: Opcode.Delete, filename }), server);

      const reply = await this.awaitReply(session, 1);
      if (!reply) {
        throw new TftpxTimeoutError('No response to delete request.');
      }
      if (reply.opcode !== Opcode.Error) {
        throw new TftpxError(`Unexpected reply to delete request (opcode ${reply.opcode}).`);
      }
      if (reply.code !== DeleteStatus.Deleted) {
        throw new TftpxDeleteFailedError(reply.message, { code: reply.code });
      }
      return { filename, message: reply.message };
    });
  }

  private async resolveServer(): Promise<PeerAddress> {
    if (!this.resolvedAddress) {
      try {
        const { address } = await lookup(this.host, { family: 4 });
        this.resolvedAddress = address;
      } catch (err) {
        throw new TftpxNetworkError(`Could not resolve host "${this.host}".`, { cause: err });
      }
    }
    return { address: this.resolvedAddress, port: this.port };
  }

  private async withSession<T>(
    filename: string,
    signal: AbortSignal | undefined,
    run: (session: TransferSession, server: PeerAddress) => Promise<T>
  ): Promise<T> {
    const server = await this.resolveServer();
    const endpoint: DatagramEndpoint = await this.bindEndpoint({ port: 0 });
    const session = new TransferSession({
      endpoint,
      filename,
      peerHost: server.address,
      signal,
      logger: this.logger,
    });
    try {
      return await run(session, server);
    } finally {
      await session.dispose();
    }
  }

  /**
   * First valid packet from the server, waiting up to `attempts` timeouts.
   * Returns null when nothing arrives.
   */
  private async awaitReply(session: TransferSession, attempts: number): Promise<Packet | null> {
    for (let i = 0; i < attempts; i++) {
      const incoming = await session.awaitPacket(this.timeoutMs);
      if (incoming.type === 'packet') return incoming.packet;
      if (incoming.type === 'invalid') {
        this.logger.debug(`Dropped reply: ${incoming.error.message}`);
      }
    }
    return null;
  }
}

function mapRemoteError(err: unknown): unknown {
  if (err instanceof TftpxRemoteError && err.code === ErrorCode.FileNotFound) {
    return new TftpxFileNotFoundError(err.message, { code: err.code, cause: err });
  }
  return err;
}
