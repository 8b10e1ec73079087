import { PING_FILENAME } from '../constants.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { encodePacket } from '../protocol/codec.js';
import { ErrorCode, errorPacket } from '../protocol/packet.js';
import type { ByteSink, ByteSource, FileStore } from '../storage/types.js';
import { runReceiveTransfer } from '../transfer/receive.js';
import { assertTransferableSize, runPingReply, runSendTransfer } from '../transfer/send.js';
import { TransferSession, type TransferResult } from '../transfer/session.js';
import {
  formatAddress,
  type BindEndpoint,
  type DatagramEndpoint,
  type PeerAddress,
} from '../transport/types.js';

export type SessionKind = 'download' | 'upload' | 'ping';

export type SessionOutcome =
  | { ok: true; result: TransferResult }
  | { ok: false; error: unknown };

export interface ManagedSession {
  readonly kind: SessionKind;
  readonly session: TransferSession;
  readonly peer: PeerAddress;
  /** Settles when the session reaches a terminal state and its resources are released. Never rejects. */
  readonly done: Promise<SessionOutcome>;
  abort(): void;
}

export interface SessionManagerOptions {
  store: FileStore;
  bindEndpoint: BindEndpoint;
  /** Control endpoint, used for replies sent before a session exists. */
  control: DatagramEndpoint;
  sendTimeoutMs: number;
  receiveTimeoutMs: number;
  maxAttempts: number;
  logger?: Logger;
}

/**
 * Opens one dedicated endpoint per accepted request and owns the lifetime of
 * the transfer running on it.
 */
export class SessionManager {
  private readonly opts: SessionManagerOptions;
  private readonly logger: Logger;
  private readonly active = new Map<string, ManagedSession>();

  constructor(opts: SessionManagerOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger;
  }

  sessions(): ManagedSession[] {
    return [...this.active.values()];
  }

  /**
   * Start serving a read request. Resolves once the session is running (or was
   * refused); the transfer itself continues in the background.
   */
  async openDownload(filename: string, peer: PeerAddress): Promise<ManagedSession | null> {
    const endpoint = await this.bind(peer);
    if (!endpoint) return null;

    const controller = new AbortController();
    const session = new TransferSession({ endpoint, filename, peer, signal: controller.signal, logger: this.logger });

    if (filename === PING_FILENAME) {
      return this.track('ping', session, peer, controller, async () => {
        await runPingReply(session);
        return { filename, bytes: 0, blocks: 1 };
      });
    }

    let source: ByteSource;
    try {
      source = await this.opts.store.openForRead(filename);
    } catch (err) {
      this.logger.warn(`RRQ "${filename}" from ${formatAddress(peer)}: ${errorMessage(err)}`);
      await this.replyOnControl(peer, ErrorCode.FileNotFound, 'File not found');
      await session.dispose();
      return null;
    }

    try {
      assertTransferableSize(source.size);
    } catch (err) {
      this.logger.warn(`RRQ "${filename}": ${errorMessage(err)}`);
      await this.replyOnControl(peer, ErrorCode.AllocationExceeded, 'File too large');
      await source.close();
      await session.dispose();
      return null;
    }

    return this.track('download', session, peer, controller, async () => {
      try {
        const result = await runSendTransfer(session, source, {
          timeoutMs: this.opts.sendTimeoutMs,
          maxAttempts: this.opts.maxAttempts,
        });
        this.logger.info(`Finished sending "${filename}" (${result.bytes} bytes, ${result.blocks} blocks)`);
        return result;
      } finally {
        await source.close();
      }
    });
  }

  /**
   * Start serving a write request. The destination is opened before ACK #0 goes out.
   */
  async openUpload(filename: string, peer: PeerAddress): Promise<ManagedSession | null> {
    const endpoint = await this.bind(peer);
    if (!endpoint) return null;

    const controller = new AbortController();
    const session = new TransferSession({ endpoint, filename, peer, signal: controller.signal, logger: this.logger });

    let sink: ByteSink;
    try {
      sink = await this.opts.store.openForWrite(filename);
    } catch (err) {
      this.logger.warn(`WRQ "${filename}" from ${formatAddress(peer)}: ${errorMessage(err)}`);
      await this.replyOnControl(peer, ErrorCode.AccessViolation, 'Cannot create file');
      await session.dispose();
      return null;
    }

    return this.track('upload', session, peer, controller, async () => {
      let result: TransferResult;
      try {
        result = await runReceiveTransfer(session, sink, {
          timeoutMs: this.opts.receiveTimeoutMs,
          maxAttempts: this.opts.maxAttempts,
          acknowledgeRequest: true,
        });
      } finally {
        await sink.close();
      }

      this.logger.info(`Received and saved "${filename}" (${result.bytes} bytes)`);
      try {
        await this.opts.store.duplicate(filename);
        this.logger.info(`Backup created for "${filename}"`);
      } catch (err) {
        this.logger.warn(`Backup of "${filename}" failed: ${errorMessage(err)}`);
      }
      return result;
    });
  }

  /**
   * Abort every running session and wait until their endpoints and streams are closed.
   */
  async closeAll(): Promise<void> {
    const running = this.sessions();
    for (const managed of running) {
      managed.abort();
    }
    await Promise.all(running.map((managed) => managed.done));
  }

  private async bind(peer: PeerAddress): Promise<DatagramEndpoint | null> {
    try {
      return await this.opts.bindEndpoint({ port: 0 });
    } catch (err) {
      this.logger.error(`Could not open a session endpoint for ${formatAddress(peer)}: ${errorMessage(err)}`);
      return null;
    }
  }

  private track(
    kind: SessionKind,
    session: TransferSession,
    peer: PeerAddress,
    controller: AbortController,
    run: () => Promise<TransferResult>
  ): ManagedSession {
    this.logger.debug(`Session ${session.id}: ${kind} "${session.filename}" for ${formatAddress(peer)} on port ${session.endpoint.local.port}`);

    const done = run()
      .then((result): SessionOutcome => ({ ok: true, result }))
      .catch((error: unknown): SessionOutcome => {
        this.logger.warn(`Session ${session.id} (${kind} "${session.filename}") aborted: ${errorMessage(error)}`);
        return { ok: false, error };
      })
      .then(async (outcome) => {
        try {
          await session.dispose();
        } catch (err) {
          this.logger.warn(`Session ${session.id}: endpoint close failed: ${errorMessage(err)}`);
        }
        this.active.delete(session.id);
        return outcome;
      });

    const managed: ManagedSession = {
      kind,
      session,
      peer,
      done,
      abort: () => controller.abort(),
    };
    this.active.set(session.id, managed);
    return managed;
  }

  private async replyOnControl(peer: PeerAddress, code: number, message: string): Promise<void> {
    try {
      await this.opts.control.send(encodePacket(errorPacket(code, message)), peer);
    } catch (err) {
      this.logger.warn(`Could not send ERROR ${code} to ${formatAddress(peer)}: ${errorMessage(err)}`);
    }
  }
}
