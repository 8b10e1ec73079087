import {
  TftpxAbortError,
  TftpxNetworkError,
  type TftpxChecksumError,
  type TftpxMalformedError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { decodePacket, encodePacket } from '../protocol/codec.js';
import type { Packet } from '../protocol/packet.js';
import {
  formatAddress,
  sameAddress,
  type DatagramEndpoint,
  type PeerAddress,
} from '../transport/types.js';

export type TransferState =
  | 'idle'
  | 'streaming'           // send: reading the next chunk
  | 'awaiting-ack'        // send: DATA out, waiting for its ACK
  | 'sending-final-empty' // send: zero-length block after a full final block
  | 'receiving'           // receive: waiting for the next DATA
  | 'done'
  | 'aborted';

/**
 * Allowed state transitions to prevent invalid state changes.
 */
const ALLOWED_TRANSITIONS: Record<TransferState, TransferState[]> = {
  idle: ['streaming', 'receiving', 'done', 'aborted'],
  streaming: ['awaiting-ack', 'sending-final-empty', 'aborted'],
  'awaiting-ack': ['streaming', 'done', 'aborted'],
  'sending-final-empty': ['done', 'aborted'],
  receiving: ['done', 'aborted'],
  done: [],
  aborted: [],
};

export type Incoming =
  | { type: 'packet'; packet: Packet }
  | { type: 'invalid'; error: TftpxMalformedError | TftpxChecksumError }
  | { type: 'timeout' };

export interface TransferProgressEvent {
  block: number;
  processedBytes: number;
  /** Known on the sending side only. */
  totalBytes?: number;
}

export interface TransferOptions {
  /** Wait per attempt for the peer's next datagram (ms). */
  timeoutMs: number;
  /** Consecutive failed attempts tolerated for one block. */
  maxAttempts: number;
  onProgress?: (evt: TransferProgressEvent) => void;
}

export interface TransferResult {
  filename: string;
  bytes: number;
  blocks: number;
}

export interface TransferSessionOptions {
  endpoint: DatagramEndpoint;
  filename: string;
  /** Correspondent known up front (server side: the requester). */
  peer?: PeerAddress;
  /**
   * Without a fixed peer, lock onto the first datagram from this host,
   * whatever port it comes from (client side: the server's session port).
   */
  peerHost?: string;
  signal?: AbortSignal;
  logger?: Logger;
}

let sessionSequence = 0;

/**
 * State of one transfer: its endpoint, its correspondent, the current block
 * and the attempt counter. The send and receive machines drive it.
 */
export class TransferSession {
  readonly id: string;
  readonly endpoint: DatagramEndpoint;
  readonly filename: string;
  readonly logger: Logger;

  peer: PeerAddress | null;
  /** Send side: block in flight. Receive side: last accepted block. */
  block = 0;
  /** Consecutive failed attempts for the current block. */
  attempts = 0;
  bytesTransferred = 0;

  private _state: TransferState = 'idle';
  private readonly peerHost?: string;
  private readonly signal?: AbortSignal;
  private readonly onAbort = (): void => {
    this.endpoint.close().catch((err: unknown) => {
      this.logger.debug(`Session ${this.id}: close after abort failed: ${String(err)}`);
    });
  };

  constructor(opts: TransferSessionOptions) {
    this.id = `s${++sessionSequence}`;
    this.endpoint = opts.endpoint;
    this.filename = opts.filename;
    this.peer = opts.peer ?? null;
    this.peerHost = opts.peerHost;
    this.signal = opts.signal;
    this.logger = opts.logger ?? silentLogger;
    this.signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  get state(): TransferState {
    return this._state;
  }

  get terminal(): boolean {
    return this._state === 'done' || this._state === 'aborted';
  }

  /**
   * Attempt a state transition. Returns true if transition was valid.
   */
  transitionTo(next: TransferState): boolean {
    if (!ALLOWED_TRANSITIONS[this._state].includes(next)) {
      this.logger.warn(`Session ${this.id}: invalid state transition ${this._state} -> ${next}`);
      return false;
    }
    this._state = next;
    return true;
  }

  send(packet: Packet): Promise<void> {
    return this.sendFrame(encodePacket(packet));
  }

  async sendFrame(frame: Uint8Array): Promise<void> {
    this.throwIfAborted();
    if (!this.peer) {
      throw new TftpxNetworkError(`Session ${this.id} has no peer to send to.`);
    }
    await this.endpoint.send(frame, this.peer);
  }

  /**
   * Wait up to `timeoutMs` for the next datagram from the peer. Datagrams from
   * other addresses are dropped without using up the wait.
   * @throws {TftpxAbortError} If the session is aborted while waiting.
   * @throws {TftpxNetworkError} If the endpoint closes underneath the session.
   */
  async awaitPacket(timeoutMs: number): Promise<Incoming> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      this.throwIfAborted();
      const remaining = deadline - Date.now();
      if (remaining <= 0) return { type: 'timeout' };

      const datagram = await this.endpoint.receive(remaining);
      if (!datagram) {
        this.throwIfAborted();
        if (this.endpoint.closed) {
          throw new TftpxNetworkError(`Session ${this.id}: endpoint closed.`);
        }
        return { type: 'timeout' };
      }

      if (!this.acceptsFrom(datagram.from)) {
        this.logger.debug(`Session ${this.id}: ignoring datagram from ${formatAddress(datagram.from)}`);
        continue;
      }

      const decoded = decodePacket(datagram.data);
      if (!decoded.ok) {
        return { type: 'invalid', error: decoded.error };
      }
      if (!this.peer) {
        this.peer = datagram.from;
      }
      return { type: 'packet', packet: decoded.packet };
    }
  }

  /**
   * Release the endpoint. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    this.signal?.removeEventListener('abort', this.onAbort);
    await this.endpoint.close();
  }

  private acceptsFrom(from: PeerAddress): boolean {
    if (this.peer) return sameAddress(this.peer, from);
    if (this.peerHost !== undefined) return from.address === this.peerHost;
    return true;
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new TftpxAbortError(`Session ${this.id} aborted.`);
    }
  }
}
