import {
  DEFAULT_CONTROL_PORT,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RECEIVE_TIMEOUT_MS,
  DEFAULT_SEND_TIMEOUT_MS,
} from '../constants.js';
import { TftpxError } from '../errors.js';
import { createConsoleLogger, errorMessage, type Logger } from '../logger.js';
import type { FileStore } from '../storage/types.js';
import { bindUdpEndpoint } from '../transport/udp.js';
import type { BindEndpoint, DatagramEndpoint, PeerAddress } from '../transport/types.js';
import { RequestDispatcher } from './dispatcher.js';
import { SessionManager, type ManagedSession } from './session-manager.js';

export interface TftpxServerOptions {
  store: FileStore;
  /** Control port. Defaults to 6969; 0 picks an ephemeral port. */
  port?: number;
  /** Bind address. Defaults to all interfaces. */
  host?: string;
  /** ACK wait per attempt on downloads (ms). */
  sendTimeoutMs?: number;
  /** DATA wait per attempt on uploads (ms). */
  receiveTimeoutMs?: number;
  maxAttempts?: number;
  /** Socket factory; defaults to node:dgram. */
  bindEndpoint?: BindEndpoint;
  logger?: Logger;
}

/**
 * UDP file server: a control loop on the well-known port that hands each
 * accepted request to its own session on an ephemeral port.
 */
export class TftpxServer {
  readonly store: FileStore;
  readonly port: number;
  readonly host?: string;
  readonly sendTimeoutMs: number;
  readonly receiveTimeoutMs: number;
  readonly maxAttempts: number;

  private readonly bindEndpoint: BindEndpoint;
  private readonly logger: Logger;
  private control: DatagramEndpoint | null = null;
  private sessionManager: SessionManager | null = null;
  private loop: Promise<void> | null = null;
  private readonly inflight = new Set<Promise<void>>();

  constructor(opts: TftpxServerOptions) {
    this.store = opts.store;
    this.port = opts.port ?? DEFAULT_CONTROL_PORT;
    this.host = opts.host;
    this.sendTimeoutMs = opts.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.receiveTimeoutMs = opts.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.bindEndpoint = opts.bindEndpoint ?? bindUdpEndpoint;
    this.logger = opts.logger ?? createConsoleLogger('tftpx:server');
  }

  /** Bound control address, once started. */
  get address(): PeerAddress | null {
    return this.control?.local ?? null;
  }

  get running(): boolean {
    return this.control !== null && !this.control.closed;
  }

  get activeSessions(): ManagedSession[] {
    return this.sessionManager?.sessions() ?? [];
  }

  /**
   * Bind the control port and start serving.
   * @throws {TftpxNetworkError} If the control port cannot be bound.
   */
  async start(): Promise<PeerAddress> {
    if (this.control) {
      throw new TftpxError('Server is already running.');
    }

    const control = await this.bindEndpoint({ port: this.port, host: this.host });
    const sessions = new SessionManager({
      store: this.store,
      bindEndpoint: this.bindEndpoint,
      control,
      sendTimeoutMs: this.sendTimeoutMs,
      receiveTimeoutMs: this.receiveTimeoutMs,
      maxAttempts: this.maxAttempts,
      logger: this.logger,
    });
    const dispatcher = new RequestDispatcher({ control, sessions, store: this.store, logger: this.logger });

    this.control = control;
    this.sessionManager = sessions;
    this.loop = this.runLoop(control, dispatcher);

    this.logger.info(`Listening on port ${control.local.port}`);
    return control.local;
  }

  /**
   * Close the control port, abort running sessions and wait for them to release
   * their endpoints. Partially uploaded files stay where they are.
   */
  async stop(): Promise<void> {
    const control = this.control;
    if (!control) return;

    await control.close();
    await this.loop;
    await Promise.all(this.inflight);
    await this.sessionManager?.closeAll();

    this.control = null;
    this.sessionManager = null;
    this.loop = null;
    this.logger.info('Server stopped');
  }

  private async runLoop(control: DatagramEndpoint, dispatcher: RequestDispatcher): Promise<void> {
    while (!control.closed) {
      const datagram = await control.receive();
      if (!datagram) continue;

      // Never await the transfer here: each request runs on its own.
      const task = dispatcher
        .dispatch(datagram)
        .then((outcome) => {
          if (outcome.type === 'ignored') {
            this.logger.debug(`Ignored datagram: ${outcome.reason}`);
          }
        })
        .catch((err: unknown) => {
          this.logger.error(`Dispatch failed: ${errorMessage(err)}`);
        })
        .finally(() => {
          this.inflight.delete(task);
        });
      this.inflight.add(task);
    }
  }
}
