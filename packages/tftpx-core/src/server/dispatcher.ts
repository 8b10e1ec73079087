import { MIN_REQUEST_SIZE } from '../constants.js';
import { TftpxIllegalOperationError } from '../errors.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { decodePacket, describePacket, encodePacket, peekOpcode } from '../protocol/codec.js';
import { DeleteStatus, ErrorCode, Opcode, errorPacket, isRequestPacket, type ErrorPacket } from '../protocol/packet.js';
import type { FileStore } from '../storage/types.js';
import { formatAddress, type Datagram, type DatagramEndpoint, type PeerAddress } from '../transport/types.js';
import type { ManagedSession, SessionManager } from './session-manager.js';

export type DispatchOutcome =
  | { type: 'ignored'; reason: string }
  | { type: 'session'; session: ManagedSession | null }
  | { type: 'replied'; reply: ErrorPacket };

export interface RequestDispatcherOptions {
  control: DatagramEndpoint;
  sessions: SessionManager;
  store: FileStore;
  logger?: Logger;
}

/**
 * Routes control-port datagrams: RRQ and WRQ open sessions, DELETE is answered
 * in place, anything else gets an illegal-operation ERROR.
 */
export class RequestDispatcher {
  private readonly control: DatagramEndpoint;
  private readonly sessions: SessionManager;
  private readonly store: FileStore;
  private readonly logger: Logger;

  constructor(opts: RequestDispatcherOptions) {
    this.control = opts.control;
    this.sessions = opts.sessions;
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Handle one control datagram. Resolves as soon as a session is running;
   * it does not wait for the transfer.
   */
  async dispatch(datagram: Datagram): Promise<DispatchOutcome> {
    const { data, from } = datagram;
    if (data.length < MIN_REQUEST_SIZE) {
      return { type: 'ignored', reason: `short datagram (${data.length} bytes)` };
    }

    const opcode = peekOpcode(data);
    if (opcode !== Opcode.ReadRequest && opcode !== Opcode.WriteRequest && opcode !== Opcode.Delete) {
      this.logger.debug(`Illegal opcode ${String(opcode)} from ${formatAddress(from)}`);
      return this.refuse(from, new TftpxIllegalOperationError());
    }

    const decoded = decodePacket(data);
    if (!decoded.ok) {
      this.logger.debug(`Dropped request from ${formatAddress(from)}: ${decoded.error.message}`);
      return { type: 'ignored', reason: decoded.error.message };
    }

    const { packet } = decoded;
    if (!isRequestPacket(packet)) {
      return { type: 'ignored', reason: `unexpected ${describePacket(packet)}` };
    }
    this.logger.info(`${describePacket(packet)} from ${formatAddress(from)}`);

    switch (packet.opcode) {
      case Opcode.ReadRequest:
        return { type: 'session', session: await this.sessions.openDownload(packet.filename, from) };
      case Opcode.WriteRequest:
        return { type: 'session', session: await this.sessions.openUpload(packet.filename, from) };
      case Opcode.Delete:
        return this.handleDelete(packet.filename, from);
    }
  }

  private async handleDelete(filename: string, from: PeerAddress): Promise<DispatchOutcome> {
    try {
      await this.store.remove(filename);
      this.logger.info(`File "${filename}" deleted successfully.`);
      return this.reply(from, errorPacket(DeleteStatus.Deleted, 'File deleted successfully'));
    } catch (err) {
      this.logger.warn(`Failed to delete file "${filename}": ${errorMessage(err)}`);
      return this.reply(from, errorPacket(DeleteStatus.Failed, 'Failed to delete file'));
    }
  }

  private refuse(to: PeerAddress, err: TftpxIllegalOperationError): Promise<DispatchOutcome> {
    return this.reply(to, errorPacket(ErrorCode.IllegalOperation, err.message));
  }

  private async reply(to: PeerAddress, reply: ErrorPacket): Promise<DispatchOutcome> {
    try {
      await this.control.send(encodePacket(reply), to);
    } catch (err) {
      this.logger.warn(`Could not reply to ${formatAddress(to)}: ${errorMessage(err)}`);
    }
    return { type: 'replied', reply };
  }
}
