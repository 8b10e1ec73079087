import dgram from 'node:dgram';
import { TftpxNetworkError } from '../errors.js';
import { DatagramInbox } from './inbox.js';
import type { BindOptions, Datagram, DatagramEndpoint, PeerAddress } from './types.js';

const WILDCARD_ADDRESS = '0.0.0.0';

/**
 * DatagramEndpoint backed by a node:dgram IPv4 socket.
 */
export class UdpEndpoint implements DatagramEndpoint {
  readonly local: PeerAddress;
  private readonly socket: dgram.Socket;
  private readonly inbox = new DatagramInbox();
  private _closed = false;

  constructor(socket: dgram.Socket) {
    this.socket = socket;
    const bound = socket.address();
    this.local = { address: bound.address, port: bound.port };

    socket.on('message', (msg, rinfo) => {
      this.inbox.push({
        data: new Uint8Array(msg.buffer, msg.byteOffset, msg.byteLength),
        from: { address: rinfo.address, port: rinfo.port },
      });
    });
    socket.on('close', () => {
      this._closed = true;
      this.inbox.close();
    });
    // An asynchronous socket error leaves the endpoint unusable; receivers wake with null.
    socket.on('error', () => {
      if (this._closed) return;
      this._closed = true;
      this.inbox.close();
      socket.close();
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  send(data: Uint8Array, to: PeerAddress): Promise<void> {
    if (this._closed) {
      return Promise.reject(new TftpxNetworkError('Endpoint is closed.'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, to.port, to.address, (err) => {
        if (err) {
          reject(new TftpxNetworkError(`Send to ${to.address}:${to.port} failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs?: number): Promise<Datagram | null> {
    return this.inbox.next(timeoutMs);
  }

  close(): Promise<void> {
    if (this._closed) return Promise.resolve();
    this._closed = true;
    this.inbox.close();
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

/**
 * Bind a UDP socket and wrap it. Port 0 asks the system for an ephemeral port.
 * @throws {TftpxNetworkError} If the bind fails.
 */
export function bindUdpEndpoint(opts: BindOptions): Promise<DatagramEndpoint> {
  const socket = dgram.createSocket('udp4');
  const host = opts.host ?? WILDCARD_ADDRESS;

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      socket.close();
      reject(new TftpxNetworkError(`Could not bind ${host}:${opts.port}: ${err.message}`, { cause: err }));
    };
    socket.once('error', onError);
    socket.bind(opts.port, host, () => {
      socket.off('error', onError);
      resolve(new UdpEndpoint(socket));
    });
  });
}
