export interface PeerAddress {
  address: string;
  port: number;
}

export interface Datagram {
  data: Uint8Array;
  from: PeerAddress;
}

/**
 * One bound datagram socket. Each transfer session owns exactly one.
 */
export interface DatagramEndpoint {
  /** Address and port the endpoint is bound to. */
  readonly local: PeerAddress;
  readonly closed: boolean;

  send(data: Uint8Array, to: PeerAddress): Promise<void>;

  /**
   * Next datagram, or null when `timeoutMs` elapses first or the endpoint is
   * closed. Without a timeout, waits until a datagram arrives or the endpoint closes.
   */
  receive(timeoutMs?: number): Promise<Datagram | null>;

  /** Idempotent. Wakes pending receivers with null. */
  close(): Promise<void>;
}

export interface BindOptions {
  /** 0 lets the system pick an ephemeral port. */
  port: number;
  /** Defaults to the wildcard address. */
  host?: string;
}

export type BindEndpoint = (opts: BindOptions) => Promise<DatagramEndpoint>;

export function sameAddress(a: PeerAddress, b: PeerAddress): boolean {
  return a.address === b.address && a.port === b.port;
}

export function formatAddress(addr: PeerAddress): string {
  return addr.address.includes(':') ? `[${addr.address}]:${addr.port}` : `${addr.address}:${addr.port}`;
}
