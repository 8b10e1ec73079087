// Constants
export * from './constants.js';

// Errors
export * from './errors.js';

// Logging
export { createConsoleLogger, silentLogger, errorMessage } from './logger.js';
export type { Logger, ConsoleLoggerOptions } from './logger.js';

// Protocol
export { crc8, Crc8 } from './protocol/crc8.js';
export {
  Opcode,
  ErrorCode,
  DeleteStatus,
  isOpcode,
  isRequestPacket,
  dataPacket,
  ackPacket,
  errorPacket,
} from './protocol/packet.js';
export type {
  Packet,
  RequestPacket,
  ReadRequestPacket,
  WriteRequestPacket,
  DataPacket,
  AckPacket,
  ErrorPacket,
  DeletePacket,
} from './protocol/packet.js';
export { encodePacket, decodePacket, peekOpcode, isFinalBlock, describePacket } from './protocol/codec.js';
export type { DecodeResult } from './protocol/codec.js';

// Transport
export { DatagramInbox } from './transport/inbox.js';
export { UdpEndpoint, bindUdpEndpoint } from './transport/udp.js';
export { sameAddress, formatAddress } from './transport/types.js';
export type { PeerAddress, Datagram, DatagramEndpoint, BindOptions, BindEndpoint } from './transport/types.js';

// Storage
export { FileByteSource, FileByteSink } from './storage/file-stream.js';
export { NodeFileStore } from './storage/node-file-store.js';
export type { NodeFileStoreOptions } from './storage/node-file-store.js';
export type { ByteSource, ByteSink, FileStore } from './storage/types.js';
export { validatePlainFilename } from './utils/filename.js';

// Transfers
export { TransferSession } from './transfer/session.js';
export type {
  TransferState,
  Incoming,
  TransferOptions,
  TransferProgressEvent,
  TransferResult,
  TransferSessionOptions,
} from './transfer/session.js';
export { runSendTransfer, runPingReply, assertTransferableSize } from './transfer/send.js';
export { runReceiveTransfer } from './transfer/receive.js';
export type { ReceiveTransferOptions } from './transfer/receive.js';

// Server
export { TftpxServer } from './server/server.js';
export type { TftpxServerOptions } from './server/server.js';
export { SessionManager } from './server/session-manager.js';
export type { SessionKind, SessionOutcome, ManagedSession, SessionManagerOptions } from './server/session-manager.js';
export { RequestDispatcher } from './server/dispatcher.js';
export type { DispatchOutcome, RequestDispatcherOptions } from './server/dispatcher.js';

// Client
export { TftpxClient } from './client/TftpxClient.js';
export type { TftpxClientOptions, ClientTransferOptions, PingResult, DeleteResult } from './client/TftpxClient.js';
