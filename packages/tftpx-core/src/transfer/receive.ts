import { MAX_BLOCK_NUMBER } from '../constants.js';
import { TftpxRemoteError, TftpxRetryExhaustedError, TftpxValidationError } from '../errors.js';
import { errorMessage } from '../logger.js';
import { isFinalBlock } from '../protocol/codec.js';
import { ErrorCode, Opcode, ackPacket, errorPacket } from '../protocol/packet.js';
import type { ByteSink } from '../storage/types.js';
import type { TransferOptions, TransferResult, TransferSession } from './session.js';

export interface ReceiveTransferOptions extends TransferOptions {
  /**
   * Send ACK #0 before the first block to confirm a write request (server side).
   * A downloading client starts silent and lets the first DATA open the exchange.
   */
  acknowledgeRequest?: boolean;
}

/**
 * Drive the receiving side of a transfer: upload on the server, download on the client.
 *
 * Only the block after the last accepted one is written. Any other valid block
 * is still acknowledged with its own number, which re-synchronizes a sender whose
 * previous ACK was lost. Blocks failing their CRC are dropped without an ACK so
 * the sender's retry timer fires. ACKs are never re-sent on a timeout; after
 * `maxAttempts` waits without valid DATA the session gives up. Discarded
 * datagrams do not extend the current wait.
 *
 * The sink is left open; callers close it.
 *
 * @throws {TftpxRetryExhaustedError} If the peer goes quiet.
 * @throws {TftpxRemoteError} If the peer sends an ERROR packet.
 */
export async function runReceiveTransfer(
  session: TransferSession,
  sink: ByteSink,
  opts: ReceiveTransferOptions
): Promise<TransferResult> {
  try {
    session.block = 0;
    session.attempts = 0;
    session.transitionTo('receiving');

    if (opts.acknowledgeRequest) {
      await session.send(ackPacket(0));
    }

    let deadline = Date.now() + opts.timeoutMs;
    for (;;) {
      const incoming = await session.awaitPacket(deadline - Date.now());

      if (incoming.type === 'timeout') {
        session.attempts++;
        session.logger.debug(
          `Session ${session.id}: waiting for block ${session.block + 1} (attempt ${session.attempts}/${opts.maxAttempts})`
        );
        if (session.attempts >= opts.maxAttempts) {
          throw new TftpxRetryExhaustedError(
            `Timeout waiting for DATA block ${session.block + 1}.`,
            session.block + 1,
            opts.maxAttempts
          );
        }
        deadline = Date.now() + opts.timeoutMs;
        continue;
      }

      if (incoming.type === 'invalid') {
        session.logger.debug(`Session ${session.id}: dropped datagram: ${incoming.error.message}`);
        continue;
      }

      const { packet } = incoming;
      if (packet.opcode === Opcode.Error) {
        throw new TftpxRemoteError(packet.message, packet.code);
      }
      if (packet.opcode !== Opcode.Data) {
        session.logger.debug(`Session ${session.id}: unexpected opcode ${packet.opcode} while receiving`);
        continue;
      }

      session.attempts = 0;
      const expected = session.block + 1;

      if (packet.block === expected) {
        await sink.write(packet.payload);
        session.block = packet.block;
        session.bytesTransferred += packet.payload.length;
        opts.onProgress?.({ block: session.block, processedBytes: session.bytesTransferred });
      } else if (expected > MAX_BLOCK_NUMBER && packet.block === 0) {
        await session.send(errorPacket(ErrorCode.AllocationExceeded, 'File too large'));
        throw new TftpxValidationError('Block number space exhausted.');
      } else {
        session.logger.debug(`Session ${session.id}: duplicate or out-of-order block ${packet.block} (expected ${expected})`);
      }

      await session.send(ackPacket(packet.block));
      deadline = Date.now() + opts.timeoutMs;

      if (isFinalBlock(packet.payload)) {
        session.transitionTo('done');
        return { filename: session.filename, bytes: session.bytesTransferred, blocks: session.block };
      }
    }
  } catch (err) {
    session.transitionTo('aborted');
    session.logger.debug(`Session ${session.id}: receive aborted: ${errorMessage(err)}`);
    throw err;
  }
}
