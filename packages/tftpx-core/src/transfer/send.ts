import { BLOCK_SIZE, MAX_BLOCK_NUMBER, MAX_TRANSFER_BYTES } from '../constants.js';
import {
  TftpxRemoteError,
  TftpxRetryExhaustedError,
  TftpxValidationError,
} from '../errors.js';
import { encodePacket, isFinalBlock } from '../protocol/codec.js';
import { Opcode, dataPacket } from '../protocol/packet.js';
import type { ByteSource } from '../storage/types.js';
import type { TransferOptions, TransferResult, TransferSession } from './session.js';

/**
 * Reject sources whose block count does not fit the 16-bit block space.
 * @throws {TftpxValidationError}
 */
export function assertTransferableSize(size: number): void {
  if (size >= MAX_TRANSFER_BYTES) {
    throw new TftpxValidationError(
      `File too large: ${size} bytes. Transfers must be smaller than ${MAX_TRANSFER_BYTES} bytes.`
    );
  }
}

/**
 * Send one framed DATA block and wait for its ACK, retransmitting on every
 * failed attempt. Anything other than the matching ACK counts as a failure.
 */
async function deliverBlock(
  session: TransferSession,
  payload: Uint8Array,
  opts: TransferOptions
): Promise<void> {
  const block = session.block;
  const frame = encodePacket(dataPacket(block, payload));
  session.attempts = 0;

  while (session.attempts < opts.maxAttempts) {
    session.attempts++;
    await session.sendFrame(frame);

    const incoming = await session.awaitPacket(opts.timeoutMs);
    if (incoming.type === 'packet') {
      const { packet } = incoming;
      if (packet.opcode === Opcode.Ack && packet.block === block) {
        return;
      }
      if (packet.opcode === Opcode.Error) {
        throw new TftpxRemoteError(packet.message, packet.code);
      }
      session.logger.debug(`Session ${session.id}: unexpected opcode ${packet.opcode} while waiting for ACK #${block}`);
    } else if (incoming.type === 'invalid') {
      session.logger.debug(`Session ${session.id}: ${incoming.error.message}`);
    } else {
      session.logger.debug(`Session ${session.id}: no ACK for block ${block} (attempt ${session.attempts}/${opts.maxAttempts})`);
    }
  }

  throw new TftpxRetryExhaustedError(
    `No ACK for block ${block} after ${opts.maxAttempts} attempts.`,
    block,
    opts.maxAttempts
  );
}

/**
 * Drive the sending side of a transfer: download on the server, upload on the client.
 *
 * Blocks go out one at a time and the next is read only after the previous one
 * is acknowledged. A full final block is followed by a zero-length block with the
 * next number so the receiver can tell the file ended on a block boundary.
 *
 * The session's peer must already be known. The source is left open; callers close it.
 *
 * @throws {TftpxRetryExhaustedError} If a block is never acknowledged.
 * @throws {TftpxRemoteError} If the peer answers with an ERROR packet.
 */
export async function runSendTransfer(
  session: TransferSession,
  source: ByteSource,
  opts: TransferOptions
): Promise<TransferResult> {
  try {
    assertTransferableSize(source.size);
    session.block = 1;

    for (;;) {
      session.transitionTo('streaming');
      const payload = await source.read(BLOCK_SIZE);

      // An empty chunk right after a full block is the boundary marker.
      const finalEmpty = payload.length === 0 && session.block > 1;
      session.transitionTo(finalEmpty ? 'sending-final-empty' : 'awaiting-ack');

      await deliverBlock(session, payload, opts);
      session.bytesTransferred += payload.length;
      opts.onProgress?.({
        block: session.block,
        processedBytes: session.bytesTransferred,
        totalBytes: source.size,
      });

      if (isFinalBlock(payload)) {
        session.transitionTo('done');
        return { filename: session.filename, bytes: session.bytesTransferred, blocks: session.block };
      }

      if (session.block === MAX_BLOCK_NUMBER) {
        throw new TftpxValidationError('Block number space exhausted.');
      }
      session.block++;
    }
  } catch (err) {
    session.transitionTo('aborted');
    throw err;
  }
}

/**
 * Answer a liveness probe: one zero-length DATA block #1, no ACK expected.
 */
export async function runPingReply(session: TransferSession): Promise<void> {
  session.block = 1;
  try {
    await session.send(dataPacket(1, new Uint8Array(0)));
    session.transitionTo('done');
  } catch (err) {
    session.transitionTo('aborted');
    throw err;
  }
}
