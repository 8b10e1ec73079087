import { BLOCK_SIZE } from '@tftpx/core';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/** Binary units; three significant digits above 1 KB. */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  if (unit === 0) return `${Math.round(value)} B`;
  const digits = value < 10 ? 2 : value < 100 ? 1 : 0;
  return `${value.toFixed(digits)} ${BYTE_UNITS[unit]}`;
}

export function formatSpeed(bytesPerSec: number): string {
  return `${formatBytes(bytesPerSec)}/s`;
}

/** DATA blocks needed for a file of `bytes`, counting the trailing short or empty block. */
export function blocksForSize(bytes: number): number {
  return Math.floor(bytes / BLOCK_SIZE) + 1;
}

/** "1.50 KB, 4 blocks". */
export function formatTransferSize(bytes: number): string {
  return `${formatBytes(bytes)}, ${formatBlocks(blocksForSize(bytes))}`;
}

/** "3 blocks", "1 block". */
export function formatBlocks(count: number): string {
  return `${count} ${pluralize(count, 'block')}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Clock-style remaining time, `m:ss` or `h:mm:ss`. */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return '--:--';
  const total = Math.ceil(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor(total / 60) % 60;
  const s = total % 60;
  return h > 0 ? `${h}:${pad2(m)}:${pad2(s)}` : `${m}:${pad2(s)}`;
}

/** Elapsed time for summaries and ping round trips. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  if (minutes < 60) return `${minutes}m ${totalSeconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural ?? `${singular}s`);
}
