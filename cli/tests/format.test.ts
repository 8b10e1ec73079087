import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatSpeed,
  formatEta,
  formatDuration,
  formatBlocks,
  formatTransferSize,
  blocksForSize,
  pluralize,
} from '../src/lib/format.js';

describe('formatBytes', () => {
  it('formats zero bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
  });

  it('formats bytes', () => {
    expect(formatBytes(512)).toBe('512 B');
  });

  it('formats kilobytes', () => {
    expect(formatBytes(1024)).toBe('1.00 KB');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(153_600)).toBe('150 KB');
  });

  it('formats the largest transferable file', () => {
    expect(formatBytes(33553919)).toBe('32.0 MB');
  });
});

describe('formatSpeed', () => {
  it('appends per-second suffix', () => {
    expect(formatSpeed(2048)).toBe('2.00 KB/s');
  });
});

describe('formatEta', () => {
  it('formats seconds', () => {
    expect(formatEta(5)).toBe('0:05');
    expect(formatEta(4.2)).toBe('0:05');
  });

  it('formats minutes and hours', () => {
    expect(formatEta(125)).toBe('2:05');
    expect(formatEta(3725)).toBe('1:02:05');
  });

  it('handles unknown values', () => {
    expect(formatEta(Infinity)).toBe('--:--');
    expect(formatEta(-1)).toBe('--:--');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds', () => {
    expect(formatDuration(250)).toBe('250ms');
  });

  it('formats seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
  });

  it('formats minutes', () => {
    expect(formatDuration(90_000)).toBe('1m 30s');
  });

  it('formats hours', () => {
    expect(formatDuration(3_900_000)).toBe('1h 5m');
  });
});

describe('formatBlocks', () => {
  it('pluralizes block counts', () => {
    expect(formatBlocks(1)).toBe('1 block');
    expect(formatBlocks(3)).toBe('3 blocks');
  });
});

describe('blocksForSize', () => {
  it('counts the trailing short or empty block', () => {
    expect(blocksForSize(0)).toBe(1);
    expect(blocksForSize(511)).toBe(1);
    expect(blocksForSize(512)).toBe(2);
    expect(blocksForSize(1000)).toBe(2);
    expect(blocksForSize(1536)).toBe(4);
  });
});

describe('formatTransferSize', () => {
  it('shows bytes and DATA blocks', () => {
    expect(formatTransferSize(100)).toBe('100 B, 1 block');
    expect(formatTransferSize(1536)).toBe('1.50 KB, 4 blocks');
  });
});

describe('pluralize', () => {
  it('uses a custom plural', () => {
    expect(pluralize(2, 'entry', 'entries')).toBe('entries');
    expect(pluralize(1, 'entry', 'entries')).toBe('entry');
  });
});
