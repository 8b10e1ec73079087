import { describe, it, expect } from 'vitest';
import { crc8, Crc8 } from '../src/protocol/crc8.js';
import { patternBytes } from './helpers/memory-store.js';

const ascii = (text: string) => new TextEncoder().encode(text);

describe('crc8', () => {
  it('returns 0 for empty input', () => {
    expect(crc8(new Uint8Array(0))).toBe(0);
  });

  it('matches the standard check value', () => {
    expect(crc8(ascii('123456789'))).toBe(0xf4);
  });

  it('reduces a single set bit by the polynomial', () => {
    expect(crc8(Uint8Array.of(0x01))).toBe(0x07);
    expect(crc8(Uint8Array.of(0x00))).toBe(0x00);
  });

  it('detects every single-bit flip', () => {
    const payload = patternBytes(64);
    const reference = crc8(payload);

    for (let bit = 0; bit < payload.length * 8; bit++) {
      const flipped = Uint8Array.from(payload);
      flipped[bit >> 3] ^= 1 << (bit & 7);
      expect(crc8(flipped)).not.toBe(reference);
    }
  });
});

describe('Crc8', () => {
  it('matches the one-shot result across slices', () => {
    const data = patternBytes(1000);
    const crc = new Crc8().update(data.subarray(0, 3)).update(data.subarray(3, 700)).update(data.subarray(700));
    expect(crc.finalize()).toBe(crc8(data));
  });

  it('starts over after reset', () => {
    const crc = new Crc8().update(ascii('garbage'));
    crc.reset();
    expect(crc.update(ascii('123456789')).finalize()).toBe(0xf4);
  });
});
