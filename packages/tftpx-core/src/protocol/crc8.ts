const POLYNOMIAL = 0x07;

function crc8Update(crc: number, byte: number): number {
  crc ^= byte & 0xff;
  for (let i = 0; i < 8; i++) {
    crc = (crc & 0x80) !== 0 ? ((crc << 1) ^ POLYNOMIAL) & 0xff : (crc << 1) & 0xff;
  }
  return crc;
}

/**
 * CRC-8 (polynomial 0x07, seed 0, no reflection, no final XOR).
 * Applied to DATA payloads only, never to the opcode/block header.
 */
export function crc8(data: Uint8Array): number {
  let crc = 0;
  for (let i = 0; i < data.length; i++) {
    crc = crc8Update(crc, data[i]);
  }
  return crc;
}

/**
 * Incremental CRC-8 over several slices.
 */
export class Crc8 {
  private crc = 0;

  update(data: Uint8Array): this {
    for (const byte of data) {
      this.crc = crc8Update(this.crc, byte);
    }
    return this;
  }

  reset(): void {
    this.crc = 0;
  }

  finalize(): number {
    return this.crc;
  }
}
