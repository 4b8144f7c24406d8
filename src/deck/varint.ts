// Byte cursor + unsigned varint reader.
//
// Varints are little-endian base-128: the low 7 bits of each byte are data,
// the high bit says another byte follows.

import { DeckCodeError, truncated } from "./errors.js";

const DATA_BITS = 0x7f;
const CONTINUE_BIT = 0x80;
const SMALL_MAX = 0xff;

export class ByteCursor {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get offset(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  get atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  seek(offset: number): void {
    if (offset > this.bytes.length) throw truncated(this.bytes.length);
    this.pos = offset;
  }

  readByte(): number {
    const byte = this.bytes[this.pos];
    if (byte === undefined) throw truncated(this.pos);
    this.pos += 1;
    return byte;
  }

  /** Reads a varint that must fit in a safe JS integer. */
  readVarint(): number {
    return this.readBounded(Number.MAX_SAFE_INTEGER);
  }

  /** Reads a varint that must fit in 8 bits (counts, format codes). */
  readSmallVarint(): number {
    return this.readBounded(SMALL_MAX);
  }

  private readBounded(max: number): number {
    const start = this.pos;
    let result = 0;
    let scale = 1;
    for (;;) {
      const byte = this.readByte();
      const data = byte & DATA_BITS;
      if (data !== 0) {
        // Multiplication instead of shifts: bitwise ops truncate to 32 bits.
        if (scale > max || result + data * scale > max) {
          throw new DeckCodeError(
            `Varint at byte ${start} exceeds ${max}.`,
            "Overflow"
          );
        }
        result += data * scale;
      }
      if ((byte & CONTINUE_BIT) === 0) return result;
      // Zero-valued padding bytes may keep coming; stop growing once out of range.
      if (scale <= max) scale *= 128;
    }
  }
}
