// Byte and bit cursors over a region of the input buffer

/**
 * Forward-only big-endian reader over `data[start, end)`.
 *
 * Reads never check bounds; callers that validate do so through
 * `remaining()` before reading.
 */
export class PayloadCursor {
  readonly data: Uint8Array;
  private readonly start: number;
  private readonly end: number;
  private pos: number;

  constructor(data: Uint8Array, start: number, end: number) {
    this.data = data;
    this.start = start;
    this.end = end;
    this.pos = start;
  }

  /** Bytes consumed since `start` */
  get offset(): number {
    return this.pos - this.start;
  }

  get length(): number {
    return this.end - this.start;
  }

  remaining(): number {
    return this.end - this.pos;
  }

  /** Absolute position of the next byte, for indexing `data` directly */
  position(): number {
    return this.pos;
  }

  skip(count: number): void {
    this.pos += count;
  }

  readU8(): number {
    return this.data[this.pos++];
  }

  readU16(): number {
    return (this.readU8() << 8) | this.readU8();
  }

  readU32(): number {
    return ((this.readU8() << 24) | (this.readU8() << 16) | (this.readU8() << 8) | this.readU8()) >>> 0;
  }
}

/**
 * A 32-bit mask consumed most significant bit first.
 *
 * Codebook update masks, V4/V1 selector masks and inter-frame instruction
 * bits all share this shape: a big-endian word is pulled from the payload
 * whenever the previous one has been used up.
 */
export class BitWindow {
  private window = 0;
  private consumed = 0;
  private loaded = false;

  /** True when the next bit needs a fresh word from the payload */
  needsRefill(): boolean {
    return this.consumed % 32 === 0;
  }

  refill(cursor: PayloadCursor): void {
    this.window = cursor.readU32();
    this.loaded = true;
  }

  nextBit(): number {
    const bit = (this.window >>> (31 - (this.consumed % 32))) & 1;
    this.consumed++;
    return bit;
  }

  /** Whether any bit of the current word that has not been consumed is set */
  hasPendingBits(): boolean {
    if (!this.loaded || this.needsRefill()) return false;
    const unread = 32 - (this.consumed % 32);
    return (this.window & (0xffffffff >>> (32 - unread))) !== 0;
  }
}
