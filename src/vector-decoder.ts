// Vector chunks (0x3000, 0x3100, 0x3200): walk a strip in 4x4 cells

import {
  type CvidStrip,
  type DecodeStatus,
  DECODE_SUCCESS,
  DECODE_ERROR_INVALID_DATA,
  DECODE_ERROR_INTERNAL,
} from './cvid-types';
import { PayloadCursor, BitWindow } from './payload-cursor';
import { paintV1, paintV4 } from './block-painter';

// Inter-frame cell instructions, read MSB first
const INSTR_SKIP = 0b0;
const INSTR_V1 = 0b10;
const INSTR_V4 = 0b11;

function paintCellV4(cursor: PayloadCursor, strip: CvidStrip, framebuffer: Uint16Array, x: number, y: number): void {
  paintV4(framebuffer, strip.v4, cursor.data, cursor.position(), x, y);
  cursor.skip(4);
}

function paintCellV1(cursor: PayloadCursor, strip: CvidStrip, framebuffer: Uint16Array, x: number, y: number): void {
  paintV1(framebuffer, strip.v1, cursor.readU8(), x, y);
}

/**
 * Decode intra-coded vectors. In mixed mode a selector word precedes every
 * 32 cells, a set bit choosing V4 (four index bytes) over V1 (one byte).
 * Otherwise every cell is V1.
 */
export function decodeIntraVectors(
  cursor: PayloadCursor,
  strip: CvidStrip,
  framebuffer: Uint16Array,
  mixed: boolean,
  strict: boolean
): DecodeStatus {
  const selector = new BitWindow();

  for (let y = strip.y0; y < strip.y1; y += 4) {
    for (let x = strip.x0; x < strip.x1; x += 4) {
      let v4 = false;
      if (mixed) {
        if (selector.needsRefill()) {
          if (strict && cursor.remaining() < 4) return DECODE_ERROR_INVALID_DATA;
          selector.refill(cursor);
        }
        v4 = selector.nextBit() === 1;
      }

      if (v4) {
        if (strict && cursor.remaining() < 4) return DECODE_ERROR_INVALID_DATA;
        paintCellV4(cursor, strip, framebuffer, x, y);
      } else {
        if (strict && cursor.remaining() < 1) return DECODE_ERROR_INVALID_DATA;
        paintCellV1(cursor, strip, framebuffer, x, y);
      }
    }
  }

  if (strict && cursor.remaining() !== 0) return DECODE_ERROR_INVALID_DATA;

  return DECODE_SUCCESS;
}

/**
 * Decode inter-coded vectors. Each cell starts with a 1 or 2 bit code:
 * `0` leaves the cell alone, `10` paints V1, `11` paints V4. Code bits come
 * from big-endian words interleaved with the index bytes, a new word being
 * read whenever 32 bits have been used.
 */
export function decodeInterVectors(
  cursor: PayloadCursor,
  strip: CvidStrip,
  framebuffer: Uint16Array,
  strict: boolean
): DecodeStatus {
  const instructions = new BitWindow();

  for (let y = strip.y0; y < strip.y1; y += 4) {
    for (let x = strip.x0; x < strip.x1; x += 4) {
      let instr = 0;
      for (let i = 0; i < 2; i++) {
        if (instructions.needsRefill()) {
          if (strict && cursor.remaining() < 4) return DECODE_ERROR_INVALID_DATA;
          instructions.refill(cursor);
        }
        instr = (instr << 1) | instructions.nextBit();
        if (instr === 0) break;
      }

      if (instr === INSTR_SKIP) continue;

      if (instr === INSTR_V4) {
        if (strict && cursor.remaining() < 4) return DECODE_ERROR_INVALID_DATA;
        paintCellV4(cursor, strip, framebuffer, x, y);
      } else if (instr === INSTR_V1) {
        if (strict && cursor.remaining() < 1) return DECODE_ERROR_INVALID_DATA;
        paintCellV1(cursor, strip, framebuffer, x, y);
      } else if (strict) {
        return DECODE_ERROR_INTERNAL;
      }
    }
  }

  if (strict && cursor.remaining() !== 0) return DECODE_ERROR_INVALID_DATA;

  return DECODE_SUCCESS;
}
