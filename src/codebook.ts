// Codebook updates (chunks 0x2000 - 0x2700)

import {
  CVID_MAX_ENTRIES,
  type DecodeStatus,
  DECODE_SUCCESS,
  DECODE_ERROR_INVALID_DATA,
} from './cvid-types';
import { PayloadCursor, BitWindow } from './payload-cursor';
import { toSignedByte, yuvToBgr555 } from './color-utils';

export interface CodebookUpdate {
  bpp12: boolean;      // 4 luma + 2 chroma bytes per entry, else 4 luma bytes
  selective: boolean;  // entries gated by a 32-bit mask every 32 entries
}

/**
 * Decode a codebook chunk payload into `codebook`, starting at entry 0.
 *
 * In selective mode an entry whose mask bit is clear keeps its previous
 * colors and takes no payload bytes.
 */
export function decodeCodebook(
  cursor: PayloadCursor,
  codebook: Uint16Array,
  update: CodebookUpdate,
  strict: boolean
): DecodeStatus {
  const { bpp12, selective } = update;
  const entrySize = bpp12 ? 6 : 4;
  const mask = new BitWindow();
  let entry = 0;

  while (cursor.remaining() > 0) {
    if (strict && entry >= CVID_MAX_ENTRIES) return DECODE_ERROR_INVALID_DATA;

    if (selective) {
      if (mask.needsRefill()) {
        if (strict && cursor.remaining() < 4) return DECODE_ERROR_INVALID_DATA;
        mask.refill(cursor);
      }
      if (mask.nextBit() === 0) {
        entry++;
        continue;
      }
    }

    if (strict && cursor.remaining() < entrySize) return DECODE_ERROR_INVALID_DATA;

    const y0 = cursor.readU8();
    const y1 = cursor.readU8();
    const y2 = cursor.readU8();
    const y3 = cursor.readU8();
    let u = 0;
    let v = 0;
    if (bpp12) {
      u = toSignedByte(cursor.readU8());
      v = toSignedByte(cursor.readU8());
    }

    const slot = entry * 4;
    codebook[slot] = yuvToBgr555(y0, u, v);
    codebook[slot + 1] = yuvToBgr555(y1, u, v);
    codebook[slot + 2] = yuvToBgr555(y2, u, v);
    codebook[slot + 3] = yuvToBgr555(y3, u, v);
    entry++;
  }

  // A set bit past the last entry means the payload was cut short
  if (strict && selective && mask.hasPendingBits()) return DECODE_ERROR_INVALID_DATA;

  return DECODE_SUCCESS;
}
