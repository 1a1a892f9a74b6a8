// Strip decoding: header, coordinate continuation, codebook carry-over, chunks

import {
  CVID_WIDTH,
  CVID_HEIGHT,
  CVID_STRIP_HEADER_SIZE,
  CVID_CHUNK_HEADER_SIZE,
  CVID_STRIP_INTRA,
  CVID_STRIP_INTER,
  CVID_CHUNK_FLAG_SELECTIVE,
  CVID_CHUNK_FLAG_V1,
  CVID_CHUNK_FLAG_8BPP,
  CVID_CHUNK_INTRA_MIXED,
  CVID_CHUNK_INTRA_V1,
  CVID_CHUNK_INTER,
  type CvidStrip,
  type DecodeStatus,
  DECODE_SUCCESS,
  DECODE_ERROR_INVALID_DATA,
  DECODE_ERROR_INTERNAL,
  getChunkTagName,
  isCodebookTag,
} from './cvid-types';
import { PayloadCursor } from './payload-cursor';
import { decodeCodebook } from './codebook';
import { decodeInterVectors, decodeIntraVectors } from './vector-decoder';

export interface StripContext {
  data: Uint8Array;
  framebuffer: Uint16Array;
  strips: CvidStrip[];
  interCoded: boolean;
  strict: boolean;
  verbose: boolean;
}

function boundsValid(strip: CvidStrip): boolean {
  if (strip.x1 > CVID_WIDTH || strip.y1 > CVID_HEIGHT) return false;
  if (strip.x0 % 4 !== 0 || strip.x1 % 4 !== 0 || strip.y0 % 4 !== 0 || strip.y1 % 4 !== 0) return false;
  return strip.x0 < strip.x1 && strip.y0 < strip.y1;
}

/**
 * Decode strip `index` of the current frame from `data[start, start + length)`.
 * The previous strip is `strips[index - 1]`; the first strip has none.
 */
export function decodeStrip(ctx: StripContext, index: number, start: number, length: number): DecodeStatus {
  const { data, framebuffer, strict } = ctx;
  const strip = ctx.strips[index];
  const previous = index > 0 ? ctx.strips[index - 1] : undefined;

  const header = new PayloadCursor(data, start, start + length);
  const tag = header.readU16();
  const declaredLength = header.readU16();
  // Wire order is top, left, bottom, right
  strip.y0 = header.readU16();
  strip.x0 = header.readU16();
  strip.y1 = header.readU16();
  strip.x1 = header.readU16();

  if (strict) {
    if (!boundsValid(strip)) return DECODE_ERROR_INVALID_DATA;
    // The tag carries no meaning for decoding; any chunk may appear in either kind
    if (tag !== CVID_STRIP_INTRA && tag !== CVID_STRIP_INTER) return DECODE_ERROR_INVALID_DATA;
    // The frame parser read this same field
    if (declaredLength !== length) return DECODE_ERROR_INTERNAL;
  }

  // A zero top continues below the previous strip, bottom then being a height
  if (strip.y0 === 0 && previous) {
    strip.y0 = previous.y1;
    strip.y1 = previous.y1 + strip.y1;
    if (strict && strip.y1 > CVID_HEIGHT) return DECODE_ERROR_INVALID_DATA;
  }

  if (ctx.interCoded && previous) {
    strip.v1.set(previous.v1);
    strip.v4.set(previous.v4);
  }

  if (ctx.verbose) {
    console.log(`[Decoder] Strip ${index}: tag=0x${tag.toString(16)}, x=${strip.x0}..${strip.x1}, y=${strip.y0}..${strip.y1}, length=${length}`);
  }

  let chunkIndex = CVID_STRIP_HEADER_SIZE;
  while (chunkIndex !== length) {
    if (strict && chunkIndex + CVID_CHUNK_HEADER_SIZE > length) return DECODE_ERROR_INVALID_DATA;

    const chunkStart = start + chunkIndex;
    const chunkHeader = new PayloadCursor(data, chunkStart, chunkStart + CVID_CHUNK_HEADER_SIZE);
    const chunkTag = chunkHeader.readU16();
    const chunkLength = chunkHeader.readU16();

    if (strict) {
      if (chunkLength < CVID_CHUNK_HEADER_SIZE) return DECODE_ERROR_INVALID_DATA;
      if (chunkIndex + chunkLength > length) return DECODE_ERROR_INVALID_DATA;
    }

    if (ctx.verbose) {
      console.log(`[Decoder]   Chunk at ${chunkStart}: ${getChunkTagName(chunkTag)}, length=${chunkLength}`);
    }

    const payload = new PayloadCursor(data, chunkStart + CVID_CHUNK_HEADER_SIZE, chunkStart + chunkLength);
    let status: DecodeStatus;

    if (isCodebookTag(chunkTag)) {
      const codebook = chunkTag & CVID_CHUNK_FLAG_V1 ? strip.v1 : strip.v4;
      status = decodeCodebook(payload, codebook, {
        bpp12: (chunkTag & CVID_CHUNK_FLAG_8BPP) === 0,
        selective: (chunkTag & CVID_CHUNK_FLAG_SELECTIVE) !== 0,
      }, strict);
    } else if (chunkTag === CVID_CHUNK_INTRA_MIXED || chunkTag === CVID_CHUNK_INTRA_V1) {
      const mixed = (chunkTag & CVID_CHUNK_FLAG_V1) === 0;
      status = decodeIntraVectors(payload, strip, framebuffer, mixed, strict);
    } else if (chunkTag === CVID_CHUNK_INTER) {
      status = decodeInterVectors(payload, strip, framebuffer, strict);
    } else {
      status = DECODE_ERROR_INVALID_DATA;
    }

    if (status !== DECODE_SUCCESS) return status;

    chunkIndex += chunkLength;
  }

  return DECODE_SUCCESS;
}
