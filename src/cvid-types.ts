// CVID (Cinepak) bitstream types and constants

// Only one frame size is supported
export const CVID_WIDTH = 320;
export const CVID_HEIGHT = 240;
export const CVID_PIXELS = CVID_WIDTH * CVID_HEIGHT;

// One index byte per vector, so at most 256 entries per codebook
export const CVID_MAX_ENTRIES = 256;
export const CVID_MAX_STRIPS = 32;

// Header sizes (bytes)
export const CVID_FRAME_HEADER_SIZE = 10;
export const CVID_STRIP_HEADER_SIZE = 12;
export const CVID_CHUNK_HEADER_SIZE = 4;

// Frame flags
export const CVID_FRAME_FLAG_INTRA = 0x01; // bit 0 clear: inter-coded

// Strip tags
export const CVID_STRIP_INTRA = 0x1000;
export const CVID_STRIP_INTER = 0x1100;

// Codebook chunk tags (0x2000 base plus flag bits)
export const CVID_CHUNK_CODEBOOK_BASE = 0x2000;
export const CVID_CHUNK_FLAG_SELECTIVE = 0x0100;
export const CVID_CHUNK_FLAG_V1 = 0x0200;
export const CVID_CHUNK_FLAG_8BPP = 0x0400;

// Vector chunk tags
export const CVID_CHUNK_INTRA_MIXED = 0x3000;
export const CVID_CHUNK_INTER = 0x3100;
export const CVID_CHUNK_INTRA_V1 = 0x3200;

// Decode status
export const DECODE_SUCCESS = 0;
export const DECODE_ERROR_EOF = 1;
export const DECODE_ERROR_INVALID_DATA = 2;
export const DECODE_ERROR_BAD_DIMENSIONS = 3;
export const DECODE_ERROR_INTERNAL = 4;

export type DecodeStatus =
  | typeof DECODE_SUCCESS
  | typeof DECODE_ERROR_EOF
  | typeof DECODE_ERROR_INVALID_DATA
  | typeof DECODE_ERROR_BAD_DIMENSIONS
  | typeof DECODE_ERROR_INTERNAL;

/**
 * State for one horizontal band of the frame.
 *
 * Codebooks are flat tables of four packed colors per entry: entry `i`
 * occupies slots `4 * i` to `4 * i + 3`. Strips live in a fixed arena on the
 * decoder and keep their codebooks across frames.
 */
export interface CvidStrip {
  x0: number;  // left (inclusive)
  x1: number;  // right (exclusive)
  y0: number;  // top (inclusive)
  y1: number;  // bottom (exclusive)
  v4: Uint16Array;
  v1: Uint16Array;
}

export function createStrip(): CvidStrip {
  return {
    x0: 0,
    x1: 0,
    y0: 0,
    y1: 0,
    v4: new Uint16Array(CVID_MAX_ENTRIES * 4),
    v1: new Uint16Array(CVID_MAX_ENTRIES * 4),
  };
}

export interface CvidFrameHeader {
  flags: number;
  length: number;      // includes the header
  width: number;
  height: number;
  stripCount: number;
}

export interface CvidDecoderOptions {
  /**
   * Validate every length, tag and bound before trusting it. Turning this
   * off is only sound for input that was already checked by a strict decode;
   * malformed input then yields garbage frames or never-ending loops instead
   * of an error status.
   */
  strict?: boolean;
  verbose?: boolean;
}

export const DEFAULT_DECODER_OPTIONS: Required<CvidDecoderOptions> = {
  strict: true,
  verbose: false,
};

// Decoded frame
export interface CvidFrame {
  pixels: Uint8ClampedArray;  // RGBA data
  frameNumber: number;
  isKeyframe: boolean;
  offset: number;
  length: number;
}

export interface CvidFrameInfo {
  offset: number;
  length: number;
  flags: number;
  isKeyframe: boolean;
  width: number;
  height: number;
  stripCount: number;
}

// File statistics, from frame headers only
export interface CvidFileStats {
  fileSize: number;
  frames: CvidFrameInfo[];
  keyframeIndices: number[];
  truncated: boolean;
}

export class CvidDecodeError extends Error {
  readonly status: DecodeStatus;
  readonly offset: number;

  constructor(status: DecodeStatus, offset: number) {
    super(`CVID decode failed with ${getStatusName(status)} at offset ${offset}`);
    this.name = 'CvidDecodeError';
    this.status = status;
    this.offset = offset;
  }
}

export function getStatusName(status: DecodeStatus): string {
  switch (status) {
    case DECODE_SUCCESS: return 'SUCCESS';
    case DECODE_ERROR_EOF: return 'EOF';
    case DECODE_ERROR_INVALID_DATA: return 'INVALID_DATA';
    case DECODE_ERROR_BAD_DIMENSIONS: return 'BAD_DIMENSIONS';
    case DECODE_ERROR_INTERNAL: return 'INTERNAL';
  }
}

export function isCodebookTag(tag: number): boolean {
  return (tag & 0xf8ff) === CVID_CHUNK_CODEBOOK_BASE;
}

export function getChunkTagName(tag: number): string {
  if (isCodebookTag(tag)) {
    const table = tag & CVID_CHUNK_FLAG_V1 ? 'V1' : 'V4';
    const depth = tag & CVID_CHUNK_FLAG_8BPP ? '8BPP' : '12BPP';
    const mode = tag & CVID_CHUNK_FLAG_SELECTIVE ? '_SELECTIVE' : '';
    return `${table}_CODEBOOK_${depth}${mode}`;
  }
  switch (tag) {
    case CVID_CHUNK_INTRA_MIXED: return 'INTRA_VECTORS_MIXED';
    case CVID_CHUNK_INTER: return 'INTER_VECTORS';
    case CVID_CHUNK_INTRA_V1: return 'INTRA_VECTORS_V1';
    default: return `UNKNOWN(0x${tag.toString(16).padStart(4, '0')})`;
  }
}
