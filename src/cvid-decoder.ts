// CVID (Cinepak) frame decoder
//
// Decodes raw CVID frames (no container) into a 320x240 BGR555 raster, one
// frame per call. Codebooks persist per strip across frames, so frames must
// be decoded in order.

import {
  CVID_WIDTH,
  CVID_HEIGHT,
  CVID_PIXELS,
  CVID_MAX_STRIPS,
  CVID_FRAME_HEADER_SIZE,
  CVID_STRIP_HEADER_SIZE,
  CVID_FRAME_FLAG_INTRA,
  type CvidStrip,
  type CvidFrame,
  type CvidFrameHeader,
  type CvidFrameInfo,
  type CvidFileStats,
  type CvidDecoderOptions,
  type DecodeStatus,
  DEFAULT_DECODER_OPTIONS,
  DECODE_SUCCESS,
  DECODE_ERROR_EOF,
  DECODE_ERROR_INVALID_DATA,
  DECODE_ERROR_BAD_DIMENSIONS,
  CvidDecodeError,
  createStrip,
  getStatusName,
} from './cvid-types';
import { PayloadCursor } from './payload-cursor';
import { decodeStrip, type StripContext } from './strip-parser';
import { bgr555FramebufferToRgba } from './color-utils';

function readFrameHeader(data: Uint8Array, offset: number): CvidFrameHeader {
  const cursor = new PayloadCursor(data, offset, offset + CVID_FRAME_HEADER_SIZE);
  return {
    flags: cursor.readU8(),
    length: (cursor.readU8() << 16) | cursor.readU16(),
    width: cursor.readU16(),
    height: cursor.readU16(),
    stripCount: cursor.readU16(),
  };
}

export class CvidDecoder {
  private readonly options: Required<CvidDecoderOptions>;
  private data: Uint8Array = new Uint8Array(0);
  private pos = 0;
  private framesDecoded = 0;
  private readonly strips: CvidStrip[] = [];
  private readonly framebuffer = new Uint16Array(CVID_PIXELS);

  constructor(data: Uint8Array, options: CvidDecoderOptions = {}) {
    this.options = { ...DEFAULT_DECODER_OPTIONS, ...options };
    for (let i = 0; i < CVID_MAX_STRIPS; i++) {
      this.strips.push(createStrip());
    }

    if (!this.options.strict) {
      console.warn('[Decoder] Validation disabled: input must be trusted, malformed frames are not detected');
    }

    this.initialize(data);
  }

  /**
   * Bind new input and reset all state: cursor, strip codebooks and raster
   */
  initialize(data: Uint8Array): void {
    this.data = data;
    this.pos = 0;
    this.framesDecoded = 0;

    for (const strip of this.strips) {
      strip.x0 = strip.x1 = strip.y0 = strip.y1 = 0;
      strip.v1.fill(0);
      strip.v4.fill(0);
    }
    this.framebuffer.fill(0);
  }

  /** Byte offset of the next frame */
  get position(): number {
    return this.pos;
  }

  get frameNumber(): number {
    return this.framesDecoded;
  }

  hasNextFrame(): boolean {
    return this.pos < this.data.length;
  }

  private remaining(): number {
    return this.hasNextFrame() ? this.data.length - this.pos : 0;
  }

  /**
   * The current raster, 320x240 packed BGR555, row-major.
   *
   * The view is live: the next `computeFrame()` overwrites it in place.
   */
  getFramebuffer(): ArrayLike<number> {
    return this.framebuffer;
  }

  /**
   * Decode the frame at the cursor into the raster.
   *
   * On failure the cursor is left part-way through the frame and the raster
   * may be partially updated.
   */
  computeFrame(): DecodeStatus {
    const frameStart = this.pos;
    const status = this.decodeFrame();

    if (status === DECODE_SUCCESS) {
      this.framesDecoded++;
    } else if (status !== DECODE_ERROR_EOF) {
      console.warn(`[Decoder] Frame ${this.framesDecoded} at offset ${frameStart} failed: ${getStatusName(status)}`);
    }

    return status;
  }

  private decodeFrame(): DecodeStatus {
    if (!this.hasNextFrame()) return DECODE_ERROR_EOF;

    const { strict, verbose } = this.options;
    if (strict && this.remaining() < CVID_FRAME_HEADER_SIZE) return DECODE_ERROR_INVALID_DATA;

    const frameStart = this.pos;
    const header = readFrameHeader(this.data, frameStart);

    if (strict) {
      if (header.width !== CVID_WIDTH || header.height !== CVID_HEIGHT) return DECODE_ERROR_BAD_DIMENSIONS;
      if (header.length < CVID_FRAME_HEADER_SIZE) return DECODE_ERROR_INVALID_DATA;
    }

    const interCoded = (header.flags & CVID_FRAME_FLAG_INTRA) === 0;

    if (verbose) {
      console.log(`[Decoder] Frame ${this.framesDecoded} at ${frameStart}: length=${header.length}, ${interCoded ? 'inter' : 'intra'}, strips=${header.stripCount}`);
    }

    this.pos += CVID_FRAME_HEADER_SIZE;

    // The strip arena is fixed, so this holds even without validation
    if (header.stripCount > CVID_MAX_STRIPS) return DECODE_ERROR_INVALID_DATA;
    if (header.stripCount === 0) return DECODE_SUCCESS;

    const ctx: StripContext = {
      data: this.data,
      framebuffer: this.framebuffer,
      strips: this.strips,
      interCoded,
      strict,
      verbose,
    };

    for (let i = 0; i < header.stripCount; i++) {
      if (strict && this.remaining() < CVID_STRIP_HEADER_SIZE) return DECODE_ERROR_INVALID_DATA;

      // Strip length includes its header
      const stripLength = (this.data[this.pos + 2] << 8) | this.data[this.pos + 3];
      if (strict) {
        if (stripLength < CVID_STRIP_HEADER_SIZE) return DECODE_ERROR_INVALID_DATA;
        if (this.remaining() < stripLength) return DECODE_ERROR_INVALID_DATA;
      }

      const status = decodeStrip(ctx, i, this.pos, stripLength);
      if (status !== DECODE_SUCCESS) return status;

      this.pos += stripLength;
    }

    if (strict && this.pos !== frameStart + header.length) return DECODE_ERROR_INVALID_DATA;

    return DECODE_SUCCESS;
  }

  /**
   * Decode every remaining frame, yielding RGBA copies.
   * Throws CvidDecodeError on the first frame that fails.
   */
  *decodeFrames(): Generator<CvidFrame> {
    while (this.hasNextFrame()) {
      const offset = this.pos;
      const isKeyframe = (this.data[offset] & CVID_FRAME_FLAG_INTRA) !== 0;
      const status = this.computeFrame();
      if (status !== DECODE_SUCCESS) {
        throw new CvidDecodeError(status, offset);
      }

      yield {
        pixels: bgr555FramebufferToRgba(this.framebuffer, CVID_WIDTH, CVID_HEIGHT),
        frameNumber: this.framesDecoded - 1,
        isKeyframe,
        offset,
        length: this.pos - offset,
      };
    }

    if (this.options.verbose) {
      console.log(`[Decoder] Finished, decoded ${this.framesDecoded} frames`);
    }
  }

  /**
   * Walk the frame headers from the start of the input without decoding.
   * Does not move the decode cursor.
   */
  getFileStats(): CvidFileStats {
    const frames: CvidFrameInfo[] = [];
    const keyframeIndices: number[] = [];
    let truncated = false;
    let offset = 0;

    while (offset < this.data.length) {
      if (this.data.length - offset < CVID_FRAME_HEADER_SIZE) {
        truncated = true;
        break;
      }

      const header = readFrameHeader(this.data, offset);
      if (header.length < CVID_FRAME_HEADER_SIZE || offset + header.length > this.data.length) {
        truncated = true;
        break;
      }

      const isKeyframe = (header.flags & CVID_FRAME_FLAG_INTRA) !== 0;
      if (isKeyframe) {
        keyframeIndices.push(frames.length);
      }

      frames.push({
        offset,
        length: header.length,
        flags: header.flags,
        isKeyframe,
        width: header.width,
        height: header.height,
        stripCount: header.stripCount,
      });

      offset += header.length;
    }

    return {
      fileSize: this.data.length,
      frames,
      keyframeIndices,
      truncated,
    };
  }
}
