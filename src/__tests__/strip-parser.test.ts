import { describe, it, expect } from 'vitest';
import { decodeStrip, type StripContext } from '../strip-parser';
import { yuvToBgr555 } from '../color-utils';
import {
  CVID_PIXELS,
  DECODE_SUCCESS,
  DECODE_ERROR_INVALID_DATA,
  DECODE_ERROR_INTERNAL,
  createStrip,
  type DecodeStatus,
} from '../cvid-types';
import { at, chunk, strip, u16, type StripSpec } from './cvid-builder';

const GREY = yuvToBgr555(128);
const DARK = yuvToBgr555(64);

function context(interCoded = false): StripContext {
  return {
    data: new Uint8Array(0),
    framebuffer: new Uint16Array(CVID_PIXELS),
    strips: [createStrip(), createStrip()],
    interCoded,
    strict: true,
    verbose: false,
  };
}

function run(ctx: StripContext, index: number, spec: StripSpec, length?: number): DecodeStatus {
  ctx.data = Uint8Array.from(strip(spec));
  return decodeStrip(ctx, index, 0, length ?? (ctx.data[2] << 8) | ctx.data[3]);
}

// V1 entry 0 = flat luma, then two V1 cells with entry 0
function flatChunks(luma: number): number[][] {
  return [chunk(0x2200, [luma, luma, luma, luma, 0, 0]), chunk(0x3200, [0, 0])];
}

describe('StripParser: header', () => {
  it('decodes chunks inside absolute bounds', () => {
    const ctx = context();
    const status = run(ctx, 0, { top: 4, left: 8, bottom: 8, right: 16, chunks: flatChunks(128) });

    expect(status).toBe(DECODE_SUCCESS);
    expect(ctx.strips[0]).toMatchObject({ x0: 8, x1: 16, y0: 4, y1: 8 });
    expect(ctx.framebuffer[at(8, 4)]).toBe(GREY);
    expect(ctx.framebuffer[at(15, 7)]).toBe(GREY);
    expect(ctx.framebuffer[at(16, 4)]).toBe(0);
  });

  it('rejects bounds off the 4-pixel grid', () => {
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 10 })).toBe(DECODE_ERROR_INVALID_DATA);
    expect(run(context(), 0, { top: 2, left: 0, bottom: 4, right: 8 })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('rejects bounds outside the raster', () => {
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 324 })).toBe(DECODE_ERROR_INVALID_DATA);
    expect(run(context(), 0, { top: 0, left: 0, bottom: 244, right: 320 })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('rejects empty strips', () => {
    expect(run(context(), 0, { top: 4, left: 0, bottom: 4, right: 8 })).toBe(DECODE_ERROR_INVALID_DATA);
    expect(run(context(), 0, { top: 0, left: 8, bottom: 4, right: 8 })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('rejects unknown strip tags', () => {
    expect(run(context(), 0, { tag: 0x1200, top: 0, left: 0, bottom: 4, right: 8 })).toBe(DECODE_ERROR_INVALID_DATA);
    expect(run(context(), 0, { tag: 0x1100, top: 0, left: 0, bottom: 4, right: 8 })).toBe(DECODE_SUCCESS);
  });

  it('treats a length disagreeing with the header as a decoder fault', () => {
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 8 }, 16)).toBe(DECODE_ERROR_INTERNAL);
  });
});

describe('StripParser: continuation and carry-over', () => {
  it('places a zero-top strip below the previous one', () => {
    const ctx = context();
    ctx.strips[0].y1 = 8;
    const status = run(ctx, 1, { top: 0, left: 0, bottom: 4, right: 8, chunks: flatChunks(128) });

    expect(status).toBe(DECODE_SUCCESS);
    expect(ctx.strips[1]).toMatchObject({ y0: 8, y1: 12 });
    expect(ctx.framebuffer[at(0, 8)]).toBe(GREY);
    expect(ctx.framebuffer[at(0, 7)]).toBe(0);
  });

  it('keeps a zero top absolute for the first strip', () => {
    const ctx = context();
    expect(run(ctx, 0, { top: 0, left: 0, bottom: 4, right: 8 })).toBe(DECODE_SUCCESS);
    expect(ctx.strips[0]).toMatchObject({ y0: 0, y1: 4 });
  });

  it('rejects a continued strip that runs off the raster', () => {
    const ctx = context();
    ctx.strips[0].y1 = 240;
    expect(run(ctx, 1, { top: 0, left: 0, bottom: 4, right: 8 })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('copies the previous codebooks in inter-coded frames', () => {
    const ctx = context(true);
    ctx.strips[0].v1.fill(DARK);
    ctx.strips[0].v4.fill(GREY);
    const status = run(ctx, 1, { top: 0, left: 0, bottom: 4, right: 8, chunks: [chunk(0x3200, [9, 9])] });

    expect(status).toBe(DECODE_SUCCESS);
    expect(ctx.strips[1].v4[1023]).toBe(GREY);
    expect(ctx.framebuffer[at(4, 0)]).toBe(DARK);
  });

  it('keeps its own codebooks in intra-coded frames', () => {
    const ctx = context(false);
    ctx.strips[0].v1.fill(DARK);
    ctx.strips[1].v1.fill(GREY);
    const status = run(ctx, 1, { top: 0, left: 0, bottom: 4, right: 8, chunks: [chunk(0x3200, [9, 9])] });

    expect(status).toBe(DECODE_SUCCESS);
    expect(ctx.framebuffer[at(4, 0)]).toBe(GREY);
  });
});

describe('StripParser: chunks', () => {
  it('rejects unknown chunk tags', () => {
    for (const tag of [0x2800, 0x3300, 0x1000, 0x2001]) {
      expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 8, chunks: [chunk(tag, [])] })).toBe(DECODE_ERROR_INVALID_DATA);
    }
  });

  it('rejects chunk lengths shorter than the chunk header', () => {
    const chunks = [[...u16(0x3200), ...u16(3), 0, 0]];
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 8, chunks })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('rejects chunks that overrun the strip', () => {
    const chunks = [chunk(0x3200, [0, 0], 7)];
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 8, chunks })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('rejects a partial chunk header', () => {
    const chunks = [[0x32, 0x00]];
    expect(run(context(), 0, { top: 0, left: 0, bottom: 4, right: 8, chunks })).toBe(DECODE_ERROR_INVALID_DATA);
  });

  it('applies codebook chunks to the table named by the tag', () => {
    const ctx = context();
    const chunks = [
      chunk(0x2400, [255, 255, 255, 255]),     // V4, 8bpp
      chunk(0x2600, [64, 64, 64, 64]),         // V1, 8bpp
      chunk(0x2100, [...u16(0), ...u16(0)]),   // V4, 12bpp, selective: nothing replaced
    ];
    expect(run(ctx, 0, { top: 0, left: 0, bottom: 4, right: 8, chunks })).toBe(DECODE_SUCCESS);
    expect(Array.from(ctx.strips[0].v4.subarray(0, 4))).toEqual([0x7fff, 0x7fff, 0x7fff, 0x7fff]);
    expect(Array.from(ctx.strips[0].v1.subarray(0, 4))).toEqual([DARK, DARK, DARK, DARK]);
  });
});
