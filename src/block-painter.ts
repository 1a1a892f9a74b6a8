// Paint 4x4 blocks from codebook entries onto the raster

import { CVID_WIDTH } from './cvid-types';

/**
 * Paint four V4 entries, one per 2x2 quadrant, in the order top-left,
 * top-right, bottom-left, bottom-right. `indices` holds four entry indices
 * starting at `at`.
 */
export function paintV4(
  framebuffer: Uint16Array,
  codebook: Uint16Array,
  indices: Uint8Array,
  at: number,
  x: number,
  y: number
): void {
  for (let quadrant = 0; quadrant < 4; quadrant++) {
    const slot = indices[at + quadrant] * 4;
    const qx = x + (quadrant & 1) * 2;
    const qy = y + (quadrant >> 1) * 2;
    const top = qy * CVID_WIDTH + qx;
    const bottom = top + CVID_WIDTH;

    framebuffer[top] = codebook[slot];
    framebuffer[top + 1] = codebook[slot + 1];
    framebuffer[bottom] = codebook[slot + 2];
    framebuffer[bottom + 1] = codebook[slot + 3];
  }
}

/**
 * Paint one V1 entry as a flat 4x4 block using its first color
 */
export function paintV1(
  framebuffer: Uint16Array,
  codebook: Uint16Array,
  index: number,
  x: number,
  y: number
): void {
  const color = codebook[index * 4];
  for (let row = 0; row < 4; row++) {
    const start = (y + row) * CVID_WIDTH + x;
    framebuffer.fill(color, start, start + 4);
  }
}
