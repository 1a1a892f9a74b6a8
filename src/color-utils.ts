// Color conversion utilities for CVID
// Codebooks store colors as packed BGR555: blue in bits 10-14, green 5-9, red 0-4

export interface RGB {
  r: number;
  g: number;
  b: number;
}

function clampByte(value: number): number {
  return value < 0 ? 0 : value > 255 ? 255 : value;
}

/**
 * Reinterpret an unsigned byte as a two's complement value (-128..127)
 */
export function toSignedByte(byte: number): number {
  return (byte << 24) >> 24;
}

/**
 * Convert CVID YUV to packed BGR555
 *
 * Chroma is signed and centered at zero:
 * R = Y + 2V
 * G = Y - U/2 - V
 * B = Y + 2U
 */
export function yuvToBgr555(y: number, u = 0, v = 0): number {
  const r = clampByte(y + v * 2);
  const g = clampByte(y - Math.trunc(u / 2) - v);
  const b = clampByte(y + u * 2);

  return ((b >> 3) << 10) | ((g >> 3) << 5) | (r >> 3);
}

/**
 * Expand a packed BGR555 color to 8 bits per channel (low bits zero)
 */
export function bgr555ToRgb(color: number): RGB {
  return {
    r: (color & 0x1f) << 3,
    g: ((color >> 5) & 0x1f) << 3,
    b: ((color >> 10) & 0x1f) << 3,
  };
}

/**
 * Convert a BGR555 raster to an RGBA frame
 */
export function bgr555FramebufferToRgba(
  framebuffer: ArrayLike<number>,
  width: number,
  height: number
): Uint8ClampedArray {
  const size = width * height;
  const pixels = new Uint8ClampedArray(size * 4);

  for (let i = 0; i < size; i++) {
    const rgb = bgr555ToRgb(framebuffer[i]);

    const outIdx = i * 4;
    pixels[outIdx] = rgb.r;
    pixels[outIdx + 1] = rgb.g;
    pixels[outIdx + 2] = rgb.b;
    pixels[outIdx + 3] = 255;
  }

  return pixels;
}
