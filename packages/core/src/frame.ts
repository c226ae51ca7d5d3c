/**
 * Frame buffer operations
 *
 * Frame format:
 * - RGB (3 bytes per pixel), row-major, no padding
 * - A 240x240 panel at 2x supersampling is 480 * 480 * 3 = 691,200 bytes
 */

import type { Frame, Rect, RGB } from "./types.js";

/** Bytes per pixel (RGB) */
export const BYTES_PER_PIXEL = 3;

/** Byte offset of (x, y), or null when the pixel is outside the frame */
export function pixelOffset(frame: Frame, x: number, y: number): number | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) return null;
  return (y * frame.width + x) * BYTES_PER_PIXEL;
}

function writeRgb(pixels: Uint8Array, offset: number, color: RGB): void {
  pixels[offset] = color.r;
  pixels[offset + 1] = color.g;
  pixels[offset + 2] = color.b;
}

function copyRgb(from: Uint8Array, src: number, to: Uint8Array, dst: number): void {
  to.set(from.subarray(src, src + BYTES_PER_PIXEL), dst);
}

/** The whole frame as a rect */
export function frameRect(frame: Frame): Rect {
  return { x1: 0, y1: 0, x2: frame.width, y2: frame.height };
}

/** `rect` clipped to the frame; empty intersections have x2 <= x1 or y2 <= y1 */
export function clipRect(frame: Frame, rect: Rect): Rect {
  return {
    x1: Math.max(0, rect.x1),
    y1: Math.max(0, rect.y1),
    x2: Math.min(frame.width, rect.x2),
    y2: Math.min(frame.height, rect.y2),
  };
}

/**
 * Fill a rect, clipped to the frame. The first row is written pixel by
 * pixel and copied down to the others.
 */
export function fillRect(frame: Frame, rect: Rect, color: RGB): void {
  const { x1, y1, x2, y2 } = clipRect(frame, rect);
  if (x2 <= x1 || y2 <= y1) return;
  const stride = frame.width * BYTES_PER_PIXEL;
  const first = y1 * stride + x1 * BYTES_PER_PIXEL;
  const rowBytes = (x2 - x1) * BYTES_PER_PIXEL;
  for (let o = first; o < first + rowBytes; o += BYTES_PER_PIXEL) writeRgb(frame.pixels, o, color);
  for (let y = y1 + 1; y < y2; y++) {
    frame.pixels.copyWithin(y * stride + x1 * BYTES_PER_PIXEL, first, first + rowBytes);
  }
}

/**
 * A new frame of one color
 */
export function createSolidFrame(width: number, height: number, color: RGB = { r: 0, g: 0, b: 0 }): Frame {
  const frame: Frame = { width, height, pixels: new Uint8Array(width * height * BYTES_PER_PIXEL) };
  if (color.r !== 0 || color.g !== 0 || color.b !== 0) fillRect(frame, frameRect(frame), color);
  return frame;
}

/** Write one pixel; writes outside the frame are dropped */
export function setPixel(frame: Frame, x: number, y: number, color: RGB): void {
  const offset = pixelOffset(frame, x, y);
  if (offset !== null) writeRgb(frame.pixels, offset, color);
}

export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  const offset = pixelOffset(frame, x, y);
  if (offset === null) return null;
  return { r: frame.pixels[offset], g: frame.pixels[offset + 1], b: frame.pixels[offset + 2] };
}

/**
 * Fill the horizontal run [x1, x2) of row y, clipped to the frame
 */
export function fillSpan(frame: Frame, y: number, x1: number, x2: number, color: RGB): void {
  fillRect(frame, { x1, y1: y, x2, y2: y + 1 }, color);
}

/**
 * Copy `source` onto `target` with its top-left corner at (dx, dy).
 * Pixels falling outside the target are dropped.
 */
export function blitFrame(
  target: Frame,
  source: Frame,
  dx: number,
  dy: number
): void {
  const x1 = Math.max(0, dx);
  const x2 = Math.min(target.width, dx + source.width);
  if (x2 <= x1) return;
  const rowBytes = (x2 - x1) * BYTES_PER_PIXEL;

  for (let sy = 0; sy < source.height; sy++) {
    const ty = dy + sy;
    if (ty < 0 || ty >= target.height) continue;
    const srcStart = (sy * source.width + (x1 - dx)) * BYTES_PER_PIXEL;
    const dstStart = (ty * target.width + x1) * BYTES_PER_PIXEL;
    target.pixels.set(
      source.pixels.subarray(srcStart, srcStart + rowBytes),
      dstStart
    );
  }
}

/**
 * Copy a rectangular region out of a frame. The region is clipped to the
 * frame; an empty intersection yields a 0x0 frame.
 */
export function cropFrame(frame: Frame, rect: Rect): Frame {
  const { x1, y1, x2, y2 } = clipRect(frame, rect);
  const width = Math.max(0, x2 - x1);
  const height = Math.max(0, y2 - y1);
  const out = createSolidFrame(width, height);
  for (let y = 0; y < height; y++) {
    const srcStart = ((y1 + y) * frame.width + x1) * BYTES_PER_PIXEL;
    out.pixels.set(
      frame.pixels.subarray(srcStart, srcStart + width * BYTES_PER_PIXEL),
      y * width * BYTES_PER_PIXEL
    );
  }
  return out;
}

/**
 * Reduce a frame by an integer factor, averaging each factor x factor block
 * (box filter). Trailing rows/columns that do not fill a block are dropped.
 */
export function downscaleFrame(frame: Frame, factor: number): Frame {
  if (factor <= 1) {
    return { width: frame.width, height: frame.height, pixels: frame.pixels.slice() };
  }
  const width = Math.floor(frame.width / factor);
  const height = Math.floor(frame.height / factor);
  const out = createSolidFrame(width, height);
  const area = factor * factor;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let r = 0;
      let g = 0;
      let b = 0;
      for (let by = 0; by < factor; by++) {
        let offset = ((y * factor + by) * frame.width + x * factor) * BYTES_PER_PIXEL;
        for (let bx = 0; bx < factor; bx++) {
          r += frame.pixels[offset];
          g += frame.pixels[offset + 1];
          b += frame.pixels[offset + 2];
          offset += BYTES_PER_PIXEL;
        }
      }
      writeRgb(out.pixels, (y * width + x) * BYTES_PER_PIXEL, {
        r: Math.round(r / area),
        g: Math.round(g / area),
        b: Math.round(b / area),
      });
    }
  }
  return out;
}

/**
 * Count pixels of exactly the given color
 */
export function countPixels(frame: Frame, color: RGB): number {
  let count = 0;
  for (let i = 0; i < frame.pixels.length; i += BYTES_PER_PIXEL) {
    if (
      frame.pixels[i] === color.r &&
      frame.pixels[i + 1] === color.g &&
      frame.pixels[i + 2] === color.b
    ) {
      count++;
    }
  }
  return count;
}

/** Quarter-turn rotations supported by the panel */
export type Rotation = 0 | 90 | 180 | 270;

/**
 * Rotate a frame clockwise by a multiple of 90 degrees
 */
export function rotateFrame(frame: Frame, rotation: Rotation): Frame {
  if (rotation === 0) {
    return { width: frame.width, height: frame.height, pixels: frame.pixels.slice() };
  }
  const upright = rotation === 180;
  const width = upright ? frame.width : frame.height;
  const height = upright ? frame.height : frame.width;
  const out = createSolidFrame(width, height);

  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      let tx: number;
      let ty: number;
      if (rotation === 90) {
        tx = frame.height - 1 - y;
        ty = x;
      } else if (rotation === 180) {
        tx = frame.width - 1 - x;
        ty = frame.height - 1 - y;
      } else {
        tx = y;
        ty = frame.width - 1 - x;
      }
      copyRgb(frame.pixels, (y * frame.width + x) * BYTES_PER_PIXEL, out.pixels, (ty * width + tx) * BYTES_PER_PIXEL);
    }
  }
  return out;
}

/**
 * Resample a frame to a new size using nearest-neighbour lookup
 */
export function resizeFrame(frame: Frame, width: number, height: number): Frame {
  const out = createSolidFrame(Math.max(0, width), Math.max(0, height));
  if (frame.width === 0 || frame.height === 0) return out;
  for (let y = 0; y < out.height; y++) {
    const sy = Math.min(frame.height - 1, Math.floor(((y + 0.5) * frame.height) / out.height));
    for (let x = 0; x < out.width; x++) {
      const sx = Math.min(frame.width - 1, Math.floor(((x + 0.5) * frame.width) / out.width));
      copyRgb(frame.pixels, (sy * frame.width + sx) * BYTES_PER_PIXEL, out.pixels, (y * out.width + x) * BYTES_PER_PIXEL);
    }
  }
  return out;
}
