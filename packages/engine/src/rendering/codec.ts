/**
 * Image codec
 *
 * Frames are raw RGB; sharp turns them into JPEG/PNG bytes and decodes
 * image payloads (camera snapshots, album art) back into frames.
 */

import sharp from "sharp";
import type { Frame } from "@glance/core";

function rawInput(frame: Frame): sharp.Sharp {
  const data = Buffer.from(frame.pixels.buffer, frame.pixels.byteOffset, frame.pixels.byteLength);
  return sharp(data, { raw: { width: frame.width, height: frame.height, channels: 3 } });
}

/** JPEG quality sharp accepts: an integer in [1, 100] */
export function clampQuality(quality: number): number {
  return Math.max(1, Math.min(100, Math.round(quality)));
}

export async function encodeJpeg(frame: Frame, quality: number): Promise<Buffer> {
  return rawInput(frame).jpeg({ quality: clampQuality(quality) }).toBuffer();
}

export async function encodePng(frame: Frame): Promise<Buffer> {
  return rawInput(frame).png().toBuffer();
}

/**
 * Decode any format sharp reads into an RGB frame. Alpha is dropped and
 * grayscale is expanded to three channels.
 */
export async function decodeImage(bytes: Uint8Array): Promise<Frame> {
  const { data, info } = await sharp(bytes)
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 3) {
    throw new Error(`Decoded image has ${info.channels} channels, expected 3`);
  }
  return { width: info.width, height: info.height, pixels: new Uint8Array(data) };
}
