import path from 'node:path';
import fs from 'node:fs/promises';

import sharp from 'sharp';

import { createFrame, FRAME_CHANNELS, mapPixels, type Frame } from '@softisp/color-grading';

export class FrameDecodeError extends Error {
  constructor(public readonly filePath: string, public readonly channels: number) {
    super(`Cannot use ${filePath} as a frame: decoded to ${channels} channels`);
    this.name = 'FrameDecodeError';
  }
}

/**
 * Decode an image file into an 8-bit RGB frame (alpha dropped)
 */
export async function readFrame(filePath: string): Promise<Frame> {
  const { data, info } = await sharp(filePath)
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== FRAME_CHANNELS) {
    throw new FrameDecodeError(filePath, info.channels);
  }
  return createFrame(info.width, info.height, new Uint8Array(data.buffer, data.byteOffset, data.length), 'rgb');
}

/**
 * Encode a frame to an image file; the format follows the file extension
 */
export async function writeFrame(frame: Frame, filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });

  const rgb = frame.channelOrder === 'rgb' ? frame : mapPixels(frame, (b, g, r) => [r, g, b]);
  await sharp(Buffer.from(rgb.data.buffer, rgb.data.byteOffset, rgb.data.length), {
    raw: { width: rgb.width, height: rgb.height, channels: FRAME_CHANNELS }
  }).toFile(resolved);
  return resolved;
}
