import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createFrame, getPixel } from '@softisp/color-grading';

import { readFrame, writeFrame } from './frame-io';

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'softisp-frame-io-'));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe('frame file I/O', () => {
  it('round-trips an RGB frame through PNG', async () => {
    const frame = createFrame(2, 1, Uint8Array.from([255, 0, 0, 10, 20, 30]));
    const target = await writeFrame(frame, path.join(tempDir, 'nested', 'frame.png'));
    const loaded = await readFrame(target);

    expect(loaded.width).toBe(2);
    expect(loaded.height).toBe(1);
    expect(loaded.channelOrder).toBe('rgb');
    expect(Array.from(loaded.data)).toEqual([255, 0, 0, 10, 20, 30]);
  });

  it('writes BGR frames in RGB order', async () => {
    const frame = createFrame(1, 1, Uint8Array.from([30, 20, 10]), 'bgr');
    const loaded = await readFrame(await writeFrame(frame, path.join(tempDir, 'bgr.png')));

    expect(getPixel(loaded, 0, 0)).toEqual([10, 20, 30]);
  });
});
