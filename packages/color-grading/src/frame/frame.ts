/**
 * Frame construction, validation and per-pixel helpers
 */

import { InputShapeError } from '../errors';
import type { ChannelOffsets, ChannelOrder, Frame, Pixel } from './types';

export const FRAME_CHANNELS = 3;

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Throw an InputShapeError unless the frame has a usable shape
 *
 * @param frame - Frame supplied by a frame source
 */
export function assertFrame(frame: Frame): void {
    const shape = {
        width: frame.width,
        height: frame.height,
        channels: frame.channels,
        dataLength: frame.data.length
    };

    if (!isPositiveInteger(frame.width) || !isPositiveInteger(frame.height)) {
        throw new InputShapeError(shape, 'width and height must be positive integers');
    }
    if (frame.channels !== FRAME_CHANNELS) {
        throw new InputShapeError(shape, `expected ${FRAME_CHANNELS} channels`);
    }
    if (frame.data.length !== frame.width * frame.height * FRAME_CHANNELS) {
        throw new InputShapeError(shape, 'buffer length does not match dimensions');
    }
}

/**
 * Create a frame, zero-filled when no data is given
 */
export function createFrame(
    width: number,
    height: number,
    data?: Uint8Array,
    channelOrder: ChannelOrder = 'rgb'
): Frame {
    const frame: Frame = {
        width,
        height,
        channels: FRAME_CHANNELS,
        channelOrder,
        data: data ?? new Uint8Array(Math.max(0, width * height * FRAME_CHANNELS))
    };
    assertFrame(frame);
    return frame;
}

/**
 * Create a frame where every pixel holds the same three channel values
 */
export function createSolidFrame(
    width: number,
    height: number,
    pixel: Pixel,
    channelOrder: ChannelOrder = 'rgb'
): Frame {
    const data = new Uint8Array(Math.max(0, width * height * FRAME_CHANNELS));
    for (let i = 0; i < data.length; i += FRAME_CHANNELS) {
        data[i] = pixel[0];
        data[i + 1] = pixel[1];
        data[i + 2] = pixel[2];
    }
    return createFrame(width, height, data, channelOrder);
}

export function getPixel(frame: Frame, x: number, y: number): Pixel {
    const offset = (y * frame.width + x) * FRAME_CHANNELS;
    return [frame.data[offset], frame.data[offset + 1], frame.data[offset + 2]];
}

/** Offsets of each color inside a pixel for the given layout */
export function channelOffsets(order: ChannelOrder): ChannelOffsets {
    return order === 'rgb' ? { red: 0, green: 1, blue: 2 } : { red: 2, green: 1, blue: 0 };
}

/**
 * Build a new frame by mapping every pixel.
 * The callback returns unclamped numbers; they are stored as-is into a
 * Uint8Array, so callers clamp and round first.
 */
export function mapPixels(
    frame: Frame,
    fn: (c0: number, c1: number, c2: number) => Pixel
): Frame {
    const source = frame.data;
    const out = new Uint8Array(source.length);
    for (let i = 0; i < source.length; i += FRAME_CHANNELS) {
        const [a, b, c] = fn(source[i], source[i + 1], source[i + 2]);
        out[i] = a;
        out[i + 1] = b;
        out[i + 2] = c;
    }
    return {
        width: frame.width,
        height: frame.height,
        channels: FRAME_CHANNELS,
        channelOrder: frame.channelOrder,
        data: out
    };
}

/**
 * Apply a per-channel lookup table (256 entries) to every byte
 */
export function mapChannels(frame: Frame, table: Uint8Array): Frame {
    const out = new Uint8Array(frame.data.length);
    for (let i = 0; i < frame.data.length; i++) {
        out[i] = table[frame.data[i]];
    }
    return {
        width: frame.width,
        height: frame.height,
        channels: FRAME_CHANNELS,
        channelOrder: frame.channelOrder,
        data: out
    };
}

export function framesEqual(a: Frame, b: Frame): boolean {
    if (a.width !== b.width || a.height !== b.height || a.channelOrder !== b.channelOrder) {
        return false;
    }
    if (a.data.length !== b.data.length) {
        return false;
    }
    for (let i = 0; i < a.data.length; i++) {
        if (a.data[i] !== b.data[i]) {
            return false;
        }
    }
    return true;
}
