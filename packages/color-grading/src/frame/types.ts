/**
 * Frame model shared by every grading stage
 */

/** Interleaved channel layout of a frame buffer */
export type ChannelOrder = 'rgb' | 'bgr';

/** One pixel as three 8-bit channel values, in the frame's stored order */
export type Pixel = [number, number, number];

/**
 * Fixed-shape 8-bit, 3-channel pixel buffer.
 * Stages never write into `data`; they allocate a new frame.
 */
export interface Frame {
    readonly width: number;
    readonly height: number;
    readonly channels: number;
    readonly channelOrder: ChannelOrder;
    readonly data: Uint8Array;
}

/** Channel offsets of red, green and blue inside one pixel */
export interface ChannelOffsets {
    red: number;
    green: number;
    blue: number;
}
