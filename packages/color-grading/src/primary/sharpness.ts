/**
 * Unsharp-mask sharpening
 */

import { FRAME_CHANNELS } from '../frame/frame';
import type { Frame } from '../frame/types';
import { toByte } from '../processors/color-math';

/** Sharpening amount per sharpness unit (0-60 maps to 0-3) */
export const SHARPEN_AMOUNT_PER_UNIT = 0.05;
export const SHARPEN_SIGMA = 1.2;

const AMOUNT_EPSILON = 1e-6;

/**
 * Normalized 1D Gaussian kernel.
 * Size is derived from sigma: round(sigma * 6 + 1), forced odd.
 */
export function gaussianKernel(sigma: number): Float64Array {
    const size = Math.max(1, Math.round(sigma * 6 + 1) | 1);
    const radius = (size - 1) / 2;
    const kernel = new Float64Array(size);
    const denominator = 2 * sigma * sigma;

    let sum = 0;
    for (let i = 0; i < size; i++) {
        const x = i - radius;
        kernel[i] = Math.exp(-(x * x) / denominator);
        sum += kernel[i];
    }
    for (let i = 0; i < size; i++) {
        kernel[i] /= sum;
    }
    return kernel;
}

// Mirror without repeating the edge sample: -1 -> 1, n -> n - 2
const reflect101 = (index: number, length: number): number => {
    if (length === 1) {
        return 0;
    }
    let i = index;
    while (i < 0 || i >= length) {
        i = i < 0 ? -i : 2 * (length - 1) - i;
    }
    return i;
};

/**
 * Separable Gaussian blur, result rounded back to 8 bits
 * 
 * @param frame - Input frame
 * @param sigma - Standard deviation in pixels
 * @returns Blurred copy
 */
export function gaussianBlur(frame: Frame, sigma: number): Frame {
    const { width, height, data } = frame;
    const kernel = gaussianKernel(sigma);
    const radius = (kernel.length - 1) / 2;
    const horizontal = new Float64Array(data.length);

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            for (let c = 0; c < FRAME_CHANNELS; c++) {
                let acc = 0;
                for (let k = 0; k < kernel.length; k++) {
                    const sx = reflect101(x + k - radius, width);
                    acc += kernel[k] * data[(y * width + sx) * FRAME_CHANNELS + c];
                }
                horizontal[(y * width + x) * FRAME_CHANNELS + c] = acc;
            }
        }
    }

    const out = new Uint8Array(data.length);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            for (let c = 0; c < FRAME_CHANNELS; c++) {
                let acc = 0;
                for (let k = 0; k < kernel.length; k++) {
                    const sy = reflect101(y + k - radius, height);
                    acc += kernel[k] * horizontal[(sy * width + x) * FRAME_CHANNELS + c];
                }
                out[(y * width + x) * FRAME_CHANNELS + c] = toByte(acc);
            }
        }
    }

    return { ...frame, data: out };
}

/**
 * Sharpen a frame with an unsharp mask
 * Returns the input frame itself when the amount is zero
 * 
 * @param frame - Input frame
 * @param sharpUnits - Sharpness setting (0 to 60)
 * @returns Sharpened frame
 */
export function applySharpness(frame: Frame, sharpUnits: number): Frame {
    const amount = SHARPEN_AMOUNT_PER_UNIT * Math.max(0, sharpUnits);
    if (amount <= AMOUNT_EPSILON) {
        return frame;
    }

    const blurred = gaussianBlur(frame, SHARPEN_SIGMA);
    const out = new Uint8Array(frame.data.length);
    for (let i = 0; i < out.length; i++) {
        out[i] = toByte((1 + amount) * frame.data[i] - amount * blurred.data[i]);
    }
    return { ...frame, data: out };
}
