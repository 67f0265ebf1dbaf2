/**
 * White balance from a color temperature
 * Red and blue are scaled relative to green so green never changes
 */

import { channelOffsets, mapPixels } from '../frame/frame';
import type { Frame } from '../frame/types';
import { toByte } from '../processors/color-math';
import { kelvinToGain, type RGBGain } from './kelvin';

const GREEN_FLOOR = 1e-6;

/**
 * Per-channel multipliers for a color temperature, pivoted on green
 * 
 * @param kelvin - Color temperature in Kelvin
 * @returns [red, green, blue] multipliers (green is always 1)
 */
export function whiteBalanceScale(kelvin: number): RGBGain {
    const [r, g, b] = kelvinToGain(kelvin);
    const pivot = Math.max(g, GREEN_FLOOR);
    return [r / pivot, g / pivot, b / pivot];
}

/**
 * Apply white balance to a frame
 * 
 * @param frame - Input frame
 * @param kelvin - Color temperature in Kelvin
 * @returns New frame
 */
export function applyWhiteBalance(frame: Frame, kelvin: number): Frame {
    const [redScale, greenScale, blueScale] = whiteBalanceScale(kelvin);
    const offsets = channelOffsets(frame.channelOrder);
    const scales = [0, 0, 0];
    scales[offsets.red] = redScale;
    scales[offsets.green] = greenScale;
    scales[offsets.blue] = blueScale;

    return mapPixels(frame, (c0, c1, c2) => [
        toByte(c0 * scales[0]),
        toByte(c1 * scales[1]),
        toByte(c2 * scales[2])
    ]);
}
