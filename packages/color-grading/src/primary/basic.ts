/**
 * Brightness and contrast stage
 * Linear gain/offset per channel, evaluated through a 256-entry table
 */

import { mapChannels } from '../frame/frame';
import type { Frame } from '../frame/types';
import { toByte } from '../processors/color-math';
import type { ParameterSet } from '../params/types';

/** Contrast gain added per contrast unit (0-100 maps to alpha 1-3) */
export const CONTRAST_GAIN_PER_UNIT = 0.02;

/** Share of GAIN folded into the brightness offset */
export const GAIN_BRIGHTNESS_WEIGHT = 0.6;

/**
 * Contrast multiplier for a contrast setting
 */
export function contrastAlpha(contrastUnits: number): number {
    return 1 + CONTRAST_GAIN_PER_UNIT * Math.max(0, contrastUnits);
}

/**
 * Brightness offset the pipeline feeds into this stage.
 * Exposure and gain are approximated as extra brightness.
 */
export function effectiveBrightness(params: Pick<ParameterSet, 'BRIGHTNESS' | 'EXPOSURE' | 'GAIN'>): number {
    const extra = Math.round(params.EXPOSURE + GAIN_BRIGHTNESS_WEIGHT * params.GAIN);
    return params.BRIGHTNESS + extra;
}

/**
 * Build the per-byte lookup table for a brightness/contrast pair
 */
export function buildBrightnessContrastTable(brightness: number, contrastUnits: number): Uint8Array {
    const alpha = contrastAlpha(contrastUnits);
    const beta = Math.round(brightness);
    const table = new Uint8Array(256);
    for (let value = 0; value < 256; value++) {
        table[value] = toByte(alpha * value + beta);
    }
    return table;
}

/**
 * Apply brightness and contrast
 * out = clamp(round(alpha * in + beta), 0, 255)
 * 
 * @param frame - Input frame
 * @param brightness - Offset added after scaling
 * @param contrastUnits - Contrast setting (0 to 100)
 * @returns New frame
 */
export function applyBrightnessContrast(frame: Frame, brightness: number, contrastUnits: number): Frame {
    return mapChannels(frame, buildBrightnessContrastTable(brightness, contrastUnits));
}
