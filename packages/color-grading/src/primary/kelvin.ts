/**
 * Color temperature to RGB gain conversion
 * Black-body approximation fitted over 1000K-12000K
 */

import { clamp } from '../processors/color-math';

export const MIN_KELVIN = 1000;
export const MAX_KELVIN = 12000;

/** Gain triple, each channel in [0, 1] */
export type RGBGain = [number, number, number];

const clampChannel = (value: number): number => clamp(value, 0, 255);

/**
 * Map a color temperature to a normalized RGB gain
 * 
 * @param kelvin - Color temperature, clamped to [1000, 12000]
 * @returns [red, green, blue] gains (0-1)
 */
export function kelvinToGain(kelvin: number): RGBGain {
    const bounded = Number.isNaN(kelvin) ? MIN_KELVIN : clamp(kelvin, MIN_KELVIN, MAX_KELVIN);
    const k = bounded / 100;

    const red = k <= 66 ? 255 : clampChannel(329.698727446 * Math.pow(k - 60, -0.1332047592));

    const green = clampChannel(
        k <= 66
            ? 99.4708025861 * Math.log(k) - 161.1195681661
            : 288.1221695283 * Math.pow(k - 60, -0.0755148492)
    );

    let blue: number;
    if (k >= 66) {
        blue = 255;
    } else if (k <= 19) {
        blue = 0;
    } else {
        blue = clampChannel(138.5177312231 * Math.log(k - 10) - 305.0447927307);
    }

    return [red / 255, green / 255, blue / 255];
}
