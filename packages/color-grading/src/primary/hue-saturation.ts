/**
 * Hue rotation and saturation offset in 8-bit HSV space
 */

import { channelOffsets, mapPixels } from '../frame/frame';
import type { Frame, Pixel } from '../frame/types';
import { clamp, HUE_STEPS, hsvToRGB, positiveModulo, rgbToHSV } from '../processors/color-math';

/**
 * Hue steps added to the 180-step wheel for a hue setting.
 * The setting is doubled to degrees and halved back with floor division,
 * so odd halves of a unit are dropped.
 */
export function hueShiftSteps(hueUnits: number): number {
    const hueShiftDeg = Math.round(hueUnits * 2);
    return Math.floor(hueShiftDeg / 2);
}

/**
 * Apply hue and saturation adjustments
 * 
 * @param frame - Input frame
 * @param hueUnits - Hue rotation (-90 to 90)
 * @param satUnits - Saturation offset (-100 to 100, added to 0-255 saturation)
 * @returns New frame
 */
export function applyHueSaturation(frame: Frame, hueUnits: number, satUnits: number): Frame {
    const shift = hueShiftSteps(hueUnits);
    const { red, green, blue } = channelOffsets(frame.channelOrder);

    return mapPixels(frame, (c0, c1, c2) => {
        const input: Pixel = [c0, c1, c2];
        const [h, s, v] = rgbToHSV(input[red], input[green], input[blue]);

        const newH = positiveModulo(h + shift, HUE_STEPS);
        const newS = clamp(s + satUnits, 0, 255);
        const [r, g, b] = hsvToRGB(newH, newS, v);

        const out: Pixel = [0, 0, 0];
        out[red] = r;
        out[green] = g;
        out[blue] = b;
        return out;
    });
}
