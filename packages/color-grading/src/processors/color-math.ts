/**
 * Numeric helpers shared by the grading stages
 * All channel values are 8-bit (0-255) unless noted otherwise
 */

/** Hue wheel size of the 8-bit HSV representation (2 degrees per step) */
export const HUE_STEPS = 180;

/**
 * Clamp a value to [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Round to the nearest integer and clamp to a byte
 */
export function toByte(value: number): number {
    return clamp(Math.round(value), 0, 255);
}

/** Modulo that always returns a value in [0, divisor) */
export function positiveModulo(value: number, divisor: number): number {
    return ((value % divisor) + divisor) % divisor;
}

/**
 * Convert RGB to 8-bit HSV
 * 
 * @param r - Red channel (0-255)
 * @param g - Green channel (0-255)
 * @param b - Blue channel (0-255)
 * @returns [hue (0-179), saturation (0-255), value (0-255)]
 */
export function rgbToHSV(r: number, g: number, b: number): [number, number, number] {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const delta = max - min;
    const s = max === 0 ? 0 : Math.round((255 * delta) / max);

    if (delta === 0) {
        return [0, s, max]; // Grayscale
    }

    let degrees: number;
    if (max === r) {
        degrees = (60 * (g - b)) / delta;
    } else if (max === g) {
        degrees = 120 + (60 * (b - r)) / delta;
    } else {
        degrees = 240 + (60 * (r - g)) / delta;
    }
    if (degrees < 0) {
        degrees += 360;
    }

    let h = Math.round(degrees / 2);
    if (h >= HUE_STEPS) {
        h -= HUE_STEPS;
    }
    return [h, s, max];
}

/**
 * Convert 8-bit HSV back to RGB
 * 
 * @param h - Hue (0-179)
 * @param s - Saturation (0-255)
 * @param v - Value (0-255)
 * @returns [red, green, blue] (0-255)
 */
export function hsvToRGB(h: number, s: number, v: number): [number, number, number] {
    if (s === 0) {
        return [v, v, v]; // Grayscale
    }

    const sector = (positiveModulo(h, HUE_STEPS) * 2) / 60;
    const index = Math.floor(sector) % 6;
    const f = sector - Math.floor(sector);
    const sat = s / 255;
    const val = v / 255;

    const p = val * (1 - sat);
    const q = val * (1 - sat * f);
    const t = val * (1 - sat * (1 - f));

    let rgb: [number, number, number];
    switch (index) {
        case 0: rgb = [val, t, p]; break;
        case 1: rgb = [q, val, p]; break;
        case 2: rgb = [p, val, t]; break;
        case 3: rgb = [p, q, val]; break;
        case 4: rgb = [t, p, val]; break;
        default: rgb = [val, p, q]; break;
    }

    return [toByte(rgb[0] * 255), toByte(rgb[1] * 255), toByte(rgb[2] * 255)];
}
