import { describe, it, expect } from 'vitest';

import { createSolidFrame, getPixel } from '../../frame/frame';
import { applyWhiteBalance, whiteBalanceScale } from '../../primary/temperature';

describe('white balance stage', () => {
    it('should pivot the scale on green', () => {
        const [r, g, b] = whiteBalanceScale(5500);

        expect(g).toBe(1);
        expect(r).toBeCloseTo(1.073715, 5);
        expect(b).toBeCloseTo(0.935798, 5);
    });

    it('should leave gray untouched at the neutral temperature', () => {
        const out = applyWhiteBalance(createSolidFrame(2, 2, [128, 128, 128]), 6600);

        expect(Array.from(out.data)).toEqual(new Array(12).fill(128));
    });

    it('should warm mid-gray at 5500K', () => {
        const out = applyWhiteBalance(createSolidFrame(1, 1, [128, 128, 128]), 5500);

        expect(getPixel(out, 0, 0)).toEqual([137, 128, 120]);
    });

    it('should scale the red and blue positions of a BGR frame', () => {
        const out = applyWhiteBalance(createSolidFrame(1, 1, [128, 128, 128], 'bgr'), 5500);

        expect(getPixel(out, 0, 0)).toEqual([120, 128, 137]);
        expect(out.channelOrder).toBe('bgr');
    });

    it('should shift toward blue when the temperature rises', () => {
        const warm = whiteBalanceScale(3000);
        const cool = whiteBalanceScale(7000);

        expect(cool[2]).toBeGreaterThan(warm[2]);
        expect(cool[0]).toBeLessThan(warm[0]);
    });

    it('should clamp amplified channels to 255', () => {
        const out = applyWhiteBalance(createSolidFrame(1, 1, [250, 10, 10]), 3000);

        expect(getPixel(out, 0, 0)[0]).toBe(255);
    });
});
