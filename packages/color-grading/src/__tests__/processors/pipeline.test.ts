import { describe, it, expect } from 'vitest';

import { InputShapeError } from '../../errors';
import { createFrame, createSolidFrame, getPixel } from '../../frame/frame';
import type { Frame } from '../../frame/types';
import { createDefaultParameterSet } from '../../params/parameters';
import type { ParameterSet } from '../../params/types';
import { GRADING_STAGE_ORDER, render, renderStages } from '../../processors/pipeline';

const withParams = (overrides: Partial<ParameterSet>): ParameterSet => ({
    ...createDefaultParameterSet(),
    ...overrides
});

const edgeFrame = (): Frame => {
    const values = [50, 50, 50, 200, 200];
    return createFrame(5, 1, Uint8Array.from(values.flatMap(v => [v, v, v])));
};

describe('render', () => {
    it('should run the stages in a fixed order', () => {
        expect(GRADING_STAGE_ORDER).toEqual(['brightnessContrast', 'whiteBalance', 'hueSaturation', 'sharpness']);
    });

    it('should warm a mid-gray frame with default parameters', () => {
        const out = render(createSolidFrame(2, 2, [128, 128, 128]), createDefaultParameterSet());

        for (let y = 0; y < 2; y++) {
            for (let x = 0; x < 2; x++) {
                expect(getPixel(out, x, y)).toEqual([137, 128, 120]);
            }
        }
    });

    it('should keep mid-gray within one step at the neutral temperature', () => {
        const out = render(
            createSolidFrame(2, 2, [128, 128, 128]),
            withParams({ WHITEBALANCE_TEMPERATURE: 6600 })
        );

        for (const value of out.data) {
            expect(Math.abs(value - 128)).toBeLessThanOrEqual(1);
        }
    });

    it('should be deterministic', () => {
        const frame = edgeFrame();
        const params = withParams({ BRIGHTNESS: 12, CONTRAST: 30, HUE: 17, SATURATION: 40, SHARPNESS: 25, GAIN: 8 });

        const first = render(frame, params);
        const second = render(frame, params);

        expect(Array.from(second.data)).toEqual(Array.from(first.data));
    });

    it('should not mutate the input frame', () => {
        const frame = edgeFrame();
        const before = Array.from(frame.data);
        render(frame, withParams({ BRIGHTNESS: 40, SHARPNESS: 60 }));

        expect(Array.from(frame.data)).toEqual(before);
    });

    it('should match the hand-computed result for a red pixel', () => {
        // [100,20,20] -> white balance 5500K -> [107,20,19] -> hue +60 steps -> [19,107,19]
        const out = render(createSolidFrame(1, 1, [100, 20, 20]), withParams({ HUE: 60 }));

        expect(getPixel(out, 0, 0)).toEqual([19, 107, 19]);
    });

    it('should fold exposure and gain into brightness', () => {
        // brightness 0 + round(5 + 0.6 * 20) = 17 -> [117,37,37], neutral white balance
        const out = render(
            createSolidFrame(1, 1, [100, 20, 20]),
            withParams({ EXPOSURE: 5, GAIN: 20, WHITEBALANCE_TEMPERATURE: 6600 })
        );

        expect(getPixel(out, 0, 0)).toEqual([117, 37, 37]);
    });

    it('should differ when hue runs before white balance', () => {
        const frame = createSolidFrame(1, 1, [100, 20, 20]);
        const params = withParams({ HUE: 60 });

        const swapped = renderStages(frame, params, ['brightnessContrast', 'hueSaturation', 'whiteBalance', 'sharpness']);

        expect(getPixel(swapped, 0, 0)).toEqual([21, 100, 19]);
        expect(getPixel(render(frame, params), 0, 0)).not.toEqual(getPixel(swapped, 0, 0));
    });

    it('should differ when sharpening runs before contrast', () => {
        const params = withParams({ CONTRAST: 50, SHARPNESS: 20, WHITEBALANCE_TEMPERATURE: 6600 });
        const row = (frame: Frame) => Array.from({ length: frame.width }, (_, x) => getPixel(frame, x, 0)[0]);

        const ordered = render(edgeFrame(), params);
        const swapped = renderStages(edgeFrame(), params, ['sharpness', 'brightnessContrast', 'whiteBalance', 'hueSaturation']);

        expect(row(ordered)).toEqual([95, 84, 48, 255, 255]);
        expect(row(swapped)).toEqual([90, 70, 0, 255, 255]);
    });

    it('should reject an invalid frame before any stage runs', () => {
        const frame: Frame = {
            width: 0,
            height: 2,
            channels: 3,
            channelOrder: 'rgb',
            data: new Uint8Array(0)
        };

        expect(() => render(frame, createDefaultParameterSet())).toThrow(InputShapeError);
    });

    it('should reject a four-channel buffer', () => {
        const frame: Frame = {
            width: 1,
            height: 1,
            channels: 4,
            channelOrder: 'rgb',
            data: new Uint8Array(4)
        };

        expect(() => render(frame, createDefaultParameterSet())).toThrow(/expected 3 channels/);
    });
});
