import { describe, it, expect } from 'vitest';

import { InputShapeError, isInputShapeError } from '../../errors';
import {
    channelOffsets,
    createFrame,
    createSolidFrame,
    framesEqual,
    getPixel,
    mapPixels
} from '../../frame/frame';

describe('frame helpers', () => {
    it('should zero-fill a new frame', () => {
        const frame = createFrame(3, 2);

        expect(frame.data).toHaveLength(18);
        expect(frame.channels).toBe(3);
        expect(frame.channelOrder).toBe('rgb');
        expect(getPixel(frame, 2, 1)).toEqual([0, 0, 0]);
    });

    it('should reject zero dimensions', () => {
        expect(() => createFrame(0, 4)).toThrow(InputShapeError);
        expect(() => createFrame(4, 0)).toThrow(InputShapeError);
    });

    it('should reject a buffer that does not match the dimensions', () => {
        try {
            createFrame(2, 2, new Uint8Array(11));
            expect.unreachable();
        } catch (error) {
            expect(isInputShapeError(error)).toBe(true);
            if (isInputShapeError(error)) {
                expect(error.shape).toEqual({ width: 2, height: 2, channels: 3, dataLength: 11 });
            }
        }
    });

    it('should index pixels row-major', () => {
        const frame = createFrame(2, 2, Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]));

        expect(getPixel(frame, 1, 0)).toEqual([4, 5, 6]);
        expect(getPixel(frame, 0, 1)).toEqual([7, 8, 9]);
    });

    it('should map pixels into a new frame', () => {
        const frame = createSolidFrame(2, 1, [10, 20, 30], 'bgr');
        const out = mapPixels(frame, (a, b, c) => [c, b, a]);

        expect(getPixel(out, 1, 0)).toEqual([30, 20, 10]);
        expect(out.channelOrder).toBe('bgr');
        expect(getPixel(frame, 1, 0)).toEqual([10, 20, 30]);
    });

    it('should resolve channel offsets for both layouts', () => {
        expect(channelOffsets('rgb')).toEqual({ red: 0, green: 1, blue: 2 });
        expect(channelOffsets('bgr')).toEqual({ red: 2, green: 1, blue: 0 });
    });

    it('should compare frames by content', () => {
        const a = createSolidFrame(2, 2, [1, 2, 3]);

        expect(framesEqual(a, createSolidFrame(2, 2, [1, 2, 3]))).toBe(true);
        expect(framesEqual(a, createSolidFrame(2, 2, [1, 2, 4]))).toBe(false);
        expect(framesEqual(a, createSolidFrame(2, 2, [1, 2, 3], 'bgr'))).toBe(false);
    });
});
