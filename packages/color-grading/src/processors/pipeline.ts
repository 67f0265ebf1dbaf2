/**
 * Color grading pipeline
 * Runs the four stages in a fixed order over one frame
 */

import { assertFrame } from '../frame/frame';
import type { Frame } from '../frame/types';
import type { ParameterSet } from '../params/types';
import { applyBrightnessContrast, effectiveBrightness } from '../primary/basic';
import { applyHueSaturation } from '../primary/hue-saturation';
import { applySharpness } from '../primary/sharpness';
import { applyWhiteBalance } from '../primary/temperature';
import type { GradingStage, GradingStageId } from './types';

export const GRADING_STAGES: Readonly<Record<GradingStageId, GradingStage>> = {
    brightnessContrast: {
        id: 'brightnessContrast',
        // Exposure and gain ride on the brightness offset
        apply: (frame, params) => applyBrightnessContrast(frame, effectiveBrightness(params), params.CONTRAST)
    },
    whiteBalance: {
        id: 'whiteBalance',
        apply: (frame, params) => applyWhiteBalance(frame, params.WHITEBALANCE_TEMPERATURE)
    },
    hueSaturation: {
        id: 'hueSaturation',
        apply: (frame, params) => applyHueSaturation(frame, params.HUE, params.SATURATION)
    },
    sharpness: {
        id: 'sharpness',
        apply: (frame, params) => applySharpness(frame, params.SHARPNESS)
    }
};

export const GRADING_STAGE_ORDER: readonly GradingStageId[] = [
    'brightnessContrast',
    'whiteBalance',
    'hueSaturation',
    'sharpness'
];

/**
 * Run stages in an explicit order.
 * The frame is validated before the first stage.
 * 
 * @param frame - Input frame (not modified)
 * @param params - Parameter snapshot
 * @param order - Stage ids to run, first to last
 * @returns Graded frame
 */
export function renderStages(
    frame: Frame,
    params: Readonly<ParameterSet>,
    order: readonly GradingStageId[]
): Frame {
    assertFrame(frame);
    return order.reduce((current, id) => GRADING_STAGES[id].apply(current, params), frame);
}

/**
 * Grade one frame:
 * Brightness/Contrast → White balance → Hue/Saturation → Sharpness
 * 
 * @param frame - Input frame (not modified)
 * @param params - Parameter snapshot
 * @returns Graded frame
 */
export function render(frame: Frame, params: Readonly<ParameterSet>): Frame {
    return renderStages(frame, params, GRADING_STAGE_ORDER);
}
