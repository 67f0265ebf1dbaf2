/**
 * Grading pipeline stage descriptors
 */

import type { Frame } from '../frame/types';
import type { ParameterSet } from '../params/types';

export type GradingStageId = 'brightnessContrast' | 'whiteBalance' | 'hueSaturation' | 'sharpness';

/**
 * One pure frame transform driven by a parameter snapshot
 */
export interface GradingStage {
    id: GradingStageId;
    apply: (frame: Frame, params: Readonly<ParameterSet>) => Frame;
}
