/**
 * @softisp/color-grading
 * Software emulation of camera ISP controls on captured frames
 */

// Frames
export type { ChannelOrder, ChannelOffsets, Frame, Pixel } from './frame/types.js';
export {
    FRAME_CHANNELS,
    assertFrame,
    channelOffsets,
    createFrame,
    createSolidFrame,
    framesEqual,
    getPixel,
    mapChannels,
    mapPixels
} from './frame/frame.js';

// Errors
export type { FrameShape } from './errors.js';
export { InputShapeError, ParameterNameError, isInputShapeError, isParameterNameError } from './errors.js';

// Stages
export { kelvinToGain, MIN_KELVIN, MAX_KELVIN } from './primary/kelvin.js';
export type { RGBGain } from './primary/kelvin.js';
export {
    applyBrightnessContrast,
    buildBrightnessContrastTable,
    contrastAlpha,
    effectiveBrightness,
    CONTRAST_GAIN_PER_UNIT,
    GAIN_BRIGHTNESS_WEIGHT
} from './primary/basic.js';
export { applyWhiteBalance, whiteBalanceScale } from './primary/temperature.js';
export { applyHueSaturation, hueShiftSteps } from './primary/hue-saturation.js';
export {
    applySharpness,
    gaussianBlur,
    gaussianKernel,
    SHARPEN_AMOUNT_PER_UNIT,
    SHARPEN_SIGMA
} from './primary/sharpness.js';

// Pipeline
export type { GradingStage, GradingStageId } from './processors/types.js';
export { GRADING_STAGES, GRADING_STAGE_ORDER, render, renderStages } from './processors/pipeline.js';
export * from './processors/color-math.js';

// Parameters
export type {
    AdjustDirection,
    GradingLogger,
    ParameterDefinition,
    ParameterName,
    ParameterSet
} from './params/types.js';
export { PARAMETER_DEFINITIONS, PARAMETER_NAMES } from './params/types.js';
export {
    assertParameterName,
    clampParameter,
    createDefaultParameterSet,
    isParameterName
} from './params/parameters.js';
export { ParameterStore } from './params/store.js';
export type { ParameterStoreOptions } from './params/store.js';
export {
    formatParameterTable,
    toSettingsDocument,
    toSortedEntries,
    SETTINGS_DOCUMENT_VERSION
} from './params/export.js';
export type { SettingsDocument } from './params/export.js';
