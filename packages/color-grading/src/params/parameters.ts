import { ParameterNameError } from '../errors';
import { clamp } from '../processors/color-math';
import { PARAMETER_DEFINITIONS, PARAMETER_NAMES, type ParameterName, type ParameterSet } from './types';

const NAME_SET: ReadonlySet<string> = new Set(PARAMETER_NAMES);

export const isParameterName = (value: string): value is ParameterName => NAME_SET.has(value);

export function assertParameterName(value: string): ParameterName {
    if (!isParameterName(value)) {
        throw new ParameterNameError(value);
    }
    return value;
}

/**
 * Round to a whole step and clamp into the parameter's range.
 * NaN falls back to the default value.
 */
export function clampParameter(name: ParameterName, value: number): number {
    const { min, max, defaultValue } = PARAMETER_DEFINITIONS[name];
    if (Number.isNaN(value)) {
        return defaultValue;
    }
    return clamp(Math.round(value), min, max);
}

export function createDefaultParameterSet(): ParameterSet {
    return {
        BRIGHTNESS: PARAMETER_DEFINITIONS.BRIGHTNESS.defaultValue,
        CONTRAST: PARAMETER_DEFINITIONS.CONTRAST.defaultValue,
        HUE: PARAMETER_DEFINITIONS.HUE.defaultValue,
        SATURATION: PARAMETER_DEFINITIONS.SATURATION.defaultValue,
        SHARPNESS: PARAMETER_DEFINITIONS.SHARPNESS.defaultValue,
        GAIN: PARAMETER_DEFINITIONS.GAIN.defaultValue,
        EXPOSURE: PARAMETER_DEFINITIONS.EXPOSURE.defaultValue,
        WHITEBALANCE_TEMPERATURE: PARAMETER_DEFINITIONS.WHITEBALANCE_TEMPERATURE.defaultValue
    };
}
