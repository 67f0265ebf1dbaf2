/**
 * Grading parameter model
 */

export const PARAMETER_NAMES = [
    'BRIGHTNESS',
    'CONTRAST',
    'HUE',
    'SATURATION',
    'SHARPNESS',
    'GAIN',
    'EXPOSURE',
    'WHITEBALANCE_TEMPERATURE'
] as const;

export type ParameterName = (typeof PARAMETER_NAMES)[number];

/** One value per grading control */
export type ParameterSet = Record<ParameterName, number>;

export interface ParameterDefinition {
    /** Lowest legal value (inclusive) */
    min: number;

    /** Highest legal value (inclusive) */
    max: number;

    /** Value after reset */
    defaultValue: number;

    /** Human readable name used in logs */
    label: string;
}

export const PARAMETER_DEFINITIONS: Readonly<Record<ParameterName, ParameterDefinition>> = {
    BRIGHTNESS: { min: -100, max: 100, defaultValue: 0, label: 'Brightness' },
    CONTRAST: { min: 0, max: 100, defaultValue: 0, label: 'Contrast' },
    HUE: { min: -90, max: 90, defaultValue: 0, label: 'Hue' },
    SATURATION: { min: -100, max: 100, defaultValue: 0, label: 'Saturation' },
    SHARPNESS: { min: 0, max: 60, defaultValue: 0, label: 'Sharpness' },
    GAIN: { min: 0, max: 100, defaultValue: 0, label: 'Gain' },
    EXPOSURE: { min: 0, max: 100, defaultValue: 0, label: 'Exposure' },
    WHITEBALANCE_TEMPERATURE: { min: 2000, max: 8000, defaultValue: 5500, label: 'White Balance' }
};

export type AdjustDirection = 1 | -1;

export type GradingLogger = Pick<Console, 'info'>;
