/**
 * Serialisable views of a parameter set
 */

import { PARAMETER_DEFINITIONS, PARAMETER_NAMES, type ParameterName, type ParameterSet } from './types';

export const SETTINGS_DOCUMENT_VERSION = 'preview';

export interface SettingsDocument {
    sdk_version: string;
    settings: ParameterSet;
}

const SORTED_NAMES: readonly ParameterName[] = [...PARAMETER_NAMES].sort();

/**
 * Name-sorted [name, value] pairs
 */
export function toSortedEntries(params: Readonly<ParameterSet>): Array<[ParameterName, number]> {
    return SORTED_NAMES.map((name): [ParameterName, number] => [name, params[name]]);
}

/**
 * Export document with settings keyed in sorted order
 */
export function toSettingsDocument(params: Readonly<ParameterSet>): SettingsDocument {
    return {
        sdk_version: SETTINGS_DOCUMENT_VERSION,
        settings: {
            BRIGHTNESS: params.BRIGHTNESS,
            CONTRAST: params.CONTRAST,
            EXPOSURE: params.EXPOSURE,
            GAIN: params.GAIN,
            HUE: params.HUE,
            SATURATION: params.SATURATION,
            SHARPNESS: params.SHARPNESS,
            WHITEBALANCE_TEMPERATURE: params.WHITEBALANCE_TEMPERATURE
        }
    };
}

/**
 * Plain-text table, one line per setting in sorted order.
 * The active setting is marked with a trailing '*'.
 */
export function formatParameterTable(params: Readonly<ParameterSet>, active?: ParameterName): string {
    return toSortedEntries(params)
        .map(([name, value]) => {
            const { min, max } = PARAMETER_DEFINITIONS[name];
            const marker = name === active ? ' *' : '';
            return `${name.padEnd(24)} ${String(value).padStart(5)}  [${min}..${max}]${marker}`;
        })
        .join('\n');
}
