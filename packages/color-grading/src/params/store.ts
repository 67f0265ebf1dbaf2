import { assertParameterName, clampParameter, createDefaultParameterSet } from './parameters';
import { toSortedEntries } from './export';
import {
    PARAMETER_DEFINITIONS,
    PARAMETER_NAMES,
    type AdjustDirection,
    type GradingLogger,
    type ParameterName,
    type ParameterSet
} from './types';

const STEP = 1;

export interface ParameterStoreOptions {
    /** Starting values; missing names use defaults */
    initial?: Partial<ParameterSet>;

    /** Setting targeted by adjustActive() before any cycling */
    activeSetting?: ParameterName;

    logger?: GradingLogger;
}

/**
 * Bounded grading settings for one session.
 * Every mutation clamps, so stored values are always in range.
 */
export class ParameterStore {
    private values: ParameterSet = createDefaultParameterSet();
    private active: ParameterName;
    private readonly logger?: GradingLogger;

    constructor(options: ParameterStoreOptions = {}) {
        this.logger = options.logger;
        this.active = options.activeSetting ? assertParameterName(options.activeSetting) : 'BRIGHTNESS';
        if (options.initial) {
            this.load(options.initial);
        }
    }

    get activeSetting(): ParameterName {
        return this.active;
    }

    get(name: string): number {
        return this.values[assertParameterName(name)];
    }

    /**
     * Move a setting one step up or down, stopping at its bound.
     * Only the sign of `direction` counts; zero leaves the value unchanged.
     */
    adjust(name: string, direction: AdjustDirection): number {
        const key = assertParameterName(name);
        const next = clampParameter(key, this.values[key] + Math.sign(direction) * STEP);
        this.values = { ...this.values, [key]: next };
        this.logger?.info(`[Grading] ${PARAMETER_DEFINITIONS[key].label}: ${next}`);
        return next;
    }

    adjustActive(direction: AdjustDirection): number {
        return this.adjust(this.active, direction);
    }

    /**
     * Assign an absolute value (slider input), rounded and clamped
     */
    set(name: string, value: number): number {
        const key = assertParameterName(name);
        const next = clampParameter(key, value);
        this.values = { ...this.values, [key]: next };
        return next;
    }

    /**
     * Assign several values at once; every name is checked before any is written
     */
    load(values: Partial<Record<string, number>>): void {
        const entries = Object.entries(values).map(([name, value]) => [assertParameterName(name), value] as const);
        for (const [name, value] of entries) {
            if (typeof value === 'number') {
                this.set(name, value);
            }
        }
    }

    reset(): void {
        this.values = createDefaultParameterSet();
        this.logger?.info('[Grading] Reset all settings to default');
    }

    /**
     * Advance the active setting, wrapping after the last one
     */
    cycleActive(): ParameterName {
        const index = PARAMETER_NAMES.indexOf(this.active);
        this.active = PARAMETER_NAMES[(index + 1) % PARAMETER_NAMES.length];
        this.logger?.info(`[Grading] Switch to setting: ${this.active}`);
        return this.active;
    }

    /** Read-only copy of the current values */
    snapshot(): Readonly<ParameterSet> {
        return Object.freeze({ ...this.values });
    }

    entries(): Array<[ParameterName, number]> {
        return toSortedEntries(this.values);
    }
}
