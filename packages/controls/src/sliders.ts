import { clampParameter, PARAMETER_DEFINITIONS, type ParameterName } from '@softisp/color-grading';

/**
 * Number of slider positions above zero; sliders always start at 0
 */
export const sliderSpan = (name: ParameterName): number => {
  const { min, max } = PARAMETER_DEFINITIONS[name];
  return max - min;
};

export const sliderPositionToValue = (name: ParameterName, position: number): number =>
  clampParameter(name, PARAMETER_DEFINITIONS[name].min + position);

export const valueToSliderPosition = (name: ParameterName, value: number): number =>
  clampParameter(name, value) - PARAMETER_DEFINITIONS[name].min;
