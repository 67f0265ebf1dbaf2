import { describe, expect, it } from 'vitest';

import { sliderPositionToValue, sliderSpan, valueToSliderPosition } from './sliders';

describe('slider mapping', () => {
  it('spans each range from zero', () => {
    expect(sliderSpan('BRIGHTNESS')).toBe(200);
    expect(sliderSpan('HUE')).toBe(180);
    expect(sliderSpan('WHITEBALANCE_TEMPERATURE')).toBe(6000);
  });

  it('offsets positions by the range minimum', () => {
    expect(sliderPositionToValue('BRIGHTNESS', 100)).toBe(0);
    expect(sliderPositionToValue('HUE', 0)).toBe(-90);
    expect(sliderPositionToValue('WHITEBALANCE_TEMPERATURE', 3500)).toBe(5500);
  });

  it('clamps positions beyond the track', () => {
    expect(sliderPositionToValue('SHARPNESS', 75)).toBe(60);
    expect(sliderPositionToValue('SATURATION', -5)).toBe(-100);
  });

  it('maps values back to positions', () => {
    expect(valueToSliderPosition('SATURATION', 0)).toBe(100);
    expect(valueToSliderPosition('WHITEBALANCE_TEMPERATURE', 9000)).toBe(6000);
  });
});
