import { describe, it, expect } from 'vitest';
import { parseCssColorToRgba01 } from '../colors';

describe('parseCssColorToRgba01', () => {
  it('parses hex forms', () => {
    expect(parseCssColorToRgba01('#ff0000')).toEqual([1, 0, 0, 1]);
    expect(parseCssColorToRgba01('#0f0')).toEqual([0, 1, 0, 1]);
    expect(parseCssColorToRgba01('#0000ff00')).toEqual([0, 0, 1, 0]);
    expect(parseCssColorToRgba01('#FFFF')).toEqual([1, 1, 1, 1]);
  });

  it('parses rgb() and rgba() with commas or spaces', () => {
    expect(parseCssColorToRgba01('rgb(255, 0, 255)')).toEqual([1, 0, 1, 1]);
    expect(parseCssColorToRgba01('rgba(0, 0, 0, 0)')).toEqual([0, 0, 0, 0]);
    expect(parseCssColorToRgba01('rgba(255, 255, 255, 0.5)')).toEqual([1, 1, 1, 0.5]);
    expect(parseCssColorToRgba01('rgb(0 255 0 / 50%)')).toEqual([0, 1, 0, 0.5]);
    expect(parseCssColorToRgba01('rgb(100%, 0%, 0%)')).toEqual([1, 0, 0, 1]);
  });

  it('knows the named colors the default style uses', () => {
    expect(parseCssColorToRgba01('black')).toEqual([0, 0, 0, 1]);
    expect(parseCssColorToRgba01('Transparent')).toEqual([0, 0, 0, 0]);
    const lightblue = parseCssColorToRgba01('lightblue');
    expect(lightblue?.[0]).toBeCloseTo(173 / 255, 12);
    expect(parseCssColorToRgba01('lightgrey')?.[3]).toBe(1);
  });

  it('returns null for anything else', () => {
    expect(parseCssColorToRgba01('')).toBeNull();
    expect(parseCssColorToRgba01('#12')).toBeNull();
    expect(parseCssColorToRgba01('#zzzzzz')).toBeNull();
    expect(parseCssColorToRgba01('rgb(1, 2)')).toBeNull();
    expect(parseCssColorToRgba01('hsl(0, 100%, 50%)')).toBeNull();
    expect(parseCssColorToRgba01('chartreuse')).toBeNull();
  });
});
