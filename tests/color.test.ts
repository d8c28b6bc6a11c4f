import { describe, it, expect } from 'vitest';
import { interpolateColor, isColor, scaleColor } from '../src/color.js';

describe('scaleColor', () => {
    it('scales each channel and rounds', () => {
        expect(scaleColor([200, 100, 50], 0.5)).toEqual([100, 50, 25]);
        expect(scaleColor([3, 5, 7], 0.5)).toEqual([2, 3, 4]);
    });

    it('clamps into the 8-bit range', () => {
        expect(scaleColor([200, 100, 50], 2)).toEqual([255, 200, 100]);
        expect(scaleColor([200, 100, 50], -1)).toEqual([0, 0, 0]);
    });

    it('maps NaN to black', () => {
        expect(scaleColor([200, 100, 50], NaN)).toEqual([0, 0, 0]);
    });
});

describe('interpolateColor', () => {
    it('returns the endpoints at ratios 0 and 1', () => {
        expect(interpolateColor([10, 20, 30], [200, 210, 220], 0)).toEqual([10, 20, 30]);
        expect(interpolateColor([10, 20, 30], [200, 210, 220], 1)).toEqual([200, 210, 220]);
    });

    it('rounds each weighted part separately', () => {
        expect(interpolateColor([255, 0, 100], [0, 255, 100], 0.5)).toEqual([128, 128, 100]);
    });

    it('clamps a sum that rounds past 255', () => {
        expect(interpolateColor([255, 255, 255], [255, 255, 255], 0.5)).toEqual([255, 255, 255]);
    });
});

describe('isColor', () => {
    it('accepts three 8-bit integers only', () => {
        expect(isColor([0, 128, 255])).toBe(true);
        expect(isColor([0, 128])).toBe(false);
        expect(isColor([0, 128, 256])).toBe(false);
        expect(isColor([0, 0.5, 1])).toBe(false);
        expect(isColor('red')).toBe(false);
    });
});
