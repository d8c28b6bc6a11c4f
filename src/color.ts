import { Color } from './types.js';

export const BLACK: Color = [0, 0, 0];
export const BACKGROUND = BLACK;

function toChannel(value: number): number {
    if (Number.isNaN(value)) {
        return 0;
    }
    return Math.min(255, Math.max(0, Math.round(value)));
}

export function scaleColor(color: Color, factor: number): Color {
    return [
        toChannel(color[0] * factor),
        toChannel(color[1] * factor),
        toChannel(color[2] * factor),
    ];
}

// Each weighted part is rounded on its own before the two are summed.
export function interpolateColor(a: Color, b: Color, ratio: number): Color {
    const mix = (x: number, y: number) =>
        toChannel(Math.round(x * (1 - ratio)) + Math.round(y * ratio));
    return [mix(a[0], b[0]), mix(a[1], b[1]), mix(a[2], b[2])];
}

export function isColor(value: unknown): value is Color {
    return (
        Array.isArray(value) &&
        value.length === 3 &&
        value.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)
    );
}
