import { expect } from 'vitest';
import { Vec3 } from '../src/types.js';

// Component-wise closeness; also treats -0 and 0 as equal.
export function expectVecClose(actual: Vec3 | undefined, expected: Vec3, digits = 10): void {
    expect(actual).toBeDefined();
    if (!actual) return;
    expect(actual[0]).toBeCloseTo(expected[0], digits);
    expect(actual[1]).toBeCloseTo(expected[1], digits);
    expect(actual[2]).toBeCloseTo(expected[2], digits);
}
