import { describe, it, expect } from 'vitest';
import { isOccluded, nearestHit, shade, traceRay } from '../src/shading.js';
import { Hit, Scene, SceneObject, Sphere } from '../src/types.js';

const target: Sphere = { kind: 'sphere', center: [0, 0, 0], radius: 1, color: [200, 100, 50] };

function scene(light: Scene['light'], ...extra: SceneObject[]): Scene {
    return { objects: [target, ...extra], light };
}

function hit(t: number, color: Hit['color'] = [1, 2, 3]): Hit {
    return { t, normal: [-1, 0, 0], color };
}

describe('nearestHit', () => {
    it('picks the smaller of two nearly equal distances', () => {
        const near = hit(3.0, [1, 1, 1]);
        const far = hit(3.0 + 1e-7, [2, 2, 2]);
        expect(nearestHit([far, near])).toBe(near);
        expect(nearestHit([near, far])).toBe(near);
    });

    it('keeps the earliest candidate on an exact tie', () => {
        const first = hit(3, [1, 1, 1]);
        const second = hit(3, [2, 2, 2]);
        expect(nearestHit([first, second])).toBe(first);
        expect(nearestHit([second, first])).toBe(second);
    });

    it('skips missing and non-finite candidates', () => {
        const valid = hit(2);
        expect(nearestHit([null, hit(NaN), hit(Infinity), hit(-1), valid])).toBe(valid);
        expect(nearestHit([hit(NaN), valid, hit(NaN)])).toBe(valid);
    });

    it('returns null when nothing was hit', () => {
        expect(nearestHit([])).toBeNull();
        expect(nearestHit([null, hit(NaN)])).toBeNull();
    });
});

describe('traceRay', () => {
    it('lights a surface facing the light at full strength', () => {
        expect(traceRay(scene([-10, 0, 0]), [-5, 0, 0], [1, 0, 0])).toEqual([200, 100, 50]);
    });

    it('scales by the cosine toward the light', () => {
        // cos = 4 / sqrt(41)
        expect(traceRay(scene([-5, 5, 0]), [-5, 0, 0], [1, 0, 0])).toEqual([125, 62, 31]);
    });

    it('is black when an occluder sits between the point and the light', () => {
        const occluder: Sphere = { kind: 'sphere', center: [-3, 2.5, 0], radius: 0.5, color: [9, 9, 9] };
        expect(traceRay(scene([-5, 5, 0], occluder), [-5, 0, 0], [1, 0, 0])).toEqual([0, 0, 0]);
    });

    it('ignores occluders beyond the light', () => {
        const beyond: Sphere = { kind: 'sphere', center: [-9, 10, 0], radius: 0.5, color: [9, 9, 9] };
        expect(traceRay(scene([-5, 5, 0], beyond), [-5, 0, 0], [1, 0, 0])).toEqual([125, 62, 31]);
    });

    it('is black when the light is behind the surface', () => {
        expect(traceRay(scene([10, 0, 0]), [-5, 0, 0], [1, 0, 0])).toEqual([0, 0, 0]);
    });

    it('returns the background when nothing is hit', () => {
        expect(traceRay(scene([-10, 0, 0]), [-5, 0, 0], [-1, 0, 0])).toEqual([0, 0, 0]);
    });

    it('uses scene order to break exact ties', () => {
        const twin: Sphere = { ...target, color: [10, 200, 10] };
        expect(traceRay(scene([-10, 0, 0], twin), [-5, 0, 0], [1, 0, 0])).toEqual([200, 100, 50]);
    });
});

describe('shade', () => {
    it('shades a hit handed over by the caller', () => {
        const s = scene([-10, 0, 0]);
        expect(shade(s, [-5, 0, 0], [1, 0, 0], { t: 4, normal: [-1, 0, 0], color: [40, 80, 120] })).toEqual([
            40, 80, 120,
        ]);
    });
});

describe('isOccluded', () => {
    it('does not count the surface the point lies on', () => {
        expect(isOccluded(scene([-10, 0, 0]), [-1, 0, 0])).toBe(false);
    });

    it('is false for a point at the light itself', () => {
        expect(isOccluded(scene([-10, 0, 0]), [-10, 0, 0])).toBe(false);
    });
});
