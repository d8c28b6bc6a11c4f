import { describe, it, expect } from 'vitest';
import { intersect, intersectSphere, intersectTriangle } from '../src/intersect.js';
import { Sphere, Triangle, Vec3 } from '../src/types.js';
import { expectVecClose } from './helpers.js';

function sphere(center: Vec3, radius: number): Sphere {
    return { kind: 'sphere', center, radius, color: [200, 100, 50] };
}

const triangle: Triangle = {
    kind: 'triangle',
    p0: [0, 1, 1],
    p1: [0, 1, -1],
    p2: [0, -1, 0],
    color: [10, 20, 30],
};

describe('intersectSphere', () => {
    it.each([0.5, 1, 2])('hits the front face of a radius %d sphere at 5 - r', (r) => {
        const hit = intersectSphere([-5, 0, 0], [1, 0, 0], sphere([0, 0, 0], r));
        expect(hit?.t).toBe(5 - r);
        expectVecClose(hit?.normal, [-1, 0, 0]);
        expect(hit?.color).toEqual([200, 100, 50]);
    });

    it('misses when the ray passes further than the radius', () => {
        expect(intersectSphere([-5, 2, 0], [1, 0, 0], sphere([0, 0, 0], 1))).toBeNull();
    });

    it('measures t in units of a non-unit direction', () => {
        const hit = intersectSphere([-5, 0, 0], [2, 0, 0], sphere([0, 0, 0], 1));
        expect(hit?.t).toBe(2);
    });

    it('hits the far side from inside the sphere', () => {
        const hit = intersectSphere([0, 0, 0], [1, 0, 0], sphere([0, 0, 0], 1));
        expect(hit?.t).toBe(1);
        expectVecClose(hit?.normal, [1, 0, 0]);
    });

    it('ignores spheres behind the ray origin', () => {
        expect(intersectSphere([0, 0, 0], [1, 0, 0], sphere([-10, 0, 0], 1))).toBeNull();
    });

    it('hits a tangent ray with a zero discriminant', () => {
        const hit = intersectSphere([-5, 1, 0], [1, 0, 0], sphere([0, 0, 0], 1));
        expect(hit?.t).toBe(5);
        expectVecClose(hit?.normal, [0, 1, 0]);
    });

    it('rejects a subnormal discriminant', () => {
        // b = 1e-160 and c = 0, so the discriminant is 1e-320
        expect(intersectSphere([0, 0, 0], [1, 0, 0], sphere([1e-160, 1, 0], 1))).toBeNull();
    });

    it('treats a -0 root as behind the origin and takes the other root', () => {
        // b = -0 and the discriminant is 0, so the roots are -0 and +0
        const hit = intersectSphere([0, 0, 0], [1, 0, 0], sphere([-0, -1, -0], 1));
        expect(hit?.t).toBe(0);
        expectVecClose(hit?.normal, [0, 1, 0]);
    });
});

describe('intersectTriangle', () => {
    it('hits the triangle head-on', () => {
        const hit = intersectTriangle([-5, 0, 0], [1, 0, 0], triangle);
        expect(hit?.t).toBe(5);
        expectVecClose(hit?.normal, [-1, 0, 0]);
        expect(hit?.color).toEqual([10, 20, 30]);
    });

    it('keeps the winding-dependent normal', () => {
        const flipped: Triangle = { ...triangle, p1: triangle.p2, p2: triangle.p1 };
        const hit = intersectTriangle([-5, 0, 0], [1, 0, 0], flipped);
        expect(hit?.t).toBe(5);
        expectVecClose(hit?.normal, [1, 0, 0]);
    });

    it('misses outside the triangle footprint', () => {
        expect(intersectTriangle([-5, 5, 0], [1, 0, 0], triangle)).toBeNull();
    });

    it('misses when the plane is behind the origin', () => {
        expect(intersectTriangle([-5, 0, 0], [-1, 0, 0], triangle)).toBeNull();
    });

    it('misses when the ray is parallel to the plane', () => {
        expect(intersectTriangle([-5, 0, 0], [0, 1, 0], triangle)).toBeNull();
    });

    it('misses a degenerate triangle instead of failing', () => {
        const collinear: Triangle = { ...triangle, p0: [0, 0, 0], p1: [0, 1, 0], p2: [0, 2, 0] };
        expect(intersectTriangle([-5, 0, 0], [1, 0, 0], collinear)).toBeNull();
    });
});

describe('intersect', () => {
    it('dispatches on the object kind', () => {
        expect(intersect([-5, 0, 0], [1, 0, 0], sphere([0, 0, 0], 1))?.t).toBe(4);
        expect(intersect([-5, 0, 0], [1, 0, 0], triangle)?.t).toBe(5);
    });
});
