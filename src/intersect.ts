import { Hit, SceneObject, Sphere, Triangle, Vec3 } from './types.js';

// Smallest positive normal double; anything non-zero below it is subnormal.
const MIN_NORMAL = 2.2250738585072014e-308;

function isSubnormal(x: number): boolean {
    return x !== 0 && Math.abs(x) < MIN_NORMAL;
}

// Sign bit test: -0 counts as negative.
function isSignNegative(x: number): boolean {
    return x < 0 || Object.is(x, -0);
}

export function intersectSphere(
    origin: Vec3,
    dir: Vec3,
    sphere: Sphere
): Hit | null {
    const dist = Vec3.subtract(sphere.center, origin);
    const a = Vec3.sqMag(dir);
    const b = Vec3.dot(dir, dist);
    const c = Vec3.sqMag(dist) - sphere.radius * sphere.radius;

    const discriminant = b * b - a * c;
    // Also rejects NaN, which fails every comparison below.
    if (!(discriminant >= 0) || isSubnormal(discriminant)) {
        return null;
    }

    const root = Math.sqrt(discriminant);
    const far = b + root;
    const near = b - root;

    // `a` is a squared magnitude, so dividing keeps the sign of each root.
    let t: number;
    if (!isSignNegative(near)) {
        t = near / a;
    } else if (!isSignNegative(far)) {
        t = far / a;
    } else {
        return null;
    }
    if (!Number.isFinite(t)) {
        return null;
    }

    const point = Vec3.add(origin, Vec3.scale(dir, t));
    const normal = Vec3.normalize(Vec3.subtract(point, sphere.center));
    if (!Vec3.isFinite(normal)) {
        return null;
    }

    return { t, normal, color: sphere.color };
}

export function intersectTriangle(
    origin: Vec3,
    dir: Vec3,
    triangle: Triangle
): Hit | null {
    const { p0, p1, p2 } = triangle;

    // Plane containing the triangle
    const v1 = Vec3.subtract(p1, p0);
    const v2 = Vec3.subtract(p2, p0);
    const planeNormal = Vec3.cross(v1, v2);
    const t =
        -Vec3.dot(planeNormal, Vec3.subtract(origin, p0)) /
        Vec3.dot(planeNormal, dir);

    if (!Number.isFinite(t) || isSignNegative(t)) {
        return null;
    }

    // Columns of the vertex matrix relative to the ray origin
    const r0 = Vec3.subtract(p0, origin);
    const r1 = Vec3.subtract(p1, origin);
    const r2 = Vec3.subtract(p2, origin);
    const [a, d, g] = [r0[0], r0[1], r0[2]];
    const [b, e, h] = [r1[0], r1[1], r1[2]];
    const [c, f, i] = [r2[0], r2[1], r2[2]];

    const eiFh = e * i - f * h;
    const fgDi = f * g - d * i;
    const dhEg = d * h - e * g;
    const det = a * eiFh + b * fgDi + c * dhEg;
    if (Number.isNaN(det)) {
        return null;
    }
    const detNegative = isSignNegative(det);

    const edgeTerms = [
        dir[0] * eiFh + dir[1] * (c * h - b * i) + dir[2] * (b * f - c * e),
        dir[0] * fgDi + dir[1] * (a * i - c * g) + dir[2] * (c * d - a * f),
        dir[0] * dhEg + dir[1] * (b * g - a * h) + dir[2] * (a * e - b * d),
    ];
    const inside = edgeTerms.every(
        (term) => !Number.isNaN(term) && isSignNegative(term) === detNegative
    );
    if (!inside) {
        return null;
    }

    const normal = Vec3.normalize(planeNormal);
    if (!Vec3.isFinite(normal)) {
        return null;
    }

    return { t, normal, color: triangle.color };
}

export function intersect(
    origin: Vec3,
    dir: Vec3,
    object: SceneObject
): Hit | null {
    switch (object.kind) {
        case 'sphere':
            return intersectSphere(origin, dir, object);
        case 'triangle':
            return intersectTriangle(origin, dir, object);
    }
}
