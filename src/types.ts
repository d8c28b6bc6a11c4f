export interface Vec3 {
    readonly 0: number;
    readonly 1: number;
    readonly 2: number;
}

export namespace Vec3 {
    export const ZERO: Vec3 = [0, 0, 0];
    export const I: Vec3 = [1, 0, 0];
    export const J: Vec3 = [0, 1, 0];
    export const K: Vec3 = [0, 0, 1];

    export function add(a: Vec3, b: Vec3): Vec3 {
        return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
    }

    export function subtract(a: Vec3, b: Vec3): Vec3 {
        return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
    }

    export function negate(v: Vec3): Vec3 {
        return [-v[0], -v[1], -v[2]];
    }

    export function scale(v: Vec3, s: number): Vec3 {
        return [v[0] * s, v[1] * s, v[2] * s];
    }

    export function divide(v: Vec3, s: number): Vec3 {
        return [v[0] / s, v[1] / s, v[2] / s];
    }

    export function dot(a: Vec3, b: Vec3): number {
        return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
    }

    export function cross(a: Vec3, b: Vec3): Vec3 {
        return [
            a[1] * b[2] - a[2] * b[1],
            a[2] * b[0] - a[0] * b[2],
            a[0] * b[1] - a[1] * b[0],
        ];
    }

    export function sqMag(v: Vec3): number {
        return dot(v, v);
    }

    export function mag(v: Vec3): number {
        return Math.sqrt(sqMag(v));
    }

    // A zero vector comes back as NaN components; callers check finiteness.
    export function normalize(v: Vec3): Vec3 {
        return divide(v, mag(v));
    }

    export function isFinite(v: Vec3): boolean {
        return (
            Number.isFinite(v[0]) &&
            Number.isFinite(v[1]) &&
            Number.isFinite(v[2])
        );
    }
}

export type Color = readonly [r: number, g: number, b: number];

export type Sphere = {
    kind: 'sphere';
    center: Vec3;
    radius: number;
    color: Color;
};

export type Triangle = {
    kind: 'triangle';
    p0: Vec3;
    p1: Vec3;
    p2: Vec3;
    color: Color;
};

export type SceneObject = Sphere | Triangle;

export interface Scene {
    objects: readonly SceneObject[];
    light: Vec3;
}

export interface Hit {
    t: number;
    normal: Vec3;
    color: Color;
}

// Camera block as written in scene files and on the command line.
export interface CameraConfig {
    position: Vec3;
    // Axis and angle (degrees) of the initial orientation.
    rotation?: { axis: Vec3; angle: number };
    focalLength: number;
    pxPerUnit: number;
}

export type Model = {
    path: string;
    position: Vec3;
    rotation: Vec3;
    scale: Vec3;
    color: Color;
};

export type RawScene = {
    light: Vec3;
    objects: SceneObject[];
    models: Model[];
    camera?: Partial<CameraConfig>;
};

export interface LoadedScene {
    scene: Scene;
    camera: Partial<CameraConfig>;
}

export interface FrameBuffer {
    width: number;
    height: number;
    // RGBA, 4 bytes per pixel, row-major from the top-left corner.
    data: Uint8ClampedArray;
}
