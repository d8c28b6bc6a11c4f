import { Vec3 } from './types.js';

/**
 * Quaternion `r + i·i + j·j + k·k`. Rotations are unit quaternions; composition
 * is multiplication, left operand applied last.
 */
export class Quat {
    static readonly IDENTITY = new Quat(1, 0, 0, 0);

    constructor(
        readonly r: number,
        readonly i: number,
        readonly j: number,
        readonly k: number
    ) {}

    static fromVector(v: Vec3): Quat {
        return new Quat(0, v[0], v[1], v[2]);
    }

    static fromArray(data: readonly number[]): Quat {
        if (data.length !== 4) {
            throw new RangeError(
                `Quaternion needs 4 components, got ${data.length}`
            );
        }
        return new Quat(data[0], data[1], data[2], data[3]);
    }

    /**
     * Rotation of `angle` radians about `axis` (expected unit length). The
     * result is renormalised when rounding leaves it off the unit sphere.
     */
    static fromAxisAngle(axis: Vec3, angle: number): Quat {
        const half = angle / 2;
        const s = Math.sin(half);
        const q = new Quat(Math.cos(half), axis[0] * s, axis[1] * s, axis[2] * s);
        return q.needsRenormalize() ? q.normalized() : q;
    }

    multiply(rhs: Quat): Quat {
        return new Quat(
            this.r * rhs.r - this.i * rhs.i - this.j * rhs.j - this.k * rhs.k,
            this.r * rhs.i + this.i * rhs.r + this.j * rhs.k - this.k * rhs.j,
            this.r * rhs.j - this.i * rhs.k + this.j * rhs.r + this.k * rhs.i,
            this.r * rhs.k + this.i * rhs.j - this.j * rhs.i + this.k * rhs.r
        );
    }

    scale(s: number): Quat {
        return new Quat(this.r * s, this.i * s, this.j * s, this.k * s);
    }

    conjugate(): Quat {
        return new Quat(this.r, -this.i, -this.j, -this.k);
    }

    sqMag(): number {
        return (
            this.r * this.r + this.i * this.i + this.j * this.j + this.k * this.k
        );
    }

    mag(): number {
        return Math.sqrt(this.sqMag());
    }

    normalized(): Quat {
        return this.scale(1 / this.mag());
    }

    needsRenormalize(): boolean {
        return Math.abs(this.sqMag() - 1) > Number.EPSILON;
    }

    vector(): Vec3 {
        return [this.i, this.j, this.k];
    }

    equals(other: Quat): boolean {
        return (
            this.r === other.r &&
            this.i === other.i &&
            this.j === other.j &&
            this.k === other.k
        );
    }

    toArray(): [number, number, number, number] {
        return [this.r, this.i, this.j, this.k];
    }
}

export function rotate(v: Vec3, q: Quat): Vec3 {
    if (q.equals(Quat.IDENTITY)) {
        return v;
    }
    return q.multiply(Quat.fromVector(v)).multiply(q.conjugate()).vector();
}

export function degToRad(degrees: number): number {
    return (degrees * Math.PI) / 180;
}
