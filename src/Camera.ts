import { degToRad, Quat, rotate } from './math.js';
import { traceRay } from './shading.js';
import { CameraConfig, Color, Scene, Vec3 } from './types.js';

export interface Transform {
    position: Vec3;
    rotation: Quat;
}

// Plain-data form of a camera, safe to post to a worker thread.
export interface CameraSnapshot {
    position: [number, number, number];
    rotation: [number, number, number, number];
    focalLength: number;
    pxPerUnit: number;
}

/**
 * Pinhole camera. Camera space has +x forward, +y left and +z up; the image
 * plane sits `focalLength` units ahead, `pxPerUnit` pixels to a world unit.
 */
export class Camera {
    transform: Transform;
    focalLength: number;
    pxPerUnit: number;

    constructor(transform: Transform, focalLength: number, pxPerUnit: number) {
        this.transform = transform;
        this.focalLength = focalLength;
        this.pxPerUnit = pxPerUnit;
    }

    static fromConfig(config: CameraConfig): Camera {
        const rotation = config.rotation
            ? Quat.fromAxisAngle(
                  Vec3.normalize(config.rotation.axis),
                  degToRad(config.rotation.angle)
              )
            : Quat.IDENTITY;
        if (!Number.isFinite(rotation.sqMag())) {
            throw new RangeError('Camera rotation axis must be non-zero');
        }
        return new Camera(
            { position: config.position, rotation },
            config.focalLength,
            config.pxPerUnit
        );
    }

    static fromSnapshot(snapshot: CameraSnapshot): Camera {
        return new Camera(
            {
                position: snapshot.position,
                rotation: Quat.fromArray(snapshot.rotation),
            },
            snapshot.focalLength,
            snapshot.pxPerUnit
        );
    }

    snapshot(): CameraSnapshot {
        const p = this.transform.position;
        return {
            position: [p[0], p[1], p[2]],
            rotation: this.transform.rotation.toArray(),
            focalLength: this.focalLength,
            pxPerUnit: this.pxPerUnit,
        };
    }

    // (x, y) is the pixel offset from the image centre, y growing downwards.
    primaryRay(x: number, y: number): Vec3 {
        const ray: Vec3 = [
            this.focalLength,
            -x / this.pxPerUnit,
            -y / this.pxPerUnit,
        ];
        return rotate(ray, this.transform.rotation);
    }

    getPixel(scene: Scene, x: number, y: number): Color {
        return traceRay(scene, this.transform.position, this.primaryRay(x, y));
    }
}
