import { Camera } from './Camera.js';
import { Quat, rotate } from './math.js';
import { Vec3 } from './types.js';

export const MOVE_SPEED = 3; // world units per second
export const TURN_SPEED = Math.PI / 2; // radians per second
export const MIN_FOCAL_LENGTH = 0.1;

// Camera-space axes: +x forward, +y left, +z up.
const MOVE_KEYS = new Map<string, Vec3>([
    ['w', Vec3.I],
    ['s', Vec3.negate(Vec3.I)],
    ['a', Vec3.J],
    ['d', Vec3.negate(Vec3.J)],
    ['e', Vec3.K],
    ['q', Vec3.negate(Vec3.K)],
]);

const TURN_KEYS = new Map<string, Vec3>([
    ['j', Vec3.K], // yaw left
    ['l', Vec3.negate(Vec3.K)], // yaw right
    ['i', Vec3.negate(Vec3.J)], // pitch up
    ['k', Vec3.J], // pitch down
    ['u', Vec3.negate(Vec3.I)], // roll left
    ['o', Vec3.I], // roll right
]);

/**
 * Moves and turns a camera between frames. Owns the rotation drift policy:
 * every composed rotation is pulled back onto the unit sphere once its squared
 * magnitude is off by more than machine epsilon.
 */
export class CameraController {
    constructor(readonly camera: Camera) {}

    move(axis: Vec3, amount: number): void {
        const { transform } = this.camera;
        const delta = rotate(Vec3.scale(axis, amount), transform.rotation);
        transform.position = Vec3.add(transform.position, delta);
    }

    turn(axis: Vec3, angle: number): void {
        const { transform } = this.camera;
        const worldAxis = rotate(axis, transform.rotation);
        // fromAxisAngle already renormalises the step itself
        const step = Quat.fromAxisAngle(worldAxis, angle);

        let rotation = step.multiply(transform.rotation);
        if (rotation.needsRenormalize()) {
            rotation = rotation.normalized();
        }
        transform.rotation = rotation;
    }

    zoom(delta: number): void {
        this.camera.focalLength = Math.max(
            MIN_FOCAL_LENGTH,
            this.camera.focalLength + delta
        );
    }

    /**
     * Applies one key held for `dt` seconds. Returns whether the camera
     * changed.
     */
    handleKey(name: string, dt: number): boolean {
        const moveDelta = MOVE_SPEED * dt;
        const turnDelta = TURN_SPEED * dt;

        const moveAxis = MOVE_KEYS.get(name);
        if (moveAxis) {
            this.move(moveAxis, moveDelta);
            return true;
        }
        const turnAxis = TURN_KEYS.get(name);
        if (turnAxis) {
            this.turn(turnAxis, turnDelta);
            return true;
        }

        switch (name) {
            case 'r':
                this.zoom(moveDelta);
                return true;
            case 'f':
                this.zoom(-moveDelta);
                return true;
            // Dolly zoom: move and counter the change in focal length
            case 'x':
                this.move(Vec3.I, moveDelta);
                this.zoom(-moveDelta);
                return true;
            case 'z':
                this.move(Vec3.I, -moveDelta);
                this.zoom(moveDelta);
                return true;
            default:
                return false;
        }
    }
}
