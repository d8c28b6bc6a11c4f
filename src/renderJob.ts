import { Camera, CameraSnapshot } from './Camera.js';
import { renderBand } from './renderer.js';
import { Scene } from './types.js';

export type RenderJob = {
    id: number;
    camera: CameraSnapshot;
    width: number;
    height: number;
    rowStart: number;
    rowEnd: number;
    // Raw buffer only, so it is transferable
    buf: ArrayBuffer;
};

// The scene is sent once and kept by the worker until it is replaced
export type WorkerRequest =
    | { type: 'scene'; scene: Scene }
    | ({ type: 'render' } & RenderJob);

export type RenderResult =
    | { id: number; ok: true; buf: ArrayBuffer; renderTime: number }
    | { id: number; ok: false; error: string; buf: ArrayBuffer };

/**
 * Worker-side state: the current scene, and the rendering of one band per
 * job into the buffer that came with it.
 */
export class RenderJobHandler {
    private scene: Scene | null = null;

    // Returns the reply to post back, or null when none is due.
    handle(msg: WorkerRequest): RenderResult | null {
        if (msg.type === 'scene') {
            this.scene = msg.scene;
            return null;
        }

        const { id, width, height, rowStart, rowEnd, buf } = msg;
        const start = performance.now();
        try {
            if (!this.scene) {
                throw new Error('No scene has been sent to this worker');
            }
            const camera = Camera.fromSnapshot(msg.camera);
            renderBand(
                this.scene,
                camera,
                width,
                height,
                rowStart,
                rowEnd,
                new Uint8ClampedArray(buf)
            );
            return { id, ok: true, buf, renderTime: performance.now() - start };
        } catch (e) {
            const err = e instanceof Error ? e : new Error(String(e));
            return { id, ok: false, error: err.message, buf };
        }
    }
}
